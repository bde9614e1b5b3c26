import type { DemoContext } from "../context.js";
import { bootstrap } from "../core/bootstrap.js";
import { pipelineSteps, triggerSteps, type ProvisionStep } from "../core/plans.js";
import { EXIT } from "./exit-codes.js";

export const SKIP_BOOTSTRAP = "skip-bootstrap";

async function runBootstrap(ctx: DemoContext): Promise<void> {
  if (ctx.options.dryRun) {
    ctx.reporter.print("[dry-run] bootstrap: tools, operator readiness, namespace", "DRY_RUN");
    return;
  }
  await bootstrap({ ...ctx, readiness: ctx.config.readiness });
}

async function provision(ctx: DemoContext, steps: ProvisionStep[], mode: string | undefined): Promise<number> {
  // Anything other than the literal skip flag keeps the precondition.
  if (mode !== SKIP_BOOTSTRAP) await runBootstrap(ctx);
  await ctx.sequencer.execute(steps, { dryRun: ctx.options.dryRun, only: ctx.options.only });
  return EXIT.SUCCESS;
}

/** Bootstrap once, then pipeline and trigger provisioning. */
export function setup(ctx: DemoContext): Promise<number> {
  return provision(ctx, [...pipelineSteps(ctx.config), ...triggerSteps(ctx.config)], undefined);
}

export function setupPipeline(ctx: DemoContext, mode?: string): Promise<number> {
  return provision(ctx, pipelineSteps(ctx.config), mode);
}

export function setupTriggers(ctx: DemoContext, mode?: string): Promise<number> {
  return provision(ctx, triggerSteps(ctx.config), mode);
}
