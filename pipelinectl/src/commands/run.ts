import type { DemoContext } from "../context.js";
import { invokePipelines } from "../core/invoker.js";
import { failureMessage, validateRuns } from "../core/run-validator.js";
import { EXIT } from "./exit-codes.js";

/** Lists the namespace's pipeline runs and reports each one that did not succeed. */
export async function validatePipelineRuns(ctx: DemoContext): Promise<number> {
  const report = validateRuns(await ctx.cluster.listPipelineRuns());
  for (const verdict of report.failed) {
    ctx.reporter.error("PIPELINERUN_FAILED", failureMessage(verdict), { run: verdict.name, observed: verdict.observed });
  }
  return report.ok ? EXIT.SUCCESS : EXIT.FAILURE;
}

/** Builds and deploys the api and ui images, then checks every run succeeded. */
export async function runPipelines(ctx: DemoContext): Promise<number> {
  await invokePipelines(
    { pipelines: ctx.pipelines, reporter: ctx.reporter, dryRun: ctx.options.dryRun },
    ctx.config.pipeline,
    ctx.config.invocations,
  );
  if (ctx.options.dryRun) return EXIT.SUCCESS;

  ctx.reporter.info("Validating the result of pipeline run");
  return validatePipelineRuns(ctx);
}
