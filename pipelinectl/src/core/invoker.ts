import { startCommand, type PipelineClient } from "../cluster/tkn-client.js";
import type { Reporter } from "../logging/reporter.js";
import type { InvocationConfig } from "../types/config.js";
import type { PipelineInvocation } from "../types/resource.js";

export function toInvocation(pipeline: string, cfg: InvocationConfig): PipelineInvocation {
  return { pipeline, resources: { ...cfg.resources }, params: { ...cfg.params }, showLog: true };
}

/** Starts each invocation in turn, streaming its log; the first failure stops the rest. */
export async function invokePipelines(
  deps: { pipelines: PipelineClient; reporter: Reporter; dryRun?: boolean },
  pipeline: string,
  invocations: readonly InvocationConfig[],
): Promise<void> {
  for (const cfg of invocations) {
    deps.reporter.info(`Running ${cfg.title} Build and deploy`);
    const invocation = toInvocation(pipeline, cfg);
    if (deps.dryRun) {
      deps.reporter.print(`[dry-run] ${startCommand(deps.pipelines.namespace, invocation)}`, "DRY_RUN");
      continue;
    }
    await deps.pipelines.start(invocation);
  }
}
