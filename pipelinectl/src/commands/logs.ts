import type { DemoContext } from "../context.js";

/** Follows the most recent run of the tutorial pipeline. */
export function followLogs(ctx: DemoContext): Promise<number> {
  return ctx.pipelines.logs(ctx.config.pipeline, { last: true, follow: true });
}
