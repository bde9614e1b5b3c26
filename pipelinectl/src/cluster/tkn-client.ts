import { CommandFailedError } from "../errors.js";
import type { Reporter } from "../logging/reporter.js";
import type { PipelineInvocation } from "../types/resource.js";
import { formatCommand, type CommandRunner } from "./runner.js";

const TKN = "tkn";

/** Pipeline runtime primitives. */
export interface PipelineClient {
  readonly namespace: string;
  isInstalled(): Promise<boolean>;
  describe(pipeline: string): Promise<void>;
  start(invocation: PipelineInvocation): Promise<void>;
  /** Streams logs; resolves with the exit code of `tkn`. */
  logs(pipeline: string, opts: { last: boolean; follow: boolean }): Promise<number>;
}

export function startArgs(invocation: PipelineInvocation): string[] {
  const args = ["pipeline", "start", invocation.pipeline];
  for (const [key, value] of Object.entries(invocation.resources)) args.push("-r", `${key}=${value}`);
  for (const [key, value] of Object.entries(invocation.params)) args.push("-p", `${key}=${value}`);
  args.push(`--showlog=${invocation.showLog}`);
  return args;
}

/** The command line `start` runs, without running it. */
export function startCommand(namespace: string, invocation: PipelineInvocation): string {
  return formatCommand(TKN, ["-n", namespace, ...startArgs(invocation)]);
}

export class TknClient implements PipelineClient {
  constructor(
    readonly namespace: string,
    private readonly runner: CommandRunner,
    private readonly reporter: Reporter,
  ) {}

  async isInstalled(): Promise<boolean> {
    const res = await this.runner.capture(TKN, ["version"]);
    return res.exitCode === 0;
  }

  async describe(pipeline: string): Promise<void> {
    const args = this.namespaced(["pipeline", "describe", pipeline]);
    const res = await this.runner.capture(TKN, args);
    if (res.exitCode !== 0) throw new CommandFailedError(formatCommand(TKN, args), res.exitCode, res.stderr);
    this.reporter.print(res.stdout.trimEnd());
  }

  async start(invocation: PipelineInvocation): Promise<void> {
    const args = this.namespaced(startArgs(invocation));
    const code = await this.runner.stream(TKN, args);
    if (code !== 0) throw new CommandFailedError(formatCommand(TKN, args), code, "");
  }

  async logs(pipeline: string, opts: { last: boolean; follow: boolean }): Promise<number> {
    const extra = [...(opts.last ? ["--last"] : []), ...(opts.follow ? ["-f"] : [])];
    return this.runner.stream(TKN, this.namespaced(["pipeline", "logs", pipeline, ...extra]));
  }

  private namespaced(args: string[]): string[] {
    const full = ["-n", this.namespace, ...args];
    this.reporter.command(formatCommand(TKN, full));
    return full;
  }
}
