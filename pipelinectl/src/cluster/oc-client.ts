import { CommandFailedError } from "../errors.js";
import type { Reporter } from "../logging/reporter.js";
import type { PipelineRunSummary, ResourceRef, RunCondition } from "../types/resource.js";
import { formatCommand, type CommandRunner, type ExecResult } from "./runner.js";

const OC = "oc";

/** Cluster-resource primitives the tool needs. */
export interface ClusterClient {
  readonly namespace: string;
  isInstalled(): Promise<boolean>;
  /** Value of `field` (a JSONPath) on the resource; "" when the query fails. */
  getField(ref: ResourceRef, field: string): Promise<string>;
  rolloutStatus(ref: ResourceRef): Promise<void>;
  namespaceExists(): Promise<boolean>;
  newProject(): Promise<void>;
  applyFile(file: string): Promise<void>;
  applyText(manifest: string): Promise<void>;
  /** `kind/name` of every object matching the label selector. */
  findNames(kind: string, selector: string): Promise<string[]>;
  expose(resourceName: string): Promise<void>;
  /** Host of a route given as `name` or `route/name`; "" when it does not exist. */
  routeHost(route: string): Promise<string>;
  listPipelineRuns(): Promise<PipelineRunSummary[]>;
}

/**
 * `oc` wrapper. Namespaced mutations are echoed before they run, the way an
 * operator would type them: `oc -n <namespace> ...`.
 */
export class OcClient implements ClusterClient {
  constructor(
    readonly namespace: string,
    private readonly runner: CommandRunner,
    private readonly reporter: Reporter,
  ) {}

  async isInstalled(): Promise<boolean> {
    const res = await this.runner.capture(OC, ["version", "--client"]);
    return res.exitCode === 0;
  }

  async getField(ref: ResourceRef, field: string): Promise<string> {
    const args = ["get", ref.kind, ref.name];
    if (ref.namespace) args.push("-n", ref.namespace);
    args.push("-o", `jsonpath=${field}`);
    const res = await this.runner.capture(OC, args);
    return res.exitCode === 0 ? res.stdout.trim() : "";
  }

  async rolloutStatus(ref: ResourceRef): Promise<void> {
    const args = ["rollout", "status", "-w", ref.kind, ref.name];
    if (ref.namespace) args.push("-n", ref.namespace);
    const code = await this.runner.stream(OC, args);
    if (code !== 0) throw new CommandFailedError(formatCommand(OC, args), code, "");
  }

  async namespaceExists(): Promise<boolean> {
    const res = await this.namespaced(["get", "ns", this.namespace]);
    return res.exitCode === 0;
  }

  async newProject(): Promise<void> {
    await this.mutate(["new-project", this.namespace]);
  }

  async applyFile(file: string): Promise<void> {
    await this.mutate(["apply", "-f", file]);
  }

  async applyText(manifest: string): Promise<void> {
    await this.mutate(["apply", "-f", "-"], manifest);
  }

  async findNames(kind: string, selector: string): Promise<string[]> {
    const res = await this.runner.capture(OC, ["-n", this.namespace, "get", kind, "-l", selector, "-o", "name"]);
    if (res.exitCode !== 0) return [];
    return res.stdout
      .split("\n")
      .map((l) => l.trim())
      .filter((l) => l.length > 0);
  }

  async expose(resourceName: string): Promise<void> {
    await this.mutate(["expose", resourceName]);
  }

  async routeHost(route: string): Promise<string> {
    const ref = route.includes("/") ? [route] : ["route", route];
    const res = await this.runner.capture(OC, ["-n", this.namespace, "get", ...ref, "-o", "jsonpath={.spec.host}"]);
    return res.exitCode === 0 ? res.stdout.trim() : "";
  }

  async listPipelineRuns(): Promise<PipelineRunSummary[]> {
    const args = ["get", "pipelinerun.tekton.dev", "-n", this.namespace, "-o", "json"];
    const res = await this.runner.capture(OC, args);
    if (res.exitCode !== 0) throw new CommandFailedError(formatCommand(OC, args), res.exitCode, res.stderr);
    return parsePipelineRunList(res.stdout);
  }

  private async namespaced(args: string[], input?: string): Promise<ExecResult> {
    const full = ["-n", this.namespace, ...args];
    this.reporter.command(formatCommand(OC, full));
    return this.runner.capture(OC, full, input === undefined ? {} : { input });
  }

  private async mutate(args: string[], input?: string): Promise<void> {
    const res = await this.namespaced(args, input);
    if (res.exitCode !== 0) {
      throw new CommandFailedError(formatCommand(OC, ["-n", this.namespace, ...args]), res.exitCode, res.stderr);
    }
    this.reporter.print(res.stdout.trimEnd());
  }
}

function isRecord(val: unknown): val is Record<string, unknown> {
  return val !== null && typeof val === "object" && !Array.isArray(val);
}

function firstCondition(status: unknown): RunCondition | null {
  if (!isRecord(status) || !Array.isArray(status.conditions)) return null;
  const first: unknown = status.conditions[0];
  if (!isRecord(first)) return null;
  return {
    type: typeof first.type === "string" ? first.type : "",
    status: typeof first.status === "string" ? first.status : "",
  };
}

/** Reduce `oc get pipelinerun -o json` output to name + first condition per run. */
export function parsePipelineRunList(json: string): PipelineRunSummary[] {
  const doc: unknown = JSON.parse(json);
  if (!isRecord(doc) || !Array.isArray(doc.items)) return [];

  const runs: PipelineRunSummary[] = [];
  for (const item of doc.items) {
    if (!isRecord(item) || !isRecord(item.metadata)) continue;
    const name = item.metadata.name;
    if (typeof name !== "string") continue;
    runs.push({ name, condition: firstCondition(item.status) });
  }
  return runs;
}
