import type { ClusterClient } from "../cluster/oc-client.js";
import type { PipelineClient } from "../cluster/tkn-client.js";
import { ReadinessTimeoutError, ToolMissingError } from "../errors.js";
import type { Reporter } from "../logging/reporter.js";
import { describeRef, type ReadinessCondition } from "../types/resource.js";
import type { ReadinessPoller } from "./poller.js";

export type BootstrapDeps = {
  cluster: ClusterClient;
  pipelines: PipelineClient;
  poller: ReadinessPoller;
  reporter: Reporter;
  readiness: readonly ReadinessCondition[];
};

export async function validateTools(deps: Pick<BootstrapDeps, "cluster" | "pipelines" | "reporter">): Promise<void> {
  deps.reporter.info("validating tools");
  if (!(await deps.pipelines.isInstalled())) throw new ToolMissingError("tkn");
  if (!(await deps.cluster.isInstalled())) throw new ToolMissingError("oc");
}

/** Waits on each condition in order, then on its rollout when asked to. */
export async function waitForOperator(deps: Omit<BootstrapDeps, "pipelines">): Promise<void> {
  deps.reporter.info("Verifying openshift pipelines operator installation");

  for (const condition of deps.readiness) {
    const outcome = await deps.poller.waitFor(condition);
    if (outcome.state === "failed") {
      throw new ReadinessTimeoutError(describeRef(condition), condition.target, outcome.lastObserved, outcome.attempts);
    }
    if (condition.rollout) await deps.cluster.rolloutStatus(condition);
  }

  deps.reporter.info("Operator installed successfully.");
}

export async function ensureNamespace(deps: Pick<BootstrapDeps, "cluster" | "reporter">): Promise<void> {
  deps.reporter.info(`ensure namespace ${deps.cluster.namespace} exists`);
  if (!(await deps.cluster.namespaceExists())) await deps.cluster.newProject();
}

/** Precondition of every provisioning operation: tools, operator, namespace. */
export async function bootstrap(deps: BootstrapDeps): Promise<void> {
  await validateTools(deps);
  await waitForOperator(deps);
  await ensureNamespace(deps);
}
