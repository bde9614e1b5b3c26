import { OcClient, type ClusterClient } from "./cluster/oc-client.js";
import { ProcessRunner, type CommandRunner } from "./cluster/runner.js";
import { TknClient, type PipelineClient } from "./cluster/tkn-client.js";
import { loadConfig } from "./config/loader.js";
import { requireValidConfig } from "./config/validator.js";
import { ReadinessPoller, realSleep, type Sleep } from "./core/poller.js";
import { ProvisioningSequencer } from "./core/sequencer.js";
import type { OutputFormat, Reporter, Sink } from "./logging/reporter.js";
import { DEFAULT_CONFIG_DIR, DEFAULT_MANIFESTS_DIR } from "./paths.js";
import type { DemoConfig } from "./types/config.js";
import { describeRef } from "./types/resource.js";

/** Global CLI options, shared by every operation. */
export type GlobalOptions = {
  format: OutputFormat;
  config?: string;
  env?: string;
  dryRun?: boolean;
  only?: string;
};

/** Process-level collaborators; tests replace them with in-process fakes. */
export type Runtime = {
  runner: CommandRunner;
  sleep: Sleep;
  now: () => number;
  env: NodeJS.ProcessEnv;
  stdout: Sink;
  stderr: Sink;
  manifestsDir: string;
};

export function defaultRuntime(): Runtime {
  return {
    runner: new ProcessRunner(),
    sleep: realSleep,
    now: Date.now,
    env: process.env,
    stdout: process.stdout,
    stderr: process.stderr,
    manifestsDir: DEFAULT_MANIFESTS_DIR,
  };
}

export type DemoContext = {
  config: DemoConfig;
  options: GlobalOptions;
  reporter: Reporter;
  cluster: ClusterClient;
  pipelines: PipelineClient;
  poller: ReadinessPoller;
  sequencer: ProvisioningSequencer;
};

/**
 * Resolves configuration once and wires every component to the same
 * namespace. Nothing reads the environment after this point.
 */
export function createContext(options: GlobalOptions, runtime: Runtime, reporter: Reporter): DemoContext {
  const config = requireValidConfig(loadConfig(options.env, options.config ?? DEFAULT_CONFIG_DIR, runtime.env));

  const cluster = new OcClient(config.namespace, runtime.runner, reporter);
  const pipelines = new TknClient(config.namespace, runtime.runner, reporter);

  const poller = new ReadinessPoller((condition) => cluster.getField(condition, condition.field), {
    intervalMs: config.poll.interval_ms,
    timeoutMs: config.poll.timeout_ms,
    sleep: runtime.sleep,
    now: runtime.now,
    onStateChange: (condition, state) => {
      const resource = describeRef(condition);
      reporter.trace("READINESS", `${resource}: ${state}`, { resource, state });
    },
  });

  const sequencer = new ProvisioningSequencer({
    cluster,
    pipelines,
    reporter,
    sleep: runtime.sleep,
    manifestsDir: runtime.manifestsDir,
    templateToken: config.template_token,
  });

  return { config, options, reporter, cluster, pipelines, poller, sequencer };
}
