import { minimatch } from "minimatch";
import type { ClusterClient } from "../cluster/oc-client.js";
import type { PipelineClient } from "../cluster/tkn-client.js";
import { PipelinectlError, ResourceNotFoundError, StepFailedError } from "../errors.js";
import type { Reporter } from "../logging/reporter.js";
import { manifestPath, readManifest, summarizeManifest } from "./manifest.js";
import type { ProvisionStep } from "./plans.js";
import type { Sleep } from "./poller.js";
import { retargetNamespace } from "./template.js";
import { lookupWebhookUrl } from "./urls.js";

export type SequencerDeps = {
  cluster: ClusterClient;
  pipelines: PipelineClient;
  reporter: Reporter;
  sleep: Sleep;
  manifestsDir: string;
  /** Replaced by the active namespace in `apply-template` steps. */
  templateToken: string;
};

export type SequenceOptions = {
  dryRun?: boolean;
  /** Glob over step ids; non-matching steps are skipped. */
  only?: string;
};

export type SequenceResult = {
  executed: string[];
  skipped: string[];
  webhookUrl?: string;
};

/**
 * Runs provision steps strictly in order. No retries and no rollback: the
 * first failure aborts the sequence as a StepFailedError carrying the
 * underlying exit code. Create-or-update semantics belong to `oc apply`.
 */
export class ProvisioningSequencer {
  constructor(private readonly deps: SequencerDeps) {}

  async execute(steps: readonly ProvisionStep[], opts: SequenceOptions = {}): Promise<SequenceResult> {
    const result: SequenceResult = { executed: [], skipped: [] };

    for (const step of steps) {
      if (opts.only && !minimatch(step.id, opts.only)) {
        result.skipped.push(step.id);
        continue;
      }

      if (step.label) this.deps.reporter.info(step.label);

      try {
        const url = opts.dryRun ? await this.preview(step) : await this.runStep(step);
        if (url !== undefined) result.webhookUrl = url;
      } catch (e) {
        if (e instanceof PipelinectlError && !(e instanceof StepFailedError)) {
          throw new StepFailedError(step.id, e);
        }
        throw e;
      }
      result.executed.push(step.id);
    }

    return result;
  }

  /** Renders the manifest an `apply-template` step would submit. */
  render(file: string): string {
    const { cluster, manifestsDir, templateToken } = this.deps;
    return retargetNamespace(readManifest(manifestsDir, file), templateToken, cluster.namespace);
  }

  private async runStep(step: ProvisionStep): Promise<string | undefined> {
    const { cluster, pipelines, reporter, sleep, manifestsDir } = this.deps;

    switch (step.kind) {
      case "apply":
        await cluster.applyFile(manifestPath(manifestsDir, step.file));
        return undefined;
      case "apply-template":
        await cluster.applyText(this.render(step.file));
        return undefined;
      case "expose": {
        const [name] = await cluster.findNames(step.resource, step.selector);
        if (!name) throw new ResourceNotFoundError(step.resource, step.selector, cluster.namespace);
        await cluster.expose(name);
        return undefined;
      }
      case "delay":
        await sleep(step.ms);
        return undefined;
      case "describe-pipeline":
        reporter.print("\nPipeline\n===============");
        await pipelines.describe(step.pipeline);
        return undefined;
      case "webhook-url": {
        const url = await lookupWebhookUrl(cluster, step.selector);
        reporter.info(`Webhook URL: ${url}`, { url });
        return url;
      }
    }
  }

  private async preview(step: ProvisionStep): Promise<string | undefined> {
    const { cluster, reporter, manifestsDir } = this.deps;
    const say = (text: string) => reporter.print(`[dry-run] ${step.id}: ${text}`, "DRY_RUN");

    switch (step.kind) {
      case "apply":
      case "apply-template": {
        const text = step.kind === "apply" ? readManifest(manifestsDir, step.file) : this.render(step.file);
        say(`apply ${manifestPath(manifestsDir, step.file)} -> ${summarizeManifest(text).join(", ")}`);
        return undefined;
      }
      case "expose":
        say(`expose ${step.resource} -l ${step.selector} in ${cluster.namespace}`);
        return undefined;
      case "delay":
        say(`wait ${step.ms}ms`);
        return undefined;
      case "describe-pipeline":
        say(`describe pipeline ${step.pipeline}`);
        return undefined;
      case "webhook-url":
        say(`look up route -l ${step.selector}`);
        return undefined;
    }
  }
}
