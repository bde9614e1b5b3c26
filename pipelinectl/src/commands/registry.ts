import type { DemoContext } from "../context.js";
import { followLogs } from "./logs.js";
import { runPipelines } from "./run.js";
import { SKIP_BOOTSTRAP, setup, setupPipeline, setupTriggers } from "./setup.js";
import { appUrl, webhookUrl } from "./urls.js";

export type Operation = {
  name: string;
  description: string;
  /** Optional positional argument, commander syntax. */
  argument?: { syntax: string; description: string };
  handler: (ctx: DemoContext, arg?: string) => Promise<number>;
};

const skipArg = {
  syntax: "[mode]",
  description: `pass "${SKIP_BOOTSTRAP}" when the operator and namespace are known to be ready`,
};

/** The fixed verb table. Commander matches verbs by exact name. */
export const OPERATIONS: readonly Operation[] = [
  { name: "setup", description: "runs both pipeline and trigger setup", handler: setup },
  {
    name: "setup-pipeline",
    description: "sets up project, tasks, pipeline and resources",
    argument: skipArg,
    handler: setupPipeline,
  },
  {
    name: "setup-triggers",
    description: "sets up trigger-template, bindings, event-listener, expose webhook url",
    argument: skipArg,
    handler: setupTriggers,
  },
  { name: "run", description: "starts pipeline to deploy api, ui", handler: runPipelines },
  {
    name: "webhook-url",
    description: "provides the webhook url, which listens to github-event payloads",
    handler: webhookUrl,
  },
  { name: "logs", description: "shows logs of last pipelinerun", handler: followLogs },
  { name: "url", description: "provides the url of the application", handler: appUrl },
];
