/** Layered configuration: base.yaml, then the env overlay, then environment variables. */
import type { ReadinessCondition } from "./resource.js";

export type PollConfig = {
  interval_ms: number;
  /** 0 waits forever. */
  timeout_ms: number;
};

export type TriggersConfig = {
  event_listener_selector: string;
  service_settle_ms: number;
  route_settle_ms: number;
};

export type InvocationConfig = {
  name: string;
  title: string;
  resources: Record<string, string>;
  params: Record<string, string>;
};

export type DemoConfig = {
  schema_version: string;
  namespace: string;
  template_token: string;
  poll: PollConfig;
  readiness: ReadinessCondition[];
  pipeline: string;
  triggers: TriggersConfig;
  app_route: string;
  invocations: InvocationConfig[];
};
