import type { DemoConfig } from "../types/config.js";

type StepBase = {
  /** Slash-separated, matched by `--only` globs. */
  id: string;
  /** Printed as an INFO heading before the step runs. */
  label?: string;
};

export type ProvisionStep = StepBase &
  (
    | { kind: "apply"; file: string }
    | { kind: "apply-template"; file: string }
    | { kind: "expose"; resource: string; selector: string }
    | { kind: "delay"; ms: number }
    | { kind: "describe-pipeline"; pipeline: string }
    | { kind: "webhook-url"; selector: string }
  );

export function pipelineSteps(config: DemoConfig): ProvisionStep[] {
  return [
    { id: "pipeline/apply-manifest-task", label: "Apply pipeline tasks", kind: "apply", file: "01_pipeline/01_apply_manifest_task.yaml" },
    { id: "pipeline/update-deployment-task", kind: "apply", file: "01_pipeline/02_update_deployment_task.yaml" },
    { id: "pipeline/resources", label: "Applying resources", kind: "apply-template", file: "01_pipeline/03_resources.yaml" },
    { id: "pipeline/pipeline", label: "Applying pipeline", kind: "apply", file: "01_pipeline/04_pipeline.yaml" },
    { id: "pipeline/describe", kind: "describe-pipeline", pipeline: config.pipeline },
  ];
}

export function triggerSteps(config: DemoConfig): ProvisionStep[] {
  const { event_listener_selector: selector } = config.triggers;
  return [
    { id: "triggers/binding", label: "Setup Triggers", kind: "apply", file: "03_triggers/01_binding.yaml" },
    { id: "triggers/template", kind: "apply-template", file: "03_triggers/02_template.yaml" },
    { id: "triggers/event-listener", label: "Setup Event Listener", kind: "apply", file: "03_triggers/03_event_listener.yaml" },
    // Service and route creation is asynchronous on the cluster side.
    { id: "triggers/wait-service", kind: "delay", ms: config.triggers.service_settle_ms },
    { id: "triggers/expose", label: "Expose event listener", kind: "expose", resource: "svc", selector },
    { id: "triggers/wait-route", kind: "delay", ms: config.triggers.route_settle_ms },
    { id: "triggers/webhook-url", kind: "webhook-url", selector },
  ];
}
