/** A cluster object. Cluster-scoped kinds (project, namespace) carry no namespace. */
export type ResourceRef = {
  readonly kind: string;
  readonly name: string;
  readonly namespace?: string;
};

export type ReadinessCondition = ResourceRef & {
  /** JSONPath of the status field, e.g. `{.status.phase}`. */
  readonly field: string;
  readonly target: string;
  /** Wait for `oc rollout status` once the field matches. */
  readonly rollout: boolean;
};

export type PipelineInvocation = {
  pipeline: string;
  resources: Record<string, string>;
  params: Record<string, string>;
  showLog: boolean;
};

export type RunCondition = {
  type: string;
  status: string;
};

export type PipelineRunSummary = {
  name: string;
  condition: RunCondition | null;
};

export function describeRef(ref: ResourceRef): string {
  return ref.namespace ? `${ref.kind}/${ref.name} (${ref.namespace})` : `${ref.kind}/${ref.name}`;
}
