import { loadAjv } from "../schema/ajv.js";
import { ConfigInvalidError } from "../errors.js";
import type { DemoConfig } from "../types/config.js";
import type { RawConfig } from "./loader.js";

const stringMap = { type: "object", additionalProperties: { type: "string" } };
const nonEmpty = { type: "string", minLength: 1 };

const CONFIG_SCHEMA = {
  type: "object",
  required: [
    "schema_version",
    "namespace",
    "template_token",
    "poll",
    "readiness",
    "pipeline",
    "triggers",
    "app_route",
    "invocations",
  ],
  properties: {
    schema_version: nonEmpty,
    // DNS-1123 label, as OpenShift requires for project names.
    namespace: { type: "string", pattern: "^[a-z0-9]([-a-z0-9]{0,61}[a-z0-9])?$" },
    template_token: nonEmpty,
    poll: {
      type: "object",
      required: ["interval_ms", "timeout_ms"],
      properties: {
        interval_ms: { type: "integer", minimum: 1 },
        timeout_ms: { type: "integer", minimum: 0 },
      },
    },
    readiness: {
      type: "array",
      items: {
        type: "object",
        required: ["kind", "name", "field", "target"],
        properties: {
          kind: nonEmpty,
          name: nonEmpty,
          namespace: nonEmpty,
          field: nonEmpty,
          target: nonEmpty,
          rollout: { type: "boolean", default: false },
        },
      },
    },
    pipeline: nonEmpty,
    triggers: {
      type: "object",
      required: ["event_listener_selector", "service_settle_ms", "route_settle_ms"],
      properties: {
        event_listener_selector: nonEmpty,
        service_settle_ms: { type: "integer", minimum: 0 },
        route_settle_ms: { type: "integer", minimum: 0 },
      },
    },
    app_route: nonEmpty,
    invocations: {
      type: "array",
      items: {
        type: "object",
        required: ["name", "title", "resources", "params"],
        properties: {
          name: nonEmpty,
          title: nonEmpty,
          resources: stringMap,
          params: stringMap,
        },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: DemoConfig }
  | { valid: false; errors: string };

/** Validate a loaded config against the config schema. */
export function validateConfig(raw: RawConfig): ConfigValidationResult {
  const ajv = loadAjv();
  const validate = ajv.compile<DemoConfig>(CONFIG_SCHEMA);
  if (validate(raw)) return { valid: true, config: raw };
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}

/** Validate or throw `ConfigInvalidError`. */
export function requireValidConfig(raw: RawConfig): DemoConfig {
  const res = validateConfig(raw);
  if (!res.valid) throw new ConfigInvalidError(res.errors);
  return res.config;
}
