import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { DEFAULT_CONFIG_DIR } from "../paths.js";

export type RawConfig = Record<string, unknown>;

function isPlainObject(val: unknown): val is Record<string, unknown> {
  return val !== null && typeof val === "object" && !Array.isArray(val);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): RawConfig {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  return isPlainObject(parsed) ? parsed : {};
}

type EnvBinding = {
  variable: string;
  apply: (config: RawConfig, value: string) => void;
};

function setPoll(key: "interval_ms" | "timeout_ms") {
  return (config: RawConfig, value: string) => {
    const poll = isPlainObject(config.poll) ? { ...config.poll } : {};
    // Left as a string when not numeric so the schema check reports it.
    const n = Number(value);
    poll[key] = value.trim() !== "" && Number.isFinite(n) ? n : value;
    config.poll = poll;
  };
}

/** Later bindings win: PIPELINECTL_NAMESPACE beats NAMESPACE. */
const ENV_BINDINGS: EnvBinding[] = [
  { variable: "NAMESPACE", apply: (c, v) => { c.namespace = v; } },
  { variable: "PIPELINECTL_NAMESPACE", apply: (c, v) => { c.namespace = v; } },
  { variable: "PIPELINECTL_POLL_INTERVAL_MS", apply: setPoll("interval_ms") },
  { variable: "PIPELINECTL_POLL_TIMEOUT_MS", apply: setPoll("timeout_ms") },
];

function applyEnvOverrides(config: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  const result = { ...config };
  for (const binding of ENV_BINDINGS) {
    const value = env[binding.variable];
    if (value === undefined || value === "") continue;
    binding.apply(result, value);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← environment variables.
 * The result is unvalidated; pass it through `validateConfig`.
 *
 * @param envName - Optional overlay name (e.g. "ci"), read from `{configDir}/{envName}.yaml`.
 */
export function loadConfig(
  envName?: string,
  configDir: string = DEFAULT_CONFIG_DIR,
  env: NodeJS.ProcessEnv = process.env,
): RawConfig {
  let merged = loadYaml(path.join(configDir, "base.yaml"));

  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(configDir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged, env);
}
