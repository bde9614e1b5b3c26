import path from "node:path";
import { fileURLToPath } from "node:url";

/** Package root, resolved from this module so it holds for both src/ and dist/. */
export const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

export const DEFAULT_CONFIG_DIR = path.join(PACKAGE_ROOT, "config");
export const DEFAULT_MANIFESTS_DIR = path.join(PACKAGE_ROOT, "manifests");
