import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";

export function manifestPath(manifestsDir: string, file: string): string {
  return path.resolve(manifestsDir, file);
}

export function readManifest(manifestsDir: string, file: string): string {
  return fs.readFileSync(manifestPath(manifestsDir, file), "utf8");
}

/** `Kind/name` of each document in a multi-document manifest. */
export function summarizeManifest(text: string): string[] {
  const out: string[] = [];
  for (const doc of YAML.parseAllDocuments(text)) {
    if (doc.errors.length > 0) throw doc.errors[0];
    const value: unknown = doc.toJS();
    if (value === null || typeof value !== "object" || Array.isArray(value)) continue;
    const kind = "kind" in value && typeof value.kind === "string" ? value.kind : "?";
    const metadata = "metadata" in value ? value.metadata : undefined;
    const name =
      metadata !== null && typeof metadata === "object" && "name" in metadata && typeof metadata.name === "string"
        ? metadata.name
        : "?";
    out.push(`${kind}/${name}`);
  }
  return out;
}
