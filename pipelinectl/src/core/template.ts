/**
 * Literal placeholder substitution. Every occurrence of each key is replaced,
 * wherever it appears in the text, including inside longer words.
 * Keys are applied in insertion order.
 */
export function substitute(text: string, values: Record<string, string>): string {
  let out = text;
  for (const [placeholder, value] of Object.entries(values)) {
    if (placeholder === "") continue;
    out = out.split(placeholder).join(value);
  }
  return out;
}

/** The tutorial's manifests hard-code their namespace; retarget them. */
export function retargetNamespace(text: string, token: string, namespace: string): string {
  return substitute(text, { [token]: namespace });
}
