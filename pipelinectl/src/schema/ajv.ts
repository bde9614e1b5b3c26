import Ajv2020 from "ajv/dist/2020.js";

export type ValidateFn<T> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  compile: <T>(schema: object) => ValidateFn<T>;
  errorsText: (errors: unknown) => string;
};

let shared: AjvInstance | undefined;

export function loadAjv(): AjvInstance {
  if (shared) return shared;
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  shared = new AjvCtor({ allErrors: true, strict: true, useDefaults: true });
  return shared;
}
