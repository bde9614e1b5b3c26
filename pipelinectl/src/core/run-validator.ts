import type { PipelineRunSummary } from "../types/resource.js";

export const EXPECTED_CONDITION = "SucceededTrue";

export type RunVerdict = {
  name: string;
  observed: string;
  passed: boolean;
};

export type ValidationReport = {
  ok: boolean;
  verdicts: RunVerdict[];
  failed: RunVerdict[];
};

export function classifyRun(run: PipelineRunSummary): RunVerdict {
  const observed = run.condition ? `${run.condition.type}${run.condition.status}` : "";
  return { name: run.name, observed, passed: observed.toLowerCase() === EXPECTED_CONDITION.toLowerCase() };
}

/** All runs must have succeeded. No runs at all passes. */
export function validateRuns(runs: readonly PipelineRunSummary[]): ValidationReport {
  const verdicts = runs.map(classifyRun);
  const failed = verdicts.filter((v) => !v.passed);
  return { ok: failed.length === 0, verdicts, failed };
}

export function failureMessage(verdict: RunVerdict): string {
  return `test ${verdict.name}=${verdict.observed} but should be ${EXPECTED_CONDITION}`;
}
