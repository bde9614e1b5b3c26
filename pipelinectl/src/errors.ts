import { EXIT } from "./commands/exit-codes.js";

export type ErrorCode =
  | "TOOL_MISSING"
  | "COMMAND_FAILED"
  | "STEP_FAILED"
  | "READINESS_TIMEOUT"
  | "RESOURCE_NOT_FOUND"
  | "CONFIG_INVALID";

/** Base error: every fatal condition carries a stable code and the exit code to leave with. */
export class PipelinectlError extends Error {
  readonly code: ErrorCode;
  readonly exitCode: number;

  constructor(code: ErrorCode, message: string, exitCode: number = EXIT.FAILURE) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
  }
}

export class ToolMissingError extends PipelinectlError {
  constructor(readonly tool: string) {
    super("TOOL_MISSING", `no ${tool} binary found`);
  }
}

export class CommandFailedError extends PipelinectlError {
  constructor(
    readonly commandLine: string,
    readonly childExitCode: number,
    readonly stderr: string,
  ) {
    const detail = stderr.trim();
    super(
      "COMMAND_FAILED",
      `${commandLine} exited with ${childExitCode}${detail ? `: ${detail}` : ""}`,
      childExitCode > 0 ? childExitCode : EXIT.FAILURE,
    );
  }
}

export class StepFailedError extends PipelinectlError {
  constructor(
    readonly stepId: string,
    cause: PipelinectlError,
  ) {
    super("STEP_FAILED", `step ${stepId} failed: ${cause.message}`, cause.exitCode);
    this.cause = cause;
  }
}

export class ReadinessTimeoutError extends PipelinectlError {
  constructor(resource: string, target: string, observed: string, attempts: number) {
    super(
      "READINESS_TIMEOUT",
      `timed out waiting for ${resource} to report ${target} (last observed "${observed}" after ${attempts} attempts)`,
    );
  }
}

export class ResourceNotFoundError extends PipelinectlError {
  constructor(kind: string, selector: string, namespace: string) {
    super("RESOURCE_NOT_FOUND", `no ${kind} matching ${selector} in ${namespace}`);
  }
}

export class ConfigInvalidError extends PipelinectlError {
  constructor(detail: string) {
    super("CONFIG_INVALID", `Config invalid: ${detail}`);
  }
}
