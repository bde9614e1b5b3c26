import { execFile, spawn } from "node:child_process";

export type ExecResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

/** Exit code reported when the binary itself cannot be started. */
export const EXIT_NOT_FOUND = 127;

/**
 * Process boundary for `oc` and `tkn`. Tests substitute a scripted runner.
 */
export interface CommandRunner {
  /** Run to completion with captured output; `input` is written to stdin. */
  capture(command: string, args: string[], opts?: { input?: string }): Promise<ExecResult>;
  /** Run with inherited stdio (rollout waits, pipeline logs); resolves with the exit code. */
  stream(command: string, args: string[]): Promise<number>;
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(" ");
}

function exitCodeOf(err: unknown): number {
  if (err && typeof err === "object" && "code" in err) {
    const code = err.code;
    if (typeof code === "number") return code;
    if (code === "ENOENT") return EXIT_NOT_FOUND;
  }
  return 1;
}

export class ProcessRunner implements CommandRunner {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  capture(command: string, args: string[], opts: { input?: string } = {}): Promise<ExecResult> {
    return new Promise((resolve) => {
      const child = execFile(
        command,
        args,
        {
          env: this.env,
          maxBuffer: 50 * 1024 * 1024, // 50MB
          shell: false,
        },
        (err, stdout, stderr) => {
          resolve({
            exitCode: err ? exitCodeOf(err) : 0,
            stdout,
            stderr: err && !stderr ? err.message : stderr,
          });
        },
      );
      if (opts.input !== undefined && child.stdin) {
        // EPIPE when the child exits early; the exit code reports the failure.
        child.stdin.on("error", () => undefined);
        child.stdin.end(opts.input);
      }
    });
  }

  stream(command: string, args: string[]): Promise<number> {
    return new Promise((resolve) => {
      const child = spawn(command, args, { env: this.env, stdio: "inherit", shell: false });
      child.on("error", (err) => resolve(exitCodeOf(err)));
      child.on("close", (code) => resolve(code ?? 1));
    });
  }
}
