import { Command, CommanderError, Option } from "commander";
import { OPERATIONS, type Operation } from "./commands/registry.js";
import { EXIT } from "./commands/exit-codes.js";
import { createContext, defaultRuntime, type GlobalOptions, type Runtime } from "./context.js";
import { PipelinectlError } from "./errors.js";
import { createReporter, type Reporter } from "./logging/reporter.js";

export const VERSION = "0.1.0";

function reportFailure(reporter: Reporter, err: unknown): number {
  if (err instanceof PipelinectlError) {
    reporter.error(err.code, err.message);
    return err.exitCode;
  }
  reporter.error("INTERNAL", err instanceof Error ? err.message : String(err));
  return EXIT.FAILURE;
}

async function execute(op: Operation, options: GlobalOptions, arg: string | undefined, runtime: Runtime): Promise<number> {
  const reporter = createReporter(options.format, runtime.stdout, runtime.stderr);
  try {
    const ctx = createContext(options, runtime, reporter);
    return await op.handler(ctx, arg);
  } catch (err) {
    return reportFailure(reporter, err);
  }
}

/**
 * One subcommand per registered operation. Commander errors are thrown
 * (exitOverride) rather than exiting, so `main` can return the code.
 */
export function buildProgram(runtime: Runtime, onExit: (code: number) => void): Command {
  const program = new Command();

  // Inherited by subcommands, so configured before any are added.
  program
    .name("pipelinectl")
    .description("Sets up and runs the OpenShift Pipelines tutorial on the current cluster")
    .version(VERSION)
    .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"))
    .option("--config <path>", "Path to config directory")
    .option("--env <name>", "Config overlay merged over base.yaml (e.g. ci)")
    .option("--dry-run", "Print provisioning steps and pipeline starts without running them")
    .option("--only <glob>", "Run only provisioning steps whose id matches the glob")
    .configureOutput({
      writeOut: (str) => runtime.stdout.write(str),
      writeErr: (str) => runtime.stderr.write(str),
    })
    .showHelpAfterError()
    .exitOverride();

  // Reached only when no subcommand matched: global options alone mean help.
  program.action(() => {
    const [verb] = program.args;
    if (verb !== undefined) program.error(`error: unknown command '${verb}'`, { code: "commander.unknownCommand" });
    program.help();
  });

  for (const op of OPERATIONS) {
    const cmd = program.command(op.name).description(op.description);
    if (op.argument) cmd.argument(op.argument.syntax, op.argument.description);
    cmd.action(async (first: unknown) => {
      const arg = op.argument && typeof first === "string" ? first : undefined;
      onExit(await execute(op, program.opts<GlobalOptions>(), arg, runtime));
    });
  }

  return program;
}

/**
 * Runs one verb and resolves with the process exit code. No verb, with or
 * without global options, means `help` (exit 0); an unknown verb prints the usage on stderr and exits 1.
 */
export async function main(argv: string[], overrides: Partial<Runtime> = {}): Promise<number> {
  const runtime: Runtime = { ...defaultRuntime(), ...overrides };
  let exitCode: number = EXIT.SUCCESS;
  const program = buildProgram(runtime, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return exitCode;
}
