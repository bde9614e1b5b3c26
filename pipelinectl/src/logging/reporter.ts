export type OutputFormat = "human" | "jsonl";

export type Sink = { write: (chunk: string) => unknown };

type ReportLevel = "info" | "error";

export type ReportEntry = {
  level: ReportLevel;
  code: string;
  message: string;
  [extra: string]: unknown;
};

/**
 * Everything the tool prints goes through a Reporter.
 *
 * human: `INFO:` headings on stdout after a blank line, `ERROR:` lines on
 * stderr, executed commands echoed as typed.
 * jsonl: one JSON object per line on the same streams.
 */
export interface Reporter {
  readonly format: OutputFormat;
  info(message: string, extra?: Record<string, unknown>): void;
  error(code: string, message: string, extra?: Record<string, unknown>): void;
  /** Echo of an external command about to run. */
  command(commandLine: string): void;
  /** Plain output: child process stdout, banners, URLs. */
  print(text: string, code?: string): void;
  /** Progress detail for machine consumers; jsonl only. */
  trace(code: string, message: string, extra?: Record<string, unknown>): void;
}

export function createReporter(format: OutputFormat, out: Sink, err: Sink): Reporter {
  const jsonl = (sink: Sink, entry: ReportEntry) => {
    sink.write(JSON.stringify(entry) + "\n");
  };

  return {
    format,
    info(message, extra) {
      if (format === "jsonl") jsonl(out, { level: "info", code: "INFO", message, ...extra });
      else out.write(`\nINFO: ${message}\n`);
    },
    error(code, message, extra) {
      if (format === "jsonl") jsonl(err, { level: "error", code, message, ...extra });
      else err.write(`ERROR: ${message}\n`);
    },
    command(commandLine) {
      if (format === "jsonl") jsonl(out, { level: "info", code: "EXEC", message: commandLine });
      else out.write(`${commandLine}\n`);
    },
    print(text, code = "OUTPUT") {
      if (text === "") return;
      if (format === "jsonl") jsonl(out, { level: "info", code, message: text });
      else out.write(text.endsWith("\n") ? text : `${text}\n`);
    },
    trace(code, message, extra) {
      if (format === "jsonl") jsonl(out, { level: "info", code, message, ...extra });
    },
  };
}
