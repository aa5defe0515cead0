export type OutputFormat = "human" | "jsonl";
export type Level = "debug" | "info" | "warn" | "error";

export type Sink = { write(chunk: string): unknown };

/** Where lower layers send warnings; commands point it at their Reporter. */
export type WarningSink = (code: string, message: string, fields?: Record<string, unknown>) => void;

export const ignoreWarnings: WarningSink = () => undefined;

export type ReporterOptions = {
  format: OutputFormat;
  verbose?: boolean;
  stdout?: Sink;
  stderr?: Sink;
};

/**
 * Human lines or one JSON record per line. In jsonl mode every record goes
 * to stdout so it can be piped as a single stream.
 */
export class Reporter {
  readonly format: OutputFormat;
  private readonly verbose: boolean;
  private readonly stdout: Sink;
  private readonly stderr: Sink;

  constructor(opts: ReporterOptions) {
    this.format = opts.format;
    this.verbose = opts.verbose ?? false;
    this.stdout = opts.stdout ?? process.stdout;
    this.stderr = opts.stderr ?? process.stderr;
  }

  debug(code: string, message: string, fields: Record<string, unknown> = {}): void {
    if (this.verbose) this.emit("debug", code, message, fields);
  }

  info(code: string, message: string, fields: Record<string, unknown> = {}): void {
    this.emit("info", code, message, fields);
  }

  warn(code: string, message: string, fields: Record<string, unknown> = {}): void {
    this.emit("warn", code, message, fields);
  }

  error(code: string, message: string, fields: Record<string, unknown> = {}): void {
    this.emit("error", code, message, fields);
  }

  /** Multi-line human text; in jsonl mode a single record carrying `data`. */
  block(code: string, lines: readonly string[], data: Record<string, unknown>): void {
    if (this.format === "jsonl") {
      this.stdout.write(JSON.stringify({ level: "info", code, ...data }) + "\n");
    } else {
      for (const line of lines) this.stdout.write(line + "\n");
    }
  }

  private emit(level: Level, code: string, message: string, fields: Record<string, unknown>): void {
    if (this.format === "jsonl") {
      this.stdout.write(JSON.stringify({ level, code, message, ...fields }) + "\n");
      return;
    }
    switch (level) {
      case "debug":
        this.stderr.write(`debug: ${message}\n`);
        break;
      case "info":
        this.stdout.write(`${message}\n`);
        break;
      case "warn":
        this.stderr.write(`warning: ${message}\n`);
        break;
      case "error":
        this.stderr.write(`error: ${message}\n`);
        if (typeof fields.remediation === "string") this.stderr.write(`  next: ${fields.remediation}\n`);
        break;
    }
  }
}
