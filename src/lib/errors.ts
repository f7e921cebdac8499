import { ZodError } from "zod";

/**
 * Classified errors for the ETL stages.
 *
 * Input errors are recoverable: the stage logs them and moves on.
 * Config and fatal errors stop the CLI that raised them.
 */

export type ErrorCategory = "input" | "mapping" | "config" | "network" | "fatal";

export class PipelineError extends Error {
  readonly category: ErrorCategory;
  readonly isFatal: boolean;

  constructor(message: string, category: ErrorCategory, isFatal: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.category = category;
    this.isFatal = isFatal;
  }
}

/** A batch file or CSV that cannot be read or parsed. */
export class InputError extends PipelineError {
  readonly file: string;
  readonly reason: string;

  constructor(file: string, reason: string, options?: { cause?: unknown }) {
    super(`${file}: ${reason}`, "input", false, options);
    this.name = "InputError";
    this.file = file;
    this.reason = reason;
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "config", true, options);
    this.name = "ConfigError";
  }

  /** One line per failing path, e.g. `targets.fiverr.base_url: Invalid url` */
  static fromZod(source: string, error: ZodError): ConfigError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    return new ConfigError(`Invalid ${source}:\n  ${issues.join("\n  ")}`, { cause: error });
  }
}

export class FetchError extends PipelineError {
  readonly url: string;
  /** HTTP status, 0 when no response was received */
  readonly status: number;
  readonly attempts: number;

  constructor(url: string, message: string, status: number, attempts: number, options?: { cause?: unknown }) {
    super(message, "network", false, options);
    this.name = "FetchError";
    this.url = url;
    this.status = status;
    this.attempts = attempts;
  }
}

export class FatalError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "fatal", true, options);
    this.name = "FatalError";
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Shared `main().catch(...)` handler for the CLIs. */
export function exitWithError(error: unknown): never {
  if (isPipelineError(error)) {
    console.error(`Error: ${error.message}`);
  } else if (error instanceof Error) {
    console.error(error.stack ?? error.message);
  } else {
    console.error(String(error));
  }
  process.exit(1);
}
