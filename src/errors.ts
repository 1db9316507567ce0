//--------------------------------------------------------------
// FILE: src/errors.ts
// Error taxonomy shared by the loop, the model client and memory
//--------------------------------------------------------------

export type CompanionErrorCode =
  | "schema_validation"
  | "transport"
  | "lock_timeout"
  | "empty_message"
  | "config";

export class CompanionError extends Error {
  readonly code: CompanionErrorCode;

  constructor(code: CompanionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The backend answered, but not with the structure we asked for. */
export class SchemaValidationError extends CompanionError {
  readonly schema: string;
  readonly issues: string[];

  constructor(schema: string, issues: string[], options?: { cause?: unknown }) {
    super(
      "schema_validation",
      `${schema} failed validation: ${issues.join("; ") || "unknown issue"}`,
      options
    );
    this.schema = schema;
    this.issues = issues;
  }
}

/** Network failure, timeout, non-2xx status or an empty completion. */
export class TransportError extends CompanionError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super("transport", message, options);
    this.status = status;
  }
}

export class LockTimeoutError extends CompanionError {
  readonly subjectId: string;
  readonly timeoutMs: number;

  constructor(subjectId: string, timeoutMs: number) {
    super("lock_timeout", `Timed out after ${timeoutMs}ms waiting for memory lock of ${subjectId}`);
    this.subjectId = subjectId;
    this.timeoutMs = timeoutMs;
  }
}

export class EmptyMessageError extends CompanionError {
  constructor() {
    super("empty_message", "Cannot respond to an empty or non-text message");
  }
}

export class ConfigError extends CompanionError {
  constructor(message: string) {
    super("config", message);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
