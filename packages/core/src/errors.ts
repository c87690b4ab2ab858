/**
 * Error types shared across appshell packages, plus helpers for turning
 * arbitrary thrown values into something loggable.
 */

/** Base class for contract failures raised by appshell components. */
export class AppShellError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AppShellError";
  }
}

/**
 * A redaction pattern failed to compile. The rule list it was meant for
 * is left unchanged.
 */
export class InvalidPatternError extends AppShellError {
  constructor(
    public readonly pattern: string,
    cause: unknown,
    ruleName?: string,
  ) {
    const where = ruleName ? ` in rule "${ruleName}"` : "";
    super(
      "INVALID_PATTERN",
      `Invalid redaction pattern${where}: ${pattern} (${getErrorMessage(cause)})`,
      { cause },
    );
    this.name = "InvalidPatternError";
  }
}

/** A bounded collection refused an item because it is full. */
export class CapacityExceededError extends AppShellError {
  constructor(
    public readonly limit: number,
    what = "workspace",
  ) {
    super("CAPACITY_EXCEEDED", `Maximum ${what} limit (${limit}) reached.`);
    this.name = "CapacityExceededError";
  }
}

export type NormalizedError = Error & {
  code?: string;
  raw?: unknown;
};

function stringProp(value: unknown, key: "message" | "code"): string | undefined {
  if (value === null || typeof value !== "object" || !(key in value)) return undefined;
  const prop: unknown = Reflect.get(value, key);
  return typeof prop === "string" ? prop : undefined;
}

function describe(value: unknown): string {
  if (typeof value === "string") return value;
  try {
    const json = JSON.stringify(value);
    if (json !== undefined) return json;
  } catch {
    // circular or otherwise unserializable: fall through
  }
  return String(value);
}

/**
 * Coerce any thrown value into an Error. Errors pass through untouched;
 * objects with a string `message` (and optional `code`) keep both.
 */
export function normalizeError(value: unknown): NormalizedError {
  if (value instanceof Error) return value;

  const message = stringProp(value, "message") ?? describe(value);
  const code = stringProp(value, "code");

  const error: NormalizedError = new Error(message || "Unknown error");
  if (code !== undefined) error.code = code;
  error.raw = value;
  return error;
}

export function getErrorMessage(value: unknown): string {
  return normalizeError(value).message;
}

/**
 * Full text form of a failure detail, as shown under a log line: the stack
 * when there is one, else `Name: message`, else the value itself.
 */
export function formatErrorDetail(value: unknown): string {
  if (value instanceof Error) {
    return value.stack ?? `${value.name}: ${value.message}`;
  }
  return describe(value);
}
