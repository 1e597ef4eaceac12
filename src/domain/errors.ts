export type FetchErrorCategory = "network" | "timeout" | "http_status" | "malformed_response";
export type StateCorruptionCategory = "unreadable" | "invalid_json" | "invalid_shape";

const MAX_SIGNATURE_MESSAGE_LENGTH = 120;

function conciseMessage(message: string): string {
  const singleLine = message.replace(/\s+/g, " ").trim();
  if (singleLine.length <= MAX_SIGNATURE_MESSAGE_LENGTH) return singleLine;
  return `${singleLine.slice(0, MAX_SIGNATURE_MESSAGE_LENGTH - 3)}...`;
}

/**
 * Base class for every failure a monitoring cycle knows how to record.
 *
 * The signature identifies "the same error" for owner-alert throttling, so it
 * must not contain timestamps or other per-run noise.
 */
export abstract class MonitorError extends Error {
  readonly category: string;

  protected constructor(name: string, category: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = name;
    this.category = category;
  }

  get signature(): string {
    return `${this.name}:${this.category}: ${conciseMessage(this.message)}`;
  }
}

export class FetchError extends MonitorError {
  declare readonly category: FetchErrorCategory;
  readonly status?: number;

  constructor(category: FetchErrorCategory, message: string, options?: { cause?: unknown; status?: number }) {
    super("FetchError", category, message, options);
    this.status = options?.status;
  }
}

export class ExtractionError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ExtractionError", "parse", message, options);
  }
}

export class StateCorruptionError extends MonitorError {
  declare readonly category: StateCorruptionCategory;

  constructor(category: StateCorruptionCategory, message: string, options?: { cause?: unknown }) {
    super("StateCorruptionError", category, message, options);
  }
}

export class NotificationError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("NotificationError", "delivery", message, options);
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export interface RecordedError {
  name: string;
  category: string;
  message: string;
  signature: string;
}

export function toRecordedError(error: unknown): RecordedError {
  if (error instanceof MonitorError) {
    return {
      name: error.name,
      category: error.category,
      message: `${error.name}: ${error.message}`,
      signature: error.signature,
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  return {
    name: "UnexpectedError",
    category: "unknown",
    message: `UnexpectedError: ${message}`,
    signature: `UnexpectedError:unknown: ${conciseMessage(message)}`,
  };
}
