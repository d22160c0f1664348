import type { ErrorEnvelope } from "./types.js";

export type StowageErrorCode =
  | "config_invalid"
  | "input_invalid"
  | "file_read_failed"
  | "encode_failed"
  | "parse_failed"
  | "transport_failed"
  | "response_status";

export interface StowageErrorOptions {
  details?: Record<string, unknown>;
  remediation?: string;
  cause?: unknown;
}

export class StowageError extends Error {
  readonly code: StowageErrorCode;
  readonly details?: Record<string, unknown>;
  readonly remediation?: string;

  constructor(code: StowageErrorCode, message: string, options: StowageErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "StowageError";
    this.code = code;
    this.details = options.details;
    this.remediation = options.remediation;
  }

  toEnvelope(): ErrorEnvelope {
    return {
      code: this.code,
      message: this.message,
      ...(this.remediation ? { remediation: this.remediation } : {}),
      ...(this.details ? { details: this.details } : {})
    };
  }
}

export class ConfigError extends StowageError {
  constructor(message: string, options?: StowageErrorOptions) {
    super("config_invalid", message, options);
    this.name = "ConfigError";
  }
}

export class InputError extends StowageError {
  constructor(message: string, options?: StowageErrorOptions) {
    super("input_invalid", message, options);
    this.name = "InputError";
  }
}

export class FileReadError extends StowageError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = isMissingFile(cause) ? "file not found" : "failed to read file";
    super("file_read_failed", `${reason}: ${path}`, { details: { path }, cause });
    this.name = "FileReadError";
    this.path = path;
  }
}

export class EncodeError extends StowageError {
  constructor(message: string, options?: StowageErrorOptions) {
    super("encode_failed", message, options);
    this.name = "EncodeError";
  }
}

export type ParseFailureReason = "truncated" | "misaligned" | "layout";

export class ParseError extends StowageError {
  readonly reason: ParseFailureReason;

  constructor(reason: ParseFailureReason, message: string, details: Record<string, unknown> = {}) {
    super("parse_failed", message, { details: { reason, ...details } });
    this.name = "ParseError";
    this.reason = reason;
  }
}

export class TransportError extends StowageError {
  constructor(message: string, options?: StowageErrorOptions) {
    super("transport_failed", message, options);
    this.name = "TransportError";
  }
}

export class ResponseError extends StowageError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string, details: Record<string, unknown> = {}) {
    super("response_status", `Request failed (${status}): ${body}`, { details: { status, ...details } });
    this.name = "ResponseError";
    this.status = status;
    this.body = body;
  }
}

function isMissingFile(cause: unknown): boolean {
  return typeof cause === "object" && cause !== null && "code" in cause && cause.code === "ENOENT";
}
