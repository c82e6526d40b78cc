// src/errors.ts
export type MonitorErrorCode =
  | "CONFIG_INVALID"
  | "NETWORK"
  | "AUTH"
  | "PARSE"
  | "SEND";

/** Base for every failure the monitor raises on purpose. */
export class MonitorError extends Error {
  constructor(public code: MonitorErrorCode, message: string) {
    super(message);
    this.name = "MonitorError";
  }
}

/** Missing or malformed environment configuration. */
export class ConfigError extends MonitorError {
  constructor(message: string, public variables: string[] = []) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}

/** Provider unreachable, timed out, or answered with a non-2xx status. */
export class NetworkError extends MonitorError {
  constructor(message: string, public url?: string, public status?: number) {
    super("NETWORK", message);
    this.name = "NetworkError";
  }
}

/** Provider rejected the API key (401/403). */
export class AuthError extends MonitorError {
  constructor(message: string, public url?: string, public status?: number) {
    super("AUTH", message);
    this.name = "AuthError";
  }
}

/** A single calendar entry could not be read. Recovered per record. */
export class ParseError extends MonitorError {
  constructor(message: string, public field?: string) {
    super("PARSE", message);
    this.name = "ParseError";
  }
}

/** SMTP delivery failed. */
export class SendError extends MonitorError {
  constructor(message: string, public responseCode?: number) {
    super("SEND", message);
    this.name = "SendError";
  }
}
