/**
 * Contract violations raised as exceptions. Expected outcomes of a turn
 * (parse failures, missing fields, translation problems) are returned as
 * values instead and never use these classes.
 */

export class ValidationError extends Error {
  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class InvalidTransitionError extends Error {
  constructor(public readonly from: string, public readonly to: string) {
    super(`Cannot move parchi from ${from} to ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export class SessionBusyError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} already has a turn in progress`);
    this.name = "SessionBusyError";
  }
}

export class SessionClosedError extends Error {
  constructor(public readonly sessionId: string, public readonly state: string) {
    super(`Session ${sessionId} is closed (${state})`);
    this.name = "SessionClosedError";
  }
}

export class StorageError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "StorageError";
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}
