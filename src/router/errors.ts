export type ErrorName =
  | "NotAuthenticated"
  | "PermissionDenied"
  | "AccessKeyNotAccepted"
  | "AccessTokenNotAccepted"
  | "InvalidArgument"
  | "NotFound"
  | "DuplicateRegistration"
  | "InvalidConfiguration"
  | "PluginTimeout"
  | "PluginProtocolViolation"
  | "ServiceUnavailable"
  | "PluginError"
  | "UnexpectedError";

export const ERROR_CODES: Record<ErrorName, number> = {
  NotAuthenticated: 101,
  PermissionDenied: 102,
  AccessKeyNotAccepted: 103,
  AccessTokenNotAccepted: 104,
  InvalidArgument: 108,
  NotFound: 110,
  DuplicateRegistration: 111,
  InvalidConfiguration: 112,
  PluginTimeout: 119,
  PluginProtocolViolation: 120,
  ServiceUnavailable: 121,
  PluginError: 122,
  UnexpectedError: 10000,
};

const HTTP_STATUS: Record<ErrorName, number> = {
  NotAuthenticated: 401,
  PermissionDenied: 403,
  AccessKeyNotAccepted: 401,
  AccessTokenNotAccepted: 401,
  InvalidArgument: 400,
  NotFound: 404,
  DuplicateRegistration: 500,
  InvalidConfiguration: 500,
  PluginTimeout: 503,
  PluginProtocolViolation: 500,
  ServiceUnavailable: 503,
  PluginError: 400,
  UnexpectedError: 500,
};

export type ErrorPayload = {
  code: number;
  name: string;
  message: string;
  info?: Record<string, unknown>;
};

/**
 * Structured, caller-visible failure. Everything the dispatch core returns to
 * the HTTP layer is one of these.
 */
export class ActionError extends Error {
  readonly code: number;
  readonly status: number;

  constructor(
    readonly errorName: ErrorName | string,
    message: string,
    readonly info?: Record<string, unknown>,
    options: { code?: number; status?: number } = {}
  ) {
    super(message);
    this.name = "ActionError";
    const known = isErrorName(errorName) ? errorName : null;
    this.code = options.code ?? (known ? ERROR_CODES[known] : ERROR_CODES.PluginError);
    this.status = options.status ?? (known ? HTTP_STATUS[known] : HTTP_STATUS.PluginError);
  }

  toPayload(): ErrorPayload {
    return {
      code: this.code,
      name: this.errorName,
      message: this.message,
      ...(this.info ? { info: this.info } : {}),
    };
  }
}

export function isErrorName(value: string): value is ErrorName {
  return Object.prototype.hasOwnProperty.call(ERROR_CODES, value);
}

export class ConfigurationError extends ActionError {
  constructor(message: string, info?: Record<string, unknown>) {
    super("InvalidConfiguration", message, info);
    this.name = "ConfigurationError";
  }
}

export class DuplicateRegistrationError extends ActionError {
  constructor(kind: string, key: string) {
    super("DuplicateRegistration", `${kind} "${key}" is already registered`, { kind, key });
    this.name = "DuplicateRegistrationError";
  }
}

export class UnknownActionError extends ActionError {
  constructor(action: string) {
    super("NotFound", `Unknown action "${action}"`, { action });
    this.name = "UnknownActionError";
  }
}

export class InvalidArgumentError extends ActionError {
  constructor(message: string, info?: Record<string, unknown>) {
    super("InvalidArgument", message, info);
    this.name = "InvalidArgumentError";
  }
}

export class PluginTimeoutError extends ActionError {
  constructor(plugin: string, name: string, timeoutMs: number) {
    super("PluginTimeout", `plugin ${plugin} did not answer ${name} within ${timeoutMs}ms`, { plugin, name, timeoutMs });
    this.name = "PluginTimeoutError";
  }
}

export class PluginProtocolError extends ActionError {
  constructor(plugin: string, message: string) {
    super("PluginProtocolViolation", `plugin ${plugin}: ${message}`, { plugin });
    this.name = "PluginProtocolError";
  }
}

export class PluginUnavailableError extends ActionError {
  constructor(plugin: string, reason: string) {
    super("ServiceUnavailable", `plugin ${plugin} is unavailable: ${reason}`, { plugin, reason });
    this.name = "PluginUnavailableError";
  }
}

/** An `error` reply from a plugin, passed through with the plugin's own code. */
export class PluginCallError extends ActionError {
  constructor(
    readonly plugin: string,
    data: { code?: unknown; name?: unknown; message?: unknown; info?: unknown }
  ) {
    const name = typeof data.name === "string" && data.name ? data.name : "PluginError";
    const message = typeof data.message === "string" ? data.message : "plugin returned an error";
    const info = isPlainObject(data.info) ? data.info : undefined;
    const code = typeof data.code === "number" && Number.isInteger(data.code) ? data.code : undefined;
    super(name, message, info, { code });
    this.name = "PluginCallError";
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toActionError(error: unknown): ActionError {
  if (error instanceof ActionError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ActionError("UnexpectedError", message);
}
