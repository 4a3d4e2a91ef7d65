/**
 * Errors raised while resolving hosts.
 *
 * Every failure is fatal for the whole evaluation: callers get one
 * ConfigurationError naming the offending setting, path or class.
 */

export type ConfigurationErrorCode =
  | "HOSTS_DIR_NOT_FOUND"
  | "DUPLICATE_HOST"
  | "MISSING_PROVIDER"
  | "INVALID_CONFIG"
  | "LOAD_FAILED";

export class ConfigurationError extends Error {
  readonly code: ConfigurationErrorCode;
  /** The setting, path or class the error is about */
  readonly subject: string;

  constructor(
    message: string,
    options: { code: ConfigurationErrorCode; subject: string; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = "ConfigurationError";
    this.code = options.code;
    this.subject = options.subject;
  }
}

export function isConfigurationError(err: unknown): err is ConfigurationError {
  return err instanceof ConfigurationError;
}
