/**
 * Configuration errors
 *
 * - CliUsageError: argv could not be parsed (unknown flag, missing value)
 * - ConfigError: options parsed but are missing or invalid; fatal at startup
 */

export class CliUsageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CliUsageError";
  }
}

export class ConfigError extends Error {
  public readonly option: string;

  constructor(option: string, message: string) {
    super(`${option}: ${message}`);
    this.name = "ConfigError";
    this.option = option;
  }
}
