/**
 * Startup resolution - turns argv + env into either a config to run with
 * or an early exit (help, version, usage error, invalid configuration)
 */

import type { AppConfig, CliCommand } from "@/types";
import { APP_NAME, APP_VERSION, EXIT_CODES } from "@/constants";
import { parseCliArgs, USAGE } from "./cliArgs";
import { loadConfig } from "./loadConfig";
import { CliUsageError, ConfigError } from "./configError";

export type StartupDecision =
  | { kind: "run"; config: AppConfig }
  | {
      kind: "exit";
      code: number;
      /** Text for stdout */
      stdout?: string;
      /** Text for stderr */
      stderr?: string;
      /** Fatal configuration problem to log */
      fatal?: ConfigError;
    };

export function resolveStartup(
  argv: string[],
  env: Record<string, string | undefined>,
): StartupDecision {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv, env);
  } catch (error) {
    if (error instanceof CliUsageError) {
      return {
        kind: "exit",
        code: EXIT_CODES.USAGE,
        stderr: `${error.message}\n\n${USAGE}`,
      };
    }
    throw error;
  }

  switch (command.kind) {
    case "help":
      return { kind: "exit", code: EXIT_CODES.OK, stdout: USAGE };
    case "version":
      return {
        kind: "exit",
        code: EXIT_CODES.VERSION,
        stdout: `${APP_NAME} ${APP_VERSION}\n`,
      };
    case "run":
      try {
        return { kind: "run", config: loadConfig(command.options) };
      } catch (error) {
        if (error instanceof ConfigError) {
          return { kind: "exit", code: EXIT_CODES.FATAL, fatal: error };
        }
        throw error;
      }
  }
}
