export { parseCliArgs, USAGE } from "./cliArgs";
export { loadConfig } from "./loadConfig";
export { CliUsageError, ConfigError } from "./configError";
export { resolveStartup } from "./startup";
export type { StartupDecision } from "./startup";
