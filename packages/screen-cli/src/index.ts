export type { CliIo, TextSink } from "./cli.js";
export { EXIT_OK, EXIT_SCREENING_FAILED, EXIT_USAGE, HELP_TEXT, runCli } from "./cli.js";
export type { ParsedFlags } from "./args.js";
export { UsageError, listValue, parseFlagArgs, required, single } from "./args.js";
