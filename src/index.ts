/**
 * Programmatic API for dotwrap.
 */

export { buildProgram, type CliDeps, defaultConfigPath, runCli, VERSION } from "./program";
export { runInstall, aliasSetArgs } from "./commands/install";
export { runUninstall, aliasDeleteArgs } from "./commands/uninstall";
export { runDoctor, filterManagedLines } from "./commands/doctor";
export type { ApplyOptions, CommandContext } from "./commands/common";
export {
  CONFIG_ENV_VAR,
  CONFIG_FILE_NAME,
  loadConfigDocument,
  resolveConfigPath,
} from "./config/discovery";
export { buildAliasTable, collapseWhitespace, sortedAliasNames } from "./config/schema";
export type { AliasTable, ConfigSource } from "./config/types";
export {
  ALIAS_PREFIX,
  DEFAULT_PROVIDER,
  PROVIDERS,
  type ProviderId,
} from "./provider/registry";
export {
  createToolRunner,
  type ExecFn,
  execaExec,
  type RunOptions,
  ToolCommandError,
  type ToolResult,
  type ToolRunner,
} from "./tool/runner";
export {
  DotwrapError,
  EnvironmentError,
  ExitCode,
  UsageError,
} from "./util/errors";
export { findExecutable } from "./util/path";
export { setVerbose } from "./util/logger";
