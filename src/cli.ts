#!/usr/bin/env node
/**
 * dotwrap — GitHub CLI alias overlay
 *
 * Usage:
 *   dotwrap install [provider]     Set every alias from aliases.toml
 *   dotwrap uninstall [provider]   Delete every alias from aliases.toml
 *   dotwrap doctor [provider]      Show installed dotwrap aliases
 */

import { config } from "dotenv";
import { runCli } from "./program";
import { errorMessage, ExitCode, isBrokenPipe } from "./util/errors";
import { error as logError } from "./util/logger";

// Load environment variables from .env.local and .env
config({ path: ".env.local", quiet: true });
config({ path: ".env", quiet: true });

// A reader that goes away early (`dotwrap doctor | head`) is not a failure.
process.stdout.on("error", err => {
  if (isBrokenPipe(err)) {
    process.exit(ExitCode.Ok);
  }
  logError(errorMessage(err));
  process.exit(ExitCode.Environment);
});

runCli(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  err => {
    logError(errorMessage(err));
    process.exitCode = ExitCode.Environment;
  },
);
