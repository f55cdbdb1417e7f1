/**
 * Purpose: Process entrypoint for the tier migrator CLI.
 * Persists: None directly.
 * Security Risks: None beyond runMigratorCli.
 */

import { logEvent } from "@tiermover/logger";

import { runMigratorCli } from "./cli";
import { describeError, isDebugMode } from "./errors";

runMigratorCli()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logEvent({
      level: "error",
      op: "migrate.failed",
      event: "migration.crashed",
      ...describeError(error, isDebugMode()),
    });
    process.exitCode = 1;
  });
