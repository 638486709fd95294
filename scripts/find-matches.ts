/**
 * Prints the top-ranked matches for one user of the users dataset.
 *
 *   npm run find-matches -- 2 --users data/users.csv --top 3
 */

import { runFindMatchesCommand } from "../packages/core/src/cli/find-matches-command";
import { resolveSentryConfigFromEnv } from "../packages/core/src/config/runtime-config";
import { logEvent } from "../packages/core/src/observability/logger";
import { flushSentry, installNodeSentryBridge } from "./lib/sentry";

async function run(): Promise<number> {
  try {
    installNodeSentryBridge(resolveSentryConfigFromEnv());
    return runFindMatchesCommand(process.argv.slice(2));
  } finally {
    await flushSentry();
  }
}

run()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch(async (err: unknown) => {
    logEvent({
      event: "system.unhandled_error",
      level: "fatal",
      payload: {
        phase: "find_matches_script",
        error_name: err instanceof Error ? err.name : "UnknownError",
        error_message: err instanceof Error ? err.message : String(err),
      },
    });
    await flushSentry();
    process.exitCode = 1;
  });
