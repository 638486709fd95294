/**
 * Interactive swipe session over the activity deck for one user.
 *
 *   npm run swipe-session -- 2 --activities data/activities.csv
 */

import { createInterface } from "node:readline";
import { runSwipeSessionCommand, type Prompt } from "../packages/core/src/cli/swipe-session-command";
import { resolveSentryConfigFromEnv } from "../packages/core/src/config/runtime-config";
import { logEvent } from "../packages/core/src/observability/logger";
import { flushSentry, installNodeSentryBridge } from "./lib/sentry";

async function run(): Promise<number> {
  const lines = createInterface({ input: process.stdin, crlfDelay: Infinity });
  const answers = lines[Symbol.asyncIterator]();
  const prompt: Prompt = async (question) => {
    process.stdout.write(question);
    const next = await answers.next();
    return next.done ? null : next.value;
  };

  try {
    installNodeSentryBridge(resolveSentryConfigFromEnv());
    return await runSwipeSessionCommand(process.argv.slice(2), { prompt });
  } finally {
    lines.close();
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
        phase: "swipe_session_script",
        error_name: err instanceof Error ? err.name : "UnknownError",
        error_message: err instanceof Error ? err.message : String(err),
      },
    });
    await flushSentry();
    process.exitCode = 1;
  });
