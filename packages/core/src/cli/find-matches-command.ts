import { parseArgs } from "node:util";
import { findMatches, type MatchResult } from "../compatibility/match-finder";
import { parsePositiveInteger, resolveRuntimeConfig, type EnvSource } from "../config/runtime-config";
import { MatchingError } from "../errors";
import { logEvent } from "../observability/logger";
import { emitMetricBestEffort, timeMetric } from "../observability/metrics";
import { startSentrySpan } from "../observability/sentry";
import { loadUserProfiles } from "../profiles/profile-loader";
import type { RolePair, UserProfile } from "../profiles/types";
import {
  EXIT_OK,
  EXIT_USAGE,
  readUserIdPositional,
  reportMatchingError,
  usageProblem,
  writeStdoutLine,
  type WriteLine,
} from "./command-support";

export { EXIT_MATCHING_ERROR, EXIT_OK, EXIT_USAGE } from "./command-support";

export const FIND_MATCHES_USAGE = "Usage: find-matches <userId> [--users <path>] [--top <n>]";

export type FindMatchesCommandDeps = {
  env?: EnvSource;
  write?: WriteLine;
  loadProfiles?: (path: string, options: { roles: RolePair }) => UserProfile[];
};

type FindMatchesArgs = {
  user_id: number;
  users_path: string | null;
  top: number | null;
};

export function runFindMatchesCommand(
  argv: readonly string[],
  deps: FindMatchesCommandDeps = {},
): number {
  const write = deps.write ?? writeStdoutLine;
  const loadProfiles = deps.loadProfiles ?? loadUserProfiles;

  const args = readArgs(argv);
  if (typeof args === "string") {
    write(args);
    write(FIND_MATCHES_USAGE);
    return EXIT_USAGE;
  }

  try {
    const config = resolveRuntimeConfig(deps.env ?? process.env);
    const profiles = loadProfiles(args.users_path ?? config.usersCsvPath, { roles: config.roles });
    const matches = timeMetric(
      "matching.query.latency",
      { component: "find_matches_command" },
      () => startSentrySpan(
        { name: "matching.find", op: "matching.find", attributes: { candidate_pool: profiles.length } },
        () => findMatches({ user_id: args.user_id, users: profiles, roles: config.roles }),
      ),
    );

    const currentUser = profiles.find((profile) => profile.userId === args.user_id);
    const shown = matches.slice(0, args.top ?? config.topN);
    emitMetricBestEffort({
      metric: "matching.candidates.ranked",
      value: matches.length,
      tags: { component: "find_matches_command", user_type: currentUser?.userType },
    });
    logEvent({
      event: "matching.ranked",
      user_id: args.user_id,
      payload: {
        candidate_count: matches.length,
        result_count: shown.length,
        top_score: shown[0]?.score ?? null,
      },
    });

    for (const line of formatMatches(currentUser?.userName ?? String(args.user_id), args.user_id, shown)) {
      write(line);
    }
    return EXIT_OK;
  } catch (error) {
    if (!(error instanceof MatchingError)) {
      throw error;
    }
    return reportMatchingError(error, { user_id: args.user_id, phase: "find_matches", write });
  }
}

export function formatMatches(
  userName: string,
  userId: number,
  matches: readonly MatchResult[],
): string[] {
  if (matches.length === 0) {
    return [`No matches found for ${userName} (#${userId}).`];
  }
  return [
    `Top ${matches.length} matches for ${userName} (#${userId}):`,
    ...matches.map((match, index) =>
      `${index + 1}. ${match.user_name} (#${match.user_id}) score ${match.score}`
    ),
  ];
}

function readArgs(argv: readonly string[]): FindMatchesArgs | string {
  try {
    const { values, positionals } = parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        users: { type: "string" },
        top: { type: "string" },
      },
    });

    const userId = readUserIdPositional(positionals);
    if (typeof userId === "string") {
      return userId;
    }
    return {
      user_id: userId,
      users_path: values.users?.trim() || null,
      top: parsePositiveInteger(values.top?.trim() ?? null, "--top"),
    };
  } catch (error) {
    return usageProblem(error);
  }
}
