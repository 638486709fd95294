import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  EXIT_MATCHING_ERROR,
  EXIT_OK,
  EXIT_USAGE,
  FIND_MATCHES_USAGE,
  formatMatches,
  runFindMatchesCommand,
} from "../../packages/core/src/cli/find-matches-command";
import type { StructuredLogEvent } from "../../packages/core/src/observability/logger";
import { clearRecordedMetrics, getRecordedMetrics } from "../../packages/core/src/observability/metrics";
import { captureLogs, releaseLogs } from "../helpers/captured-logs";

const USERS_FIXTURE = fileURLToPath(new URL("../fixtures/users.csv", import.meta.url));
const MALFORMED_FIXTURE = fileURLToPath(new URL("../fixtures/users-malformed.csv", import.meta.url));

function run(argv: string[]) {
  const lines: string[] = [];
  const exitCode = runFindMatchesCommand(argv, {
    env: {},
    write: (line) => lines.push(line),
  });
  return { exitCode, lines };
}

describe("find-matches command", () => {
  let logs: StructuredLogEvent[];

  beforeEach(() => {
    clearRecordedMetrics();
    logs = captureLogs();
  });

  afterEach(() => {
    releaseLogs();
  });

  it("prints the top N matches for a user", () => {
    const { exitCode, lines } = run(["2", "--users", USERS_FIXTURE, "--top", "2"]);

    expect(exitCode).toBe(EXIT_OK);
    expect(lines).toEqual([
      "Top 2 matches for Ben (#2):",
      "1. Eli (#5) score 95",
      "2. Chen (#3) score 30",
    ]);

    const ranked = logs.find((event) => event.event === "matching.ranked");
    expect(ranked?.payload).toEqual({ candidate_count: 4, result_count: 2, top_score: 95 });
    expect(getRecordedMetrics().map((metric) => metric.metric)).toEqual([
      "dataset.rows.loaded",
      "matching.query.latency",
      "matching.candidates.ranked",
    ]);
  });

  it("reads the users path from the environment when no flag is given", () => {
    const lines: string[] = [];
    const loadProfiles = vi.fn(() => []);
    const exitCode = runFindMatchesCommand(["1"], {
      env: { MATCH_TOP_N: "1", USERS_CSV_PATH: "custom/users.csv" },
      write: (line) => lines.push(line),
      loadProfiles,
    });

    expect(exitCode).toBe(EXIT_MATCHING_ERROR);
    expect(loadProfiles).toHaveBeenCalledWith("custom/users.csv", { roles: ["traveler", "host"] });
    expect(lines).toEqual(["Error: User 1 not found."]);
  });

  it("reports an unknown user with exit code 1", () => {
    const { exitCode, lines } = run(["99", "--users", USERS_FIXTURE]);

    expect(exitCode).toBe(EXIT_MATCHING_ERROR);
    expect(lines).toEqual(["Error: User 99 not found."]);
    const warning = logs.find((event) => event.event === "matching.user_not_found");
    expect(warning?.level).toBe("warn");
  });

  it("reports a malformed dataset with exit code 1", () => {
    const { exitCode, lines } = run(["1", "--users", MALFORMED_FIXTURE]);

    expect(exitCode).toBe(EXIT_MATCHING_ERROR);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^Error: Malformed list in column 'interests' at row 2 of .*: Missing closing '\]'$/);
  });

  it("reports invalid configuration as an error line instead of crashing", () => {
    const lines: string[] = [];
    const exitCode = runFindMatchesCommand(["2", "--users", USERS_FIXTURE], {
      env: { MATCH_TOP_N: "0" },
      write: (line) => lines.push(line),
    });

    expect(exitCode).toBe(EXIT_MATCHING_ERROR);
    expect(lines).toEqual(["Error: MATCH_TOP_N must be a positive integer."]);
    expect(logs.map((event) => [event.event, event.payload.phase])).toEqual([
      ["system.unhandled_error", "find_matches"],
    ]);
  });

  it("rejects bad arguments with usage and exit code 2", () => {
    expect(run([])).toEqual({
      exitCode: EXIT_USAGE,
      lines: ["Expected exactly one <userId> argument.", FIND_MATCHES_USAGE],
    });
    expect(run(["abc"])).toEqual({
      exitCode: EXIT_USAGE,
      lines: ["userId must be an integer, got 'abc'.", FIND_MATCHES_USAGE],
    });
    expect(run(["1", "--top", "0"])).toEqual({
      exitCode: EXIT_USAGE,
      lines: ["--top must be a positive integer.", FIND_MATCHES_USAGE],
    });
    expect(run(["1", "--verbose"]).exitCode).toBe(EXIT_USAGE);
  });
});

describe("formatMatches", () => {
  it("prints a placeholder line when nothing matched", () => {
    expect(formatMatches("Fay", 6, [])).toEqual(["No matches found for Fay (#6)."]);
  });
});
