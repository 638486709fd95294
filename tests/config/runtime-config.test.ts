import { describe, expect, it } from "vitest";
import {
  normalizeEnvironment,
  resolveRuntimeConfig,
  resolveSentryConfigFromEnv,
  resolveSentryRuntimeConfig,
} from "../../packages/core/src/config/runtime-config";
import { MatchingError } from "../../packages/core/src/errors";

describe("runtime config", () => {
  it("uses defaults for an empty environment", () => {
    expect(resolveRuntimeConfig({})).toEqual({
      environment: "local",
      usersCsvPath: "data/users.csv",
      activitiesCsvPath: "data/activities.csv",
      topN: 5,
      roles: ["traveler", "host"],
      swipeLimit: 20,
      analysisInterval: 10,
      sentry: {
        dsn: null,
        environment: "local",
        release: null,
        enabled: false,
        tracesSampleRate: 0.2,
      },
    });
  });

  it("reads and trims overrides", () => {
    const config = resolveRuntimeConfig({
      APP_ENV: " Prod ",
      USERS_CSV_PATH: " /tmp/users.csv ",
      MATCH_TOP_N: "3",
      MATCH_ROLES: "guest, guide",
      SENTRY_DSN: "https://public@sentry.example/1",
      SENTRY_RELEASE: "",
    });

    expect(config.environment).toBe("production");
    expect(config.usersCsvPath).toBe("/tmp/users.csv");
    expect(config.topN).toBe(3);
    expect(config.roles).toEqual(["guest", "guide"]);
    expect(config.sentry.enabled).toBe(true);
    expect(config.sentry.release).toBeNull();
  });

  it("rejects a non-positive top N and a malformed role pair", () => {
    expect(() => resolveRuntimeConfig({ MATCH_TOP_N: "0" })).toThrow(MatchingError);
    expect(() => resolveRuntimeConfig({ MATCH_TOP_N: "five" })).toThrow(
      "MATCH_TOP_N must be a positive integer.",
    );
    expect(() => resolveRuntimeConfig({ SWIPE_ANALYSIS_INTERVAL: "-2" })).toThrow(
      "SWIPE_ANALYSIS_INTERVAL must be a positive integer.",
    );
    expect(() => resolveRuntimeConfig({ MATCH_ROLES: "host,host" })).toThrow(
      "MATCH_ROLES must name exactly two distinct roles separated by a comma.",
    );
  });

  it("disables Sentry without a DSN or in local environments", () => {
    expect(
      resolveSentryRuntimeConfig({ dsn: "", environment: "staging", release: "v1.2.3" }).enabled,
    ).toBe(false);
    expect(
      resolveSentryRuntimeConfig({ dsn: "https://public@sentry.example/1", environment: "local" }).enabled,
    ).toBe(false);
    expect(
      resolveSentryRuntimeConfig({ dsn: "https://public@sentry.example/1", environment: "staging" }),
    ).toMatchObject({ enabled: true, tracesSampleRate: 1 });
  });

  it("normalizes environment names", () => {
    expect(normalizeEnvironment("STAGING")).toBe("staging");
    expect(normalizeEnvironment("test")).toBe("local");
    expect(normalizeEnvironment(undefined)).toBe("local");
  });
});

describe("sentry config from the environment", () => {
  it("ignores invalid matching settings", () => {
    expect(
      resolveSentryConfigFromEnv({
        APP_ENV: "staging",
        SENTRY_DSN: "https://public@sentry.example/1",
        MATCH_TOP_N: "zero",
        MATCH_ROLES: "host",
      }),
    ).toEqual({
      dsn: "https://public@sentry.example/1",
      environment: "staging",
      release: null,
      enabled: true,
      tracesSampleRate: 1,
    });
  });
});
