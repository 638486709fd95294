import { MATCHING_ERROR_CODES, MatchingError } from "../errors";
import { DEFAULT_ROLE_PAIR, type RolePair } from "../profiles/types";

export type RuntimeEnvironment = "local" | "staging" | "production";

export type EnvSource = Record<string, string | undefined>;

export type SentryRuntimeConfig = {
  dsn: string | null;
  environment: RuntimeEnvironment;
  release: string | null;
  enabled: boolean;
  tracesSampleRate: number;
};

export type RuntimeConfig = {
  environment: RuntimeEnvironment;
  usersCsvPath: string;
  activitiesCsvPath: string;
  topN: number;
  roles: RolePair;
  swipeLimit: number;
  analysisInterval: number;
  sentry: SentryRuntimeConfig;
};

export const DEFAULT_USERS_CSV_PATH = "data/users.csv";
export const DEFAULT_ACTIVITIES_CSV_PATH = "data/activities.csv";
export const DEFAULT_TOP_N = 5;
export const DEFAULT_SWIPE_LIMIT = 20;
export const DEFAULT_ANALYSIS_INTERVAL = 10;

export function resolveRuntimeConfig(env: EnvSource = process.env): RuntimeConfig {
  const environment = resolveEnvironment(env);

  return {
    environment,
    usersCsvPath: readEnv(env, "USERS_CSV_PATH") ?? DEFAULT_USERS_CSV_PATH,
    activitiesCsvPath: readEnv(env, "ACTIVITIES_CSV_PATH") ?? DEFAULT_ACTIVITIES_CSV_PATH,
    topN: parsePositiveInteger(readEnv(env, "MATCH_TOP_N"), "MATCH_TOP_N") ?? DEFAULT_TOP_N,
    roles: parseRolePair(readEnv(env, "MATCH_ROLES")) ?? DEFAULT_ROLE_PAIR,
    swipeLimit: parsePositiveInteger(readEnv(env, "SWIPE_SESSION_LIMIT"), "SWIPE_SESSION_LIMIT") ??
      DEFAULT_SWIPE_LIMIT,
    analysisInterval:
      parsePositiveInteger(readEnv(env, "SWIPE_ANALYSIS_INTERVAL"), "SWIPE_ANALYSIS_INTERVAL") ??
      DEFAULT_ANALYSIS_INTERVAL,
    sentry: resolveSentryConfigFromEnv(env),
  };
}

/** Reads only the Sentry settings, so a bad matching setting cannot stop error capture. */
export function resolveSentryConfigFromEnv(env: EnvSource = process.env): SentryRuntimeConfig {
  return resolveSentryRuntimeConfig({
    dsn: readEnv(env, "SENTRY_DSN"),
    environment: resolveEnvironment(env),
    release: readEnv(env, "SENTRY_RELEASE"),
  });
}

export function resolveSentryRuntimeConfig(input: {
  dsn?: string | null;
  environment?: string | null;
  release?: string | null;
}): SentryRuntimeConfig {
  const dsn = normalizeString(input.dsn);
  const environment = normalizeEnvironment(input.environment);
  const release = normalizeString(input.release);

  return {
    dsn,
    environment,
    release,
    enabled: Boolean(dsn) && environment !== "local",
    tracesSampleRate: environment === "staging" ? 1.0 : 0.2,
  };
}

export function normalizeEnvironment(value: string | null | undefined): RuntimeEnvironment {
  const normalized = (value ?? "").trim().toLowerCase();
  if (normalized === "staging") {
    return "staging";
  }
  if (normalized === "production" || normalized === "prod") {
    return "production";
  }
  return "local";
}

export function parsePositiveInteger(value: string | null, label: string): number | null {
  if (value === null) {
    return null;
  }
  if (!/^\d+$/.test(value) || Number.parseInt(value, 10) < 1) {
    throw new MatchingError(
      MATCHING_ERROR_CODES.CONFIG_INVALID,
      `${label} must be a positive integer.`,
      { context: { [label]: value } },
    );
  }
  return Number.parseInt(value, 10);
}

function parseRolePair(value: string | null): RolePair | null {
  if (value === null) {
    return null;
  }
  const roles = value.split(",").map((role) => role.trim()).filter((role) => role.length > 0);
  if (roles.length !== 2 || roles[0] === roles[1]) {
    throw new MatchingError(
      MATCHING_ERROR_CODES.CONFIG_INVALID,
      "MATCH_ROLES must name exactly two distinct roles separated by a comma.",
      { context: { MATCH_ROLES: value } },
    );
  }
  return [roles[0], roles[1]];
}

function resolveEnvironment(env: EnvSource): RuntimeEnvironment {
  return normalizeEnvironment(
    readEnv(env, "APP_ENV") ?? readEnv(env, "SENTRY_ENVIRONMENT") ?? readEnv(env, "NODE_ENV"),
  );
}

function readEnv(env: EnvSource, name: string): string | null {
  return normalizeString(env[name]);
}

function normalizeString(value: string | null | undefined): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
