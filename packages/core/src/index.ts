export { scorePair, scoreUpperBound } from "./compatibility/scorer";
export type {
  CompatibilityProfile,
  CompatibilityScoreBreakdown,
  CompatibilityScoreResult,
  SharedPreferences,
} from "./compatibility/scorer";
export { COMPATIBILITY_COMPONENT_POINTS, COMPATIBILITY_SCORE_VERSION } from "./compatibility/scoring-version";
export { findMatches } from "./compatibility/match-finder";
export type { FindMatchesInput, MatchResult } from "./compatibility/match-finder";

export { loadUserProfiles, parseUserProfilesCsv } from "./profiles/profile-loader";
export { parseListLiteral } from "./profiles/list-literal";
export type { ListLiteralValue, ParseListLiteralResult } from "./profiles/list-literal";
export { DEFAULT_ROLE_PAIR, USER_PROFILE_COLUMNS, complementaryRole } from "./profiles/types";
export type { RolePair, UserProfile, UserType } from "./profiles/types";

export { calculatePersona } from "./personas/persona";
export { applyConfirmedPreferences } from "./personas/preferences";
export type { ConfirmedPreferencesResult } from "./personas/preferences";
export { PERSONA_CATALOG, TRAVEL_KEYWORDS } from "./personas/persona-catalog";
export type { Persona } from "./personas/persona-catalog";

export { loadActivityCards, parseActivityCardsCsv } from "./activities/activity-loader";
export { selectNextCard, shuffleCards } from "./activities/card-selector";
export type { SelectNextCardInput, Shuffle } from "./activities/card-selector";
export { SwipeLog } from "./activities/swipe-log";
export { SwipeSession } from "./activities/swipe-session";
export type { SwipeOutcome, SwipeSessionOptions, SwipeSessionStage } from "./activities/swipe-session";
export type { SwipeRecord } from "./activities/swipe-log";
export { suggestPreferenceTags } from "./activities/preference-suggester";
export { activityCardId } from "./activities/types";
export type { ActivityCard } from "./activities/types";

export {
  DEFAULT_ANALYSIS_INTERVAL,
  DEFAULT_SWIPE_LIMIT,
  resolveRuntimeConfig,
  resolveSentryConfigFromEnv,
  resolveSentryRuntimeConfig,
} from "./config/runtime-config";
export type { RuntimeConfig, SentryRuntimeConfig } from "./config/runtime-config";
export { MATCHING_ERROR_CODES, MatchingError, isMatchingError } from "./errors";
export type { MatchingErrorCode } from "./errors";

export { runFindMatchesCommand } from "./cli/find-matches-command";
export { runSwipeSessionCommand } from "./cli/swipe-session-command";
export type { Prompt } from "./cli/swipe-session-command";

export { logEvent, resetLogSink, setLogSink } from "./observability/logger";
export type { LogSink, StructuredLogEvent } from "./observability/logger";
