import type { UserProfile } from "../profiles/types";
import {
  COMPATIBILITY_COMPONENT_POINTS,
  COMPATIBILITY_SCORE_VERSION,
} from "./scoring-version";

export type CompatibilityProfile = Pick<
  UserProfile,
  "interests" | "languages" | "travelStyle" | "preferredActivities" | "preferredCountries"
>;

export type CompatibilityScoreBreakdown = {
  interests: number;
  languages: number;
  travel_style: number;
  activities: number;
  countries: number;
  total: number;
};

export type SharedPreferences = {
  interests: string[];
  languages: string[];
  activities: string[];
  countries: string[];
  travel_style: string | null;
};

export type CompatibilityScoreResult = {
  score: number;
  breakdown: CompatibilityScoreBreakdown;
  shared: SharedPreferences;
  version: string;
};

export function scorePair(
  a: CompatibilityProfile,
  b: CompatibilityProfile,
): CompatibilityScoreResult {
  const shared: SharedPreferences = {
    interests: intersect(a.interests, b.interests),
    languages: intersect(a.languages, b.languages),
    activities: intersect(a.preferredActivities, b.preferredActivities),
    countries: intersect(a.preferredCountries, b.preferredCountries),
    travel_style: sameTravelStyle(a.travelStyle, b.travelStyle),
  };

  const interests = shared.interests.length * COMPATIBILITY_COMPONENT_POINTS.interests;
  const languages = shared.languages.length * COMPATIBILITY_COMPONENT_POINTS.languages;
  const travelStyle = shared.travel_style === null ? 0 : COMPATIBILITY_COMPONENT_POINTS.travel_style;
  const activities = shared.activities.length * COMPATIBILITY_COMPONENT_POINTS.activities;
  const countries = shared.countries.length * COMPATIBILITY_COMPONENT_POINTS.countries;
  const total = interests + languages + travelStyle + activities + countries;

  return {
    score: total,
    breakdown: {
      interests,
      languages,
      travel_style: travelStyle,
      activities,
      countries,
      total,
    },
    shared,
    version: COMPATIBILITY_SCORE_VERSION,
  };
}

/** Highest score `profile` could reach against any counterpart. */
export function scoreUpperBound(profile: CompatibilityProfile): number {
  return (
    distinctCount(profile.interests) * COMPATIBILITY_COMPONENT_POINTS.interests +
    distinctCount(profile.languages) * COMPATIBILITY_COMPONENT_POINTS.languages +
    COMPATIBILITY_COMPONENT_POINTS.travel_style +
    distinctCount(profile.preferredActivities) * COMPATIBILITY_COMPONENT_POINTS.activities +
    distinctCount(profile.preferredCountries) * COMPATIBILITY_COMPONENT_POINTS.countries
  );
}

// Values keep the order they have on `left`; duplicates count once.
function intersect(
  left: readonly string[] | null | undefined,
  right: readonly string[] | null | undefined,
): string[] {
  if (!left?.length || !right?.length) {
    return [];
  }
  const rightSet = new Set(right);
  return [...new Set(left)].filter((value) => rightSet.has(value));
}

function sameTravelStyle(left: string | null, right: string | null): string | null {
  if (!left || !right) {
    return null;
  }
  return left === right ? left : null;
}

function distinctCount(values: readonly string[] | null | undefined): number {
  return values ? new Set(values).size : 0;
}
