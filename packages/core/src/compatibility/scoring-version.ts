export const COMPATIBILITY_SCORE_VERSION = "v1";

/** Points awarded per shared value, except `travel_style`, which is a flat bonus. */
export const COMPATIBILITY_COMPONENT_POINTS = {
  interests: 10,
  languages: 30,
  travel_style: 25,
  activities: 10,
  countries: 20,
} as const;

export type CompatibilityComponent = keyof typeof COMPATIBILITY_COMPONENT_POINTS;
