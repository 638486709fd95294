import { logEvent } from "../observability/logger";
import { TRAVEL_KEYWORDS } from "../personas/persona-catalog";
import type { ActivityCard } from "./types";

export const DEFAULT_MAX_SUGGESTIONS = 5;

/**
 * Ranks travel keywords by how many liked-card activities mention them
 * (case-insensitive substring). Ties keep keyword catalog order.
 */
export function suggestPreferenceTags(
  likedCards: readonly ActivityCard[],
  options: { max?: number; user_id?: number | null } = {},
): string[] {
  const max = options.max ?? DEFAULT_MAX_SUGGESTIONS;
  const activities = likedCards.flatMap((card) => card.activities.map((activity) => activity.toLowerCase()));

  const suggestions = TRAVEL_KEYWORDS
    .map((keyword) => {
      const needle = keyword.toLowerCase();
      return {
        keyword,
        hits: activities.filter((activity) => activity.includes(needle)).length,
      };
    })
    .filter((entry) => entry.hits > 0)
    .sort((left, right) => right.hits - left.hits)
    .slice(0, Math.max(0, max))
    .map((entry) => entry.keyword);

  logEvent({
    event: "preferences.suggested",
    user_id: options.user_id ?? null,
    payload: {
      liked_count: likedCards.length,
      suggestion_count: suggestions.length,
    },
  });

  return suggestions;
}
