import { logEvent } from "../observability/logger";
import type { UserProfile } from "../profiles/types";
import { activityCardId, type ActivityCard } from "./types";

export type Shuffle = <T>(items: readonly T[]) => T[];

export type SelectNextCardInput = {
  profile: Pick<UserProfile, "userId" | "interests"> | null;
  cards: readonly ActivityCard[];
  seen: ReadonlySet<string> | readonly string[];
  shuffle?: Shuffle;
};

export const shuffleCards: Shuffle = (items) => {
  const copy = [...items];
  for (let index = copy.length - 1; index > 0; index -= 1) {
    const swapIndex = Math.floor(Math.random() * (index + 1));
    [copy[index], copy[swapIndex]] = [copy[swapIndex], copy[index]];
  }
  return copy;
};

/**
 * Picks the next unseen card, preferring one whose activities mention one of
 * the user's interests (case-insensitive substring, interests tried in order).
 * Returns null once every card has been seen.
 */
export function selectNextCard(input: SelectNextCardInput): ActivityCard | null {
  const shuffle = input.shuffle ?? shuffleCards;
  const seen = new Set(input.seen);
  const isUnseen = (card: ActivityCard) => !seen.has(activityCardId(card));

  const interests = input.profile?.interests ?? [];
  if (interests.length > 0) {
    const shuffled = shuffle(input.cards);
    for (const interest of interests) {
      const needle = interest.toLowerCase();
      const hit = shuffled.find((card) =>
        isUnseen(card) &&
        card.activities.some((activity) => activity.toLowerCase().includes(needle))
      );
      if (hit) {
        return hit;
      }
    }
  }

  const fallback = shuffle(input.cards).find(isUnseen);
  if (fallback) {
    return fallback;
  }

  logEvent({
    event: "cards.exhausted",
    user_id: input.profile?.userId ?? null,
    payload: { seen_count: seen.size },
  });
  return null;
}
