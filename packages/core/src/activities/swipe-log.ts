import type { ActivityCard } from "./types";

export type SwipeRecord = {
  user_id: number;
  card: ActivityCard;
  liked: boolean;
};

export const RECENT_LIKES_LIMIT = 10;

/** Swipes held in memory for the life of the process. */
export class SwipeLog {
  private readonly records: SwipeRecord[] = [];

  record(userId: number, card: ActivityCard, liked: boolean): SwipeRecord {
    const entry: SwipeRecord = { user_id: userId, card, liked };
    this.records.push(entry);
    return entry;
  }

  recentLikes(userId: number, limit: number = RECENT_LIKES_LIMIT): ActivityCard[] {
    if (limit <= 0) {
      return [];
    }
    return this.records
      .filter((entry) => entry.user_id === userId && entry.liked)
      .slice(-limit)
      .map((entry) => entry.card);
  }

  countFor(userId: number): number {
    return this.records.filter((entry) => entry.user_id === userId).length;
  }
}
