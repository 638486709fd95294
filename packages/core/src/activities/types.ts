export type ActivityCard = {
  readonly city: string;
  readonly country: string;
  readonly activities: readonly string[];
};

export const ACTIVITY_CARD_COLUMNS = ["city", "country", "activities"] as const;

export function activityCardId(card: Pick<ActivityCard, "city" | "country">): string {
  return `${card.city}-${card.country}`;
}
