export type EventCategory = "dataset" | "matching" | "persona" | "cards" | "swipes" | "system";

export type EventCatalogEntry = {
  event_name: string;
  category: EventCategory;
  description: string;
  required_fields: readonly string[];
};

export const EVENT_CATALOG = [
  {
    event_name: "dataset.profiles_loaded",
    category: "dataset",
    description: "User profiles parsed from a CSV dataset.",
    required_fields: ["source", "row_count"],
  },
  {
    event_name: "dataset.activities_loaded",
    category: "dataset",
    description: "Activity cards parsed from a CSV dataset.",
    required_fields: ["source", "row_count"],
  },
  {
    event_name: "dataset.parse_failed",
    category: "dataset",
    description: "A dataset could not be read or contained an invalid row.",
    required_fields: ["source", "error_code"],
  },
  {
    event_name: "matching.ranked",
    category: "matching",
    description: "Candidates ranked for a user.",
    required_fields: ["candidate_count", "result_count"],
  },
  {
    event_name: "matching.user_not_found",
    category: "matching",
    description: "A match query named a user id absent from the dataset.",
    required_fields: ["requested_user_id"],
  },
  {
    event_name: "persona.updated",
    category: "persona",
    description: "Confirmed preference tags merged into a profile.",
    required_fields: ["persona", "added_tag_count"],
  },
  {
    event_name: "cards.exhausted",
    category: "cards",
    description: "Every activity card has been shown to the user.",
    required_fields: ["seen_count"],
  },
  {
    event_name: "preferences.suggested",
    category: "persona",
    description: "Preference tags derived from recently liked cards.",
    required_fields: ["liked_count", "suggestion_count"],
  },
  {
    event_name: "swipes.session_finished",
    category: "swipes",
    description: "A swipe session reached its swipe limit or ran out of cards.",
    required_fields: ["swipe_count", "like_count", "persona"],
  },
  {
    event_name: "system.unhandled_error",
    category: "system",
    description: "An error escaped a command or pipeline step.",
    required_fields: ["phase", "error_name"],
  },
] as const satisfies readonly EventCatalogEntry[];

export type CanonicalEventName = (typeof EVENT_CATALOG)[number]["event_name"];

export const EVENT_CATALOG_BY_NAME: Readonly<Record<string, EventCatalogEntry | undefined>> =
  Object.fromEntries(EVENT_CATALOG.map((entry) => [entry.event_name, entry]));
