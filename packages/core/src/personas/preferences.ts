import { logEvent } from "../observability/logger";
import type { UserProfile } from "../profiles/types";
import { calculatePersona } from "./persona";
import type { Persona } from "./persona-catalog";

export type ConfirmedPreferencesResult = {
  profile: UserProfile;
  persona: Persona;
  added_tags: string[];
};

/**
 * Merges confirmed preference tags into a copy of `profile`'s interests and
 * recalculates the persona. The input profile is left untouched.
 */
export function applyConfirmedPreferences(
  profile: UserProfile,
  confirmedTags: readonly string[],
): ConfirmedPreferencesResult {
  const interests = [...profile.interests];
  const addedTags: string[] = [];

  for (const rawTag of confirmedTags) {
    const tag = rawTag.trim();
    if (!tag || interests.includes(tag)) {
      continue;
    }
    interests.push(tag);
    addedTags.push(tag);
  }

  const persona = calculatePersona(interests);

  logEvent({
    event: "persona.updated",
    user_id: profile.userId,
    payload: {
      persona,
      added_tag_count: addedTags.length,
    },
  });

  return {
    profile: { ...profile, interests },
    persona,
    added_tags: addedTags,
  };
}
