import { DEFAULT_ANALYSIS_INTERVAL, DEFAULT_SWIPE_LIMIT } from "../config/runtime-config";
import { MATCHING_ERROR_CODES, MatchingError } from "../errors";
import { logEvent } from "../observability/logger";
import { calculatePersona } from "../personas/persona";
import type { Persona } from "../personas/persona-catalog";
import { applyConfirmedPreferences, type ConfirmedPreferencesResult } from "../personas/preferences";
import type { UserProfile } from "../profiles/types";
import { selectNextCard, type Shuffle } from "./card-selector";
import { suggestPreferenceTags } from "./preference-suggester";
import { SwipeLog } from "./swipe-log";
import { activityCardId, type ActivityCard } from "./types";

export type SwipeSessionStage = "swiping" | "confirming" | "finished";

export type SwipeOutcome =
  | { stage: "swiping"; swipe_count: number }
  | { stage: "confirming"; swipe_count: number; suggestions: string[] }
  | { stage: "finished"; swipe_count: number };

export type SwipeSessionOptions = {
  swipeLog?: SwipeLog;
  shuffle?: Shuffle;
  swipeLimit?: number;
  analysisInterval?: number;
};

/**
 * One user's pass through the activity deck.
 *
 * Cards are drawn with `nextCard` and answered with `swipe`. Every
 * `analysisInterval` swipes the recent likes are turned into preference
 * suggestions, and the session waits in `confirming` until
 * `confirmPreferences` is called (with an empty list to decline). The session
 * finishes after `swipeLimit` swipes or when the deck runs out.
 */
export class SwipeSession {
  private readonly cards: readonly ActivityCard[];
  private readonly swipeLog: SwipeLog;
  private readonly shuffle: Shuffle | undefined;
  private readonly swipeLimit: number;
  private readonly analysisInterval: number;
  private readonly seen = new Set<string>();

  private currentStage: SwipeSessionStage = "swiping";
  private currentProfile: UserProfile;
  private currentPersona: Persona;
  private showing: ActivityCard | null = null;
  private suggestions: string[] = [];
  private swipes = 0;
  private likes = 0;

  constructor(profile: UserProfile, cards: readonly ActivityCard[], options: SwipeSessionOptions = {}) {
    this.cards = cards;
    this.swipeLog = options.swipeLog ?? new SwipeLog();
    this.shuffle = options.shuffle;
    this.swipeLimit = options.swipeLimit ?? DEFAULT_SWIPE_LIMIT;
    this.analysisInterval = options.analysisInterval ?? DEFAULT_ANALYSIS_INTERVAL;
    this.currentProfile = profile;
    this.currentPersona = calculatePersona(profile.interests);
  }

  get stage(): SwipeSessionStage {
    return this.currentStage;
  }

  get profile(): UserProfile {
    return this.currentProfile;
  }

  get persona(): Persona {
    return this.currentPersona;
  }

  get swipeCount(): number {
    return this.swipes;
  }

  get pendingSuggestions(): readonly string[] {
    return this.suggestions;
  }

  /** The card awaiting a swipe; drawing twice without swiping returns the same card. */
  nextCard(): ActivityCard | null {
    this.expectStage("swiping", "draw a card");
    if (this.showing) {
      return this.showing;
    }

    const card = selectNextCard({
      profile: this.currentProfile,
      cards: this.cards,
      seen: this.seen,
      shuffle: this.shuffle,
    });
    if (!card) {
      this.finish();
      return null;
    }
    this.seen.add(activityCardId(card));
    this.showing = card;
    return card;
  }

  swipe(liked: boolean): SwipeOutcome {
    this.expectStage("swiping", "swipe");
    const card = this.showing;
    if (!card) {
      throw new MatchingError(
        MATCHING_ERROR_CODES.SWIPE_SESSION_STATE,
        "No card is showing; draw one with nextCard() before swiping.",
        { context: { user_id: this.currentProfile.userId } },
      );
    }

    this.swipeLog.record(this.currentProfile.userId, card, liked);
    this.showing = null;
    this.swipes += 1;
    if (liked) {
      this.likes += 1;
    }

    if (this.swipes % this.analysisInterval === 0) {
      const recentLikes = this.swipeLog.recentLikes(this.currentProfile.userId);
      const suggestions = recentLikes.length > 0
        ? suggestPreferenceTags(recentLikes, { user_id: this.currentProfile.userId })
        : [];
      if (suggestions.length > 0) {
        this.suggestions = suggestions;
        this.currentStage = "confirming";
        return { stage: "confirming", swipe_count: this.swipes, suggestions: [...suggestions] };
      }
    }

    if (this.swipes >= this.swipeLimit) {
      this.finish();
      return { stage: "finished", swipe_count: this.swipes };
    }
    return { stage: "swiping", swipe_count: this.swipes };
  }

  confirmPreferences(tags: readonly string[]): ConfirmedPreferencesResult {
    this.expectStage("confirming", "confirm preferences");

    const result = applyConfirmedPreferences(this.currentProfile, tags);
    this.currentProfile = result.profile;
    this.currentPersona = result.persona;
    this.suggestions = [];
    this.currentStage = "swiping";
    if (this.swipes >= this.swipeLimit) {
      this.finish();
    }
    return result;
  }

  private finish(): void {
    if (this.currentStage === "finished") {
      return;
    }
    this.currentStage = "finished";
    logEvent({
      event: "swipes.session_finished",
      user_id: this.currentProfile.userId,
      payload: {
        swipe_count: this.swipes,
        like_count: this.likes,
        persona: this.currentPersona,
      },
    });
  }

  private expectStage(stage: SwipeSessionStage, action: string): void {
    if (this.currentStage !== stage) {
      throw new MatchingError(
        MATCHING_ERROR_CODES.SWIPE_SESSION_STATE,
        `Cannot ${action} while the session is ${this.currentStage}.`,
        { context: { user_id: this.currentProfile.userId, stage: this.currentStage } },
      );
    }
  }
}
