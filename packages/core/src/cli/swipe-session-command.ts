import { parseArgs } from "node:util";
import { loadActivityCards } from "../activities/activity-loader";
import type { Shuffle } from "../activities/card-selector";
import { SwipeSession } from "../activities/swipe-session";
import type { ActivityCard } from "../activities/types";
import { resolveRuntimeConfig, type EnvSource } from "../config/runtime-config";
import { MATCHING_ERROR_CODES, MatchingError } from "../errors";
import { loadUserProfiles } from "../profiles/profile-loader";
import type { RolePair, UserProfile } from "../profiles/types";
import {
  EXIT_OK,
  EXIT_USAGE,
  readUserIdPositional,
  reportMatchingError,
  usageProblem,
  writeStdoutLine,
  type WriteLine,
} from "./command-support";

export const SWIPE_SESSION_USAGE =
  "Usage: swipe-session <userId> [--users <path>] [--activities <path>]";

/** Resolves with the next answer, or null once input has ended. */
export type Prompt = (question: string) => Promise<string | null>;

export type SwipeSessionCommandDeps = {
  prompt: Prompt;
  env?: EnvSource;
  write?: WriteLine;
  shuffle?: Shuffle;
  loadProfiles?: (path: string, options: { roles: RolePair }) => UserProfile[];
  loadCards?: (path: string) => ActivityCard[];
};

type SwipeSessionArgs = {
  user_id: number;
  users_path: string | null;
  activities_path: string | null;
};

/**
 * Runs an interactive swipe session for one user: shows cards, records likes,
 * offers preference suggestions at each checkpoint and prints the resulting
 * profile when the session ends or input runs out.
 */
export async function runSwipeSessionCommand(
  argv: readonly string[],
  deps: SwipeSessionCommandDeps,
): Promise<number> {
  const write = deps.write ?? writeStdoutLine;

  const args = readArgs(argv);
  if (typeof args === "string") {
    write(args);
    write(SWIPE_SESSION_USAGE);
    return EXIT_USAGE;
  }

  try {
    const config = resolveRuntimeConfig(deps.env ?? process.env);
    const profiles = (deps.loadProfiles ?? loadUserProfiles)(
      args.users_path ?? config.usersCsvPath,
      { roles: config.roles },
    );
    const profile = profiles.find((candidate) => candidate.userId === args.user_id);
    if (!profile) {
      throw new MatchingError(
        MATCHING_ERROR_CODES.USER_NOT_FOUND,
        `User ${args.user_id} not found.`,
        { context: { user_id: args.user_id } },
      );
    }
    const cards = (deps.loadCards ?? loadActivityCards)(args.activities_path ?? config.activitiesCsvPath);

    const session = new SwipeSession(profile, cards, {
      shuffle: deps.shuffle,
      swipeLimit: config.swipeLimit,
      analysisInterval: config.analysisInterval,
    });
    write(`${profile.userName} (#${profile.userId}) starts as ${session.persona}.`);
    await drive(session, deps.prompt, write);

    write(`Session over. Swipes: ${session.swipeCount}. Persona: ${session.persona}.`);
    write(`Interests: ${session.profile.interests.join(", ") || "none"}`);
    return EXIT_OK;
  } catch (error) {
    if (!(error instanceof MatchingError)) {
      throw error;
    }
    return reportMatchingError(error, { user_id: args.user_id, phase: "swipe_session", write });
  }
}

async function drive(session: SwipeSession, prompt: Prompt, write: WriteLine): Promise<void> {
  while (session.stage !== "finished") {
    const card = session.nextCard();
    if (!card) {
      write("No more cards to show.");
      return;
    }

    write(`${card.city}, ${card.country}: ${card.activities.join(", ")}`);
    const liked = await askLike(prompt, write);
    if (liked === null) {
      return;
    }

    const outcome = session.swipe(liked);
    if (outcome.stage !== "confirming") {
      continue;
    }

    write("Suggested preferences:");
    outcome.suggestions.forEach((tag, index) => write(`  ${index + 1}. ${tag}`));
    const answer = await prompt("Keep which? (numbers separated by commas, blank for none) ");
    if (answer === null) {
      return;
    }
    const result = session.confirmPreferences(pickSuggestions(answer, outcome.suggestions));
    write(`Added ${result.added_tags.length} interest(s). Persona: ${result.persona}.`);
  }
}

async function askLike(prompt: Prompt, write: WriteLine): Promise<boolean | null> {
  for (;;) {
    const answer = await prompt("Like it? [y/n] ");
    if (answer === null) {
      return null;
    }
    const normalized = answer.trim().toLowerCase();
    if (normalized === "y" || normalized === "yes") {
      return true;
    }
    if (normalized === "n" || normalized === "no") {
      return false;
    }
    write("Please answer y or n.");
  }
}

/** Maps 1-based picks such as "1, 3" onto the offered tags; out-of-range picks are ignored. */
export function pickSuggestions(answer: string, suggestions: readonly string[]): string[] {
  const picked: string[] = [];
  for (const part of answer.split(",")) {
    const index = Number.parseInt(part.trim(), 10) - 1;
    const tag = suggestions[index];
    if (Number.isInteger(index) && tag !== undefined && !picked.includes(tag)) {
      picked.push(tag);
    }
  }
  return picked;
}

function readArgs(argv: readonly string[]): SwipeSessionArgs | string {
  try {
    const { values, positionals } = parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        users: { type: "string" },
        activities: { type: "string" },
      },
    });

    const userId = readUserIdPositional(positionals);
    if (typeof userId === "string") {
      return userId;
    }
    return {
      user_id: userId,
      users_path: values.users?.trim() || null,
      activities_path: values.activities?.trim() || null,
    };
  } catch (error) {
    return usageProblem(error);
  }
}
