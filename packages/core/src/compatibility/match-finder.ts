import { MATCHING_ERROR_CODES, MatchingError } from "../errors";
import {
  DEFAULT_ROLE_PAIR,
  complementaryRole,
  type RolePair,
  type UserProfile,
} from "../profiles/types";
import { scorePair } from "./scorer";

export type MatchResult = {
  user_name: string;
  user_id: number;
  score: number;
};

export type FindMatchesInput = {
  user_id: number;
  users: readonly UserProfile[];
  roles?: RolePair;
};

/**
 * Ranks every user of the complementary role against `user_id`, highest score
 * first. Disliked users and the user itself are never returned; equal scores
 * keep the order of `users`.
 */
export function findMatches(input: FindMatchesInput): MatchResult[] {
  const roles = input.roles ?? DEFAULT_ROLE_PAIR;
  const currentUser = input.users.find((user) => user.userId === input.user_id);
  if (!currentUser) {
    throw new MatchingError(
      MATCHING_ERROR_CODES.USER_NOT_FOUND,
      `User ${input.user_id} not found.`,
      { context: { user_id: input.user_id } },
    );
  }

  const targetRole = complementaryRole(currentUser.userType, roles);
  if (targetRole === null) {
    throw new MatchingError(
      MATCHING_ERROR_CODES.UNKNOWN_ROLE,
      `User ${currentUser.userId} has role '${currentUser.userType}', expected one of: ${roles.join(", ")}.`,
      { context: { user_id: currentUser.userId, user_type: currentUser.userType } },
    );
  }

  const disliked = new Set(currentUser.dislikedUserIds);
  const candidates = input.users.filter((candidate) =>
    candidate.userType === targetRole &&
    candidate.userId !== currentUser.userId &&
    !disliked.has(candidate.userId)
  );

  const scored = candidates.map((candidate) => ({
    user_name: candidate.userName,
    user_id: candidate.userId,
    score: scorePair(currentUser, candidate).score,
  }));

  // Array.prototype.sort is stable, so ties stay in input order.
  return scored.sort((left, right) => right.score - left.score);
}
