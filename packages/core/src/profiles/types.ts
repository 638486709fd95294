export type UserType = string;

/** The two complementary roles a dataset is matched across, e.g. travelers and hosts. */
export type RolePair = readonly [UserType, UserType];

export const DEFAULT_ROLE_PAIR: RolePair = ["traveler", "host"];

export type UserProfile = {
  readonly userId: number;
  readonly userName: string;
  readonly userType: UserType;
  readonly interests: readonly string[];
  readonly languages: readonly string[];
  readonly travelStyle: string | null;
  readonly preferredActivities: readonly string[];
  readonly preferredCountries: readonly string[];
  readonly dislikedUserIds: readonly number[];
};

export const USER_PROFILE_COLUMNS = [
  "userId",
  "userName",
  "userType",
  "interests",
  "languages",
  "travelStyle",
  "preferredActivities",
  "preferredCountries",
  "dislikedUserIds",
] as const;

export type UserProfileColumn = (typeof USER_PROFILE_COLUMNS)[number];

export function complementaryRole(role: UserType, roles: RolePair): UserType | null {
  if (role === roles[0]) {
    return roles[1];
  }
  if (role === roles[1]) {
    return roles[0];
  }
  return null;
}
