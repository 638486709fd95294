import { MATCHING_ERROR_CODES, MatchingError } from "../errors";
import { logEvent } from "../observability/logger";
import { emitMetricBestEffort } from "../observability/metrics";
import {
  invalidCell,
  parseCsvRecords,
  readDatasetFile,
  readIntegerCell,
  readIntegerListCell,
  readOptionalStringCell,
  readRequiredStringCell,
  readStringListCell,
  type CsvRecord,
} from "./csv-records";
import {
  DEFAULT_ROLE_PAIR,
  USER_PROFILE_COLUMNS,
  type RolePair,
  type UserProfile,
  type UserProfileColumn,
} from "./types";

export type ParseUserProfilesOptions = {
  source?: string;
  roles?: RolePair;
};

export function parseUserProfilesCsv(
  text: string,
  options: ParseUserProfilesOptions = {},
): UserProfile[] {
  const source = options.source ?? "inline";
  const roles = options.roles ?? DEFAULT_ROLE_PAIR;
  const rows = parseCsvRecords({ text, source, requiredColumns: USER_PROFILE_COLUMNS });

  const seenIds = new Map<number, number>();
  return rows.map(({ record, row_number: rowNumber }) => {
    const profile = toUserProfile(record, { source, rowNumber, roles });

    const firstRow = seenIds.get(profile.userId);
    if (firstRow !== undefined) {
      throw new MatchingError(
        MATCHING_ERROR_CODES.DATASET_INVALID_ROW,
        `Duplicate userId ${profile.userId} at row ${rowNumber} of '${source}' (first seen at row ${firstRow})`,
        { context: { source, row_number: rowNumber, column: "userId", first_row_number: firstRow } },
      );
    }
    seenIds.set(profile.userId, rowNumber);
    return profile;
  });
}

export function loadUserProfiles(
  path: string,
  options: Omit<ParseUserProfilesOptions, "source"> = {},
): UserProfile[] {
  const profiles = parseUserProfilesCsv(readDatasetFile(path), { ...options, source: path });

  logEvent({
    event: "dataset.profiles_loaded",
    payload: {
      source: path,
      row_count: profiles.length,
    },
  });
  emitMetricBestEffort({
    metric: "dataset.rows.loaded",
    value: profiles.length,
    tags: { component: "profile_loader", dataset: "users" },
  });

  return profiles;
}

function toUserProfile(
  record: CsvRecord,
  params: { source: string; rowNumber: number; roles: RolePair },
): UserProfile {
  const at = (column: UserProfileColumn) => ({
    source: params.source,
    row_number: params.rowNumber,
    column,
  });

  const userType = readRequiredStringCell(record, at("userType"));
  if (!params.roles.includes(userType)) {
    throw invalidCell(at("userType"), `must be one of: ${params.roles.join(", ")}`);
  }

  return {
    userId: readIntegerCell(record, at("userId")),
    userName: readRequiredStringCell(record, at("userName")),
    userType,
    interests: readStringListCell(record, at("interests")),
    languages: readStringListCell(record, at("languages")),
    travelStyle: readOptionalStringCell(record, at("travelStyle")),
    preferredActivities: readStringListCell(record, at("preferredActivities")),
    preferredCountries: readStringListCell(record, at("preferredCountries")),
    dislikedUserIds: readIntegerListCell(record, at("dislikedUserIds")),
  };
}
