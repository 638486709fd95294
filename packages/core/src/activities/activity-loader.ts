import { logEvent } from "../observability/logger";
import { emitMetricBestEffort } from "../observability/metrics";
import {
  parseCsvRecords,
  readDatasetFile,
  readRequiredStringCell,
  readStringListCell,
} from "../profiles/csv-records";
import { ACTIVITY_CARD_COLUMNS, type ActivityCard } from "./types";

export function parseActivityCardsCsv(text: string, source = "inline"): ActivityCard[] {
  const rows = parseCsvRecords({ text, source, requiredColumns: ACTIVITY_CARD_COLUMNS });

  return rows.map(({ record, row_number }) => {
    const at = (column: (typeof ACTIVITY_CARD_COLUMNS)[number]) => ({
      source,
      row_number,
      column,
    });
    return {
      city: readRequiredStringCell(record, at("city")),
      country: readRequiredStringCell(record, at("country")),
      activities: readStringListCell(record, at("activities")),
    };
  });
}

export function loadActivityCards(path: string): ActivityCard[] {
  const cards = parseActivityCardsCsv(readDatasetFile(path), path);

  logEvent({
    event: "dataset.activities_loaded",
    payload: {
      source: path,
      row_count: cards.length,
    },
  });
  emitMetricBestEffort({
    metric: "dataset.rows.loaded",
    value: cards.length,
    tags: { component: "activity_loader", dataset: "activities" },
  });

  return cards;
}
