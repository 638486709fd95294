export type MetricType = "counter" | "histogram" | "gauge";

export type MetricCatalogEntry = {
  metric_name: string;
  type: MetricType;
  description: string;
  tags: readonly string[];
  unit: string;
};

export const METRIC_CATALOG = [
  {
    metric_name: "system.error.count",
    type: "counter",
    description: "Errors that escaped a command or pipeline step.",
    tags: ["component", "phase", "error_name"],
    unit: "count",
  },
  {
    metric_name: "matching.query.latency",
    type: "histogram",
    description: "Time spent scoring and ranking candidates for one user.",
    tags: ["component", "outcome"],
    unit: "ms",
  },
  {
    metric_name: "matching.candidates.ranked",
    type: "histogram",
    description: "Eligible candidates ranked per match query.",
    tags: ["component", "user_type"],
    unit: "count",
  },
  {
    metric_name: "dataset.rows.loaded",
    type: "gauge",
    description: "Rows parsed from a CSV dataset.",
    tags: ["component", "dataset"],
    unit: "count",
  },
] as const satisfies readonly MetricCatalogEntry[];

export type MetricName = (typeof METRIC_CATALOG)[number]["metric_name"];

export const METRIC_CATALOG_BY_NAME: Readonly<Record<string, MetricCatalogEntry | undefined>> =
  Object.fromEntries(METRIC_CATALOG.map((entry) => [entry.metric_name, entry]));
