import { normalizeEnvironment, type RuntimeEnvironment } from "../config/runtime-config";
import { METRIC_CATALOG_BY_NAME, type MetricName, type MetricType } from "./metrics-catalog";

export type MetricTags = Record<string, string | number | boolean | null | undefined>;

export type EmitMetricInput = {
  metric: MetricName;
  value: number;
  tags?: MetricTags;
};

export type EmittedMetric = {
  ts: string;
  metric: MetricName;
  type: MetricType;
  unit: string;
  value: number;
  env: RuntimeEnvironment;
  tags: Record<string, string>;
};

export type MetricAdapter = {
  emit(metric: EmittedMetric): void;
};

const MAX_RECORDED_METRICS = 2_000;
const MAX_TAG_VALUE_LENGTH = 64;

const recorded: EmittedMetric[] = [];

const recordingAdapter: MetricAdapter = {
  emit(metric) {
    recorded.push(metric);
    if (recorded.length > MAX_RECORDED_METRICS) {
      recorded.splice(0, recorded.length - MAX_RECORDED_METRICS);
    }
  },
};

let activeAdapter: MetricAdapter = recordingAdapter;

export function setMetricAdapter(adapter: MetricAdapter): void {
  activeAdapter = adapter;
}

export function resetMetricAdapter(): void {
  activeAdapter = recordingAdapter;
}

/** Metrics kept by the default in-process adapter, oldest first. */
export function getRecordedMetrics(): EmittedMetric[] {
  return [...recorded];
}

export function clearRecordedMetrics(): void {
  recorded.length = 0;
}

/**
 * Validates `input` against the metric catalog and hands it to the active
 * adapter. Tags the catalog does not declare for the metric are dropped, so
 * profile fields can never leak into a tag.
 */
export function emitMetric(input: EmitMetricInput): EmittedMetric {
  const definition = METRIC_CATALOG_BY_NAME[input.metric];
  if (!definition) {
    throw new Error(`Unknown metric '${input.metric}'.`);
  }
  if (!Number.isFinite(input.value)) {
    throw new Error(`Metric '${input.metric}' needs a finite value, got ${input.value}.`);
  }

  const metric: EmittedMetric = {
    ts: new Date().toISOString(),
    metric: input.metric,
    type: definition.type,
    unit: definition.unit,
    value: definition.unit === "count" ? Math.round(input.value) : Math.round(input.value * 1_000) / 1_000,
    env: normalizeEnvironment(process.env.APP_ENV ?? process.env.NODE_ENV),
    tags: declaredTags(definition.tags, input.tags),
  };
  activeAdapter.emit(metric);
  return metric;
}

export function emitMetricBestEffort(input: EmitMetricInput): EmittedMetric | null {
  try {
    return emitMetric(input);
  } catch {
    return null;
  }
}

/** Runs `work` and records its duration, tagged with `outcome` success or error. */
export function timeMetric<T>(metric: MetricName, tags: MetricTags, work: () => T): T {
  const startedAt = performance.now();
  let outcome = "error";
  try {
    const result = work();
    outcome = "success";
    return result;
  } finally {
    emitMetricBestEffort({
      metric,
      value: Math.max(0, performance.now() - startedAt),
      tags: { ...tags, outcome },
    });
  }
}

export function emitSystemErrorMetric(input: {
  component: string;
  phase: string | null;
  error_name: string | null;
}): EmittedMetric | null {
  return emitMetricBestEffort({
    metric: "system.error.count",
    value: 1,
    tags: {
      component: input.component,
      phase: input.phase ?? "unknown",
      error_name: input.error_name ?? "Error",
    },
  });
}

function declaredTags(declared: readonly string[], tags: MetricTags = {}): Record<string, string> {
  const output: Record<string, string> = {};
  for (const key of declared) {
    const value = tags[key];
    if (value === null || value === undefined || value === "") {
      continue;
    }
    output[key] = String(value).trim().slice(0, MAX_TAG_VALUE_LENGTH);
  }
  return output;
}
