import { afterEach, describe, expect, it } from "vitest";
import {
  clearRecordedMetrics,
  emitMetric,
  emitMetricBestEffort,
  getRecordedMetrics,
  resetMetricAdapter,
  setMetricAdapter,
  timeMetric,
  type EmittedMetric,
} from "../../packages/core/src/observability/metrics";
import { METRIC_CATALOG } from "../../packages/core/src/observability/metrics-catalog";

describe("metrics emitter", () => {
  afterEach(() => {
    resetMetricAdapter();
    clearRecordedMetrics();
  });

  it("declares every metric with a component tag and a dotted lowercase name", () => {
    for (const entry of METRIC_CATALOG) {
      expect(entry.metric_name).toMatch(/^[a-z]+(\.[a-z_]+)+$/);
      expect(entry.tags).toContain("component");
    }
    expect(new Set(METRIC_CATALOG.map((entry) => entry.metric_name)).size).toBe(METRIC_CATALOG.length);
  });

  it("keeps only the tags the catalog declares for the metric", () => {
    const emitted = emitMetric({
      metric: "matching.candidates.ranked",
      value: 4,
      tags: {
        component: "unit_test",
        user_type: "traveler",
        user_name: "Ana",
        interests: "Hike",
      },
    });

    expect(emitted.tags).toEqual({ component: "unit_test", user_type: "traveler" });
    expect(getRecordedMetrics()).toEqual([emitted]);
  });

  it("rounds count metrics and rejects non-finite values", () => {
    const ranked = emitMetric({
      metric: "matching.candidates.ranked",
      value: 3.6,
      tags: { component: "unit_test" },
    });

    expect(ranked.value).toBe(4);
    expect(() => emitMetric({ metric: "dataset.rows.loaded", value: Number.NaN })).toThrow(
      "Metric 'dataset.rows.loaded' needs a finite value, got NaN.",
    );
    expect(emitMetricBestEffort({ metric: "dataset.rows.loaded", value: Number.POSITIVE_INFINITY })).toBeNull();
  });

  it("times work and tags the outcome", () => {
    expect(timeMetric("matching.query.latency", { component: "unit_test" }, () => "done")).toBe("done");
    expect(() =>
      timeMetric("matching.query.latency", { component: "unit_test" }, () => {
        throw new Error("boom");
      })
    ).toThrow("boom");

    const recorded = getRecordedMetrics();
    expect(recorded.map((metric) => metric.tags)).toEqual([
      { component: "unit_test", outcome: "success" },
      { component: "unit_test", outcome: "error" },
    ]);
    expect(recorded[0].unit).toBe("ms");
    expect(recorded[0].value).toBeGreaterThanOrEqual(0);
  });

  it("routes metrics to a custom adapter", () => {
    const received: EmittedMetric[] = [];
    setMetricAdapter({
      emit: (metric) => {
        received.push(metric);
      },
    });

    emitMetric({ metric: "dataset.rows.loaded", value: 6, tags: { component: "unit_test", dataset: "users" } });

    expect(received.map((metric) => [metric.metric, metric.value])).toEqual([["dataset.rows.loaded", 6]]);
    expect(getRecordedMetrics()).toEqual([]);
  });
});
