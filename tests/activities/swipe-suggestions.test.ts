import { afterEach, describe, expect, it } from "vitest";
import { suggestPreferenceTags } from "../../packages/core/src/activities/preference-suggester";
import { SwipeLog } from "../../packages/core/src/activities/swipe-log";
import type { ActivityCard } from "../../packages/core/src/activities/types";
import { captureLogs, releaseLogs } from "../helpers/captured-logs";

const kyoto: ActivityCard = { city: "Kyoto", country: "Japan", activities: ["Temple visit", "Food market crawl"] };
const santorini: ActivityCard = { city: "Santorini", country: "Greece", activities: ["Beach day", "Island boat tour"] };
const cusco: ActivityCard = { city: "Cusco", country: "Peru", activities: ["Mountain hike"] };

describe("swipe log", () => {
  it("returns the most recent liked cards for one user", () => {
    const log = new SwipeLog();
    log.record(1, kyoto, true);
    log.record(1, cusco, false);
    log.record(2, cusco, true);
    log.record(1, santorini, true);

    expect(log.recentLikes(1)).toEqual([kyoto, santorini]);
    expect(log.recentLikes(1, 1)).toEqual([santorini]);
    expect(log.recentLikes(1, 0)).toEqual([]);
    expect(log.countFor(1)).toBe(3);
  });
});

describe("preference suggestions", () => {
  afterEach(() => {
    releaseLogs();
  });

  it("ranks travel keywords by hits in liked activities", () => {
    const logs = captureLogs();

    expect(suggestPreferenceTags([kyoto, santorini, santorini], { user_id: 1 })).toEqual([
      "Tour",
      "Beach",
      "Island",
      "Temple",
      "Market",
    ]);

    const logged = logs[0];
    expect(logged.event).toBe("preferences.suggested");
    expect(logged.payload).toEqual({ liked_count: 3, suggestion_count: 5 });
  });

  it("honours the maximum and handles no likes", () => {
    captureLogs();

    expect(suggestPreferenceTags([kyoto, santorini, santorini], { max: 2 })).toEqual(["Tour", "Beach"]);
    expect(suggestPreferenceTags([])).toEqual([]);
  });
});
