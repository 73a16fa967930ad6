/**
 * WHAT: Proves run health bookkeeping and the single alert at the consecutive-failure threshold.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect } from "vitest";
import { TaskHealthTracker } from "../../src/scheduler/taskHealth.js";
import { captureLogger, findLogs } from "../utils/dbFixtures.js";

function setup() {
  let now = 1_000;
  const { logger, records } = captureLogger();
  const tracker = new TaskHealthTracker(logger, () => now);
  return { tracker, records, advance: (ms: number) => (now += ms) };
}

describe("TaskHealthTracker", () => {
  it("tracks runs and resets the streak on success", () => {
    const { tracker, advance } = setup();
    tracker.record("digest", false);
    advance(500);
    const health = tracker.record("digest", true);

    expect(health).toEqual({
      taskId: "digest",
      lastRunAt: 1_500,
      lastSuccessAt: 1_500,
      lastErrorAt: 1_000,
      consecutiveFailures: 0,
      totalRuns: 2,
      totalFailures: 1,
    });
  });

  it("alerts once when failures reach the threshold", () => {
    const { tracker, records } = setup();
    for (let i = 0; i < 5; i++) tracker.record("digest", false);

    const alerts = findLogs(records, "task_failing");
    expect(alerts).toHaveLength(1);
    expect(alerts[0]).toMatchObject({ taskId: "digest", consecutiveFailures: 3 });
  });

  it("returns copies sorted by task id", () => {
    const { tracker } = setup();
    tracker.record("zeta", true);
    tracker.record("alpha", true);

    const all = tracker.all();
    expect(all.map((h) => h.taskId)).toEqual(["alpha", "zeta"]);
    all[0].totalRuns = 99;
    expect(tracker.get("alpha")?.totalRuns).toBe(1);
  });

  it("forgets a task", () => {
    const { tracker } = setup();
    tracker.record("digest", true);
    tracker.forget("digest");
    expect(tracker.get("digest")).toBeUndefined();
  });
});
