import { describe, it, expect, vi } from "vitest";

import { experimentProgress } from "../src/handler/experiments";
import { HttpError } from "../src/serializer/http_error";
import type { AssignmentStore } from "../src/store/annotation_store";

const countingStore = (countAll: number, countComplete: number): AssignmentStore => ({
  countUserAssignments: vi.fn(async () => countAll),
  countCompleteUserAssignments: vi.fn(async () => countComplete),
  getUserAssignments: vi.fn(async () => []),
  getAllByExperiment: vi.fn(async () => []),
});

describe("experimentProgress", () => {
  it("is exactly 0 when the user has no assignments", async () => {
    const progress = await experimentProgress(countingStore(0, 0), 1, 5);

    expect(progress).toBe(0);
    expect(Number.isFinite(progress)).toBe(true);
  });

  it("is 25 with one of four assignments answered", async () => {
    expect(await experimentProgress(countingStore(4, 1), 1, 5)).toBe(25);
  });

  it("reaches exactly 100 when every assignment is answered", async () => {
    for (const total of [1, 3, 7, 50]) {
      expect(await experimentProgress(countingStore(total, total), 1, 5)).toBe(100);
    }
  });

  it("never decreases as more assignments are answered", async () => {
    const total = 7;
    let previous = -1;
    for (let complete = 0; complete <= total; complete += 1) {
      const progress = await experimentProgress(countingStore(total, complete), 1, 5);
      expect(progress).toBeGreaterThanOrEqual(previous);
      previous = progress;
    }
  });

  it("keeps 32-bit float precision without rounding", async () => {
    expect(await experimentProgress(countingStore(3, 1), 1, 5)).toBe(Math.fround(100 / 3));
  });

  it("queries both counts for the given experiment and user", async () => {
    const store = countingStore(2, 1);
    await experimentProgress(store, 12, 34);

    expect(store.countUserAssignments).toHaveBeenCalledWith(12, 34);
    expect(store.countCompleteUserAssignments).toHaveBeenCalledWith(12, 34);
  });

  it("surfaces a failed total count as an internal error", async () => {
    const store: AssignmentStore = {
      ...countingStore(0, 0),
      countUserAssignments: async () => {
        throw new Error("database is locked");
      },
    };

    const failure = experimentProgress(store, 1, 5);
    await expect(failure).rejects.toBeInstanceOf(HttpError);
    await expect(failure).rejects.toMatchObject({
      status: 500,
      title: "error counting assignments: database is locked",
    });
  });

  it("surfaces a failed complete count as an internal error", async () => {
    const store: AssignmentStore = {
      ...countingStore(4, 0),
      countCompleteUserAssignments: async () => {
        throw new Error("disk I/O error");
      },
    };

    await expect(experimentProgress(store, 1, 5)).rejects.toMatchObject({
      status: 500,
      title: "error counting complete assignments: disk I/O error",
    });
  });
});
