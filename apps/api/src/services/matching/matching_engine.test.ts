import { describe, expect, it } from "vitest";
import {
  authenticate,
  authenticateAsync,
  compareScores,
  scoreIdentity,
  type RegistryView,
} from "./matching_engine.js";
import { DimensionMismatchError, InvalidValueError } from "../../errors.js";
import type { IdentityRecord } from "../../schemas/index.js";
import { record, sample, silenceConsole } from "../../__test-setup__.js";

silenceConsole();

function view(records: IdentityRecord[], dimension = 2, threshold = 0.6): RegistryView {
  return { dimension, threshold, records: () => records };
}

describe("scoreIdentity", () => {
  it("weights the closest sample and the mean distance", () => {
    const score = scoreIdentity([0, 0], record("u", [[1, 0], [0, 2], [4, 0]]));

    expect(score.min_distance).toBe(1);
    expect(score.mean_distance).toBeCloseTo(7 / 3, 12);
    expect(score.score).toBeCloseTo(1.4, 12);
    expect(score.sample_count).toBe(3);
  });

  it("stays between the minimum and the mean distance", () => {
    const score = scoreIdentity([0, 0], record("u", [[3, 0], [0, 5], [1, 1]]));
    expect(score.score).toBeGreaterThanOrEqual(score.min_distance);
    expect(score.score).toBeLessThanOrEqual(score.mean_distance);
  });

  it("does not depend on sample order", () => {
    const vectors = [[0.3, 0.1], [0.7, -0.2], [0.11, 0.05], [-0.4, 0.9]];
    const forward = scoreIdentity([0.2, 0.2], record("u", vectors));
    const reversed = scoreIdentity([0.2, 0.2], record("u", [...vectors].reverse()));
    expect(reversed.score).toBe(forward.score);
  });
});

describe("compareScores", () => {
  const base = { min_distance: 0, mean_distance: 0, sample_count: 1 };

  it("orders by score, then by identity_id", () => {
    const scores = [
      { ...base, identity_id: "b", score: 0.2 },
      { ...base, identity_id: "c", score: 0.1 },
      { ...base, identity_id: "a", score: 0.2 },
    ];
    expect([...scores].sort(compareScores).map((s) => s.identity_id)).toEqual(["c", "a", "b"]);
  });
});

describe("authenticate", () => {
  it("returns no match for an empty registry", () => {
    const result = authenticate([0.1, 0.2], view([]));
    expect(result).toEqual({
      matched_identity: null,
      score: null,
      min_distance: null,
      mean_distance: null,
      confidence: 0,
      threshold: 0.6,
      accepted: false,
      candidates: [],
    });
  });

  it("accepts an exact match even at zero tolerance", () => {
    const alice = record("alice", [[0.5, 0.5], [0.5, 0.5], [0.5, 0.5]]);
    const result = authenticate([0.5, 0.5], view([alice]), { tolerance: 0 });

    expect(result.matched_identity).toBe("alice");
    expect(result.score).toBe(0);
    expect(result.confidence).toBe(1);
    expect(result.accepted).toBe(true);
  });

  it("breaks an exact tie by the smaller identity_id", () => {
    const beta = record("beta", [[0.45, 0]]);
    const alpha = record("alpha", [[-0.45, 0]]);
    const result = authenticate([0, 0], view([beta, alpha]));

    expect(result.matched_identity).toBe("alpha");
    expect(result.score).toBeCloseTo(0.45, 12);
    expect(result.candidates.map((c) => c.identity_id)).toEqual(["alpha", "beta"]);
    expect(result.candidates[0].score).toBe(result.candidates[1].score);
  });

  it("picks the same identity whatever the registry order", () => {
    const records = [
      record("carol", [[1, 1]]),
      record("dave", [[0.2, 0.1], [0.3, 0]]),
      record("erin", [[-1, 0.5]]),
    ];
    const forward = authenticate([0.25, 0.05], view(records));
    const reversed = authenticate([0.25, 0.05], view([...records].reverse()));

    expect(forward.matched_identity).toBe("dave");
    expect(reversed).toEqual(forward);
  });

  it("reports the closest identity when rejecting", () => {
    const result = authenticate([0, 0], view([record("far", [[1, 0]])]));

    expect(result.matched_identity).toBe("far");
    expect(result.score).toBeCloseTo(1, 12);
    expect(result.confidence).toBeCloseTo(0, 12);
    expect(result.accepted).toBe(false);
  });

  it("uses a per-call tolerance over the registry threshold", () => {
    const result = authenticate([0, 0], view([record("far", [[1, 0]])]), { tolerance: 1.5 });
    expect(result.threshold).toBe(1.5);
    expect(result.accepted).toBe(true);
  });

  it("accepts a probe given as an embedding", () => {
    const result = authenticate(sample([0.5, 0.5]), view([record("alice", [[0.5, 0.5]])]));
    expect(result.accepted).toBe(true);
  });

  it("rejects a probe of the wrong dimension before comparing", () => {
    expect(() => authenticate([0.1, 0.2, 0.3], view([]))).toThrow(DimensionMismatchError);
  });

  it("rejects a probe with a non-finite component", () => {
    expect(() => authenticate([0.1, Number.POSITIVE_INFINITY], view([]))).toThrow(InvalidValueError);
  });

  it("rejects a negative tolerance", () => {
    expect(() => authenticate([0, 0], view([]), { tolerance: -0.1 })).toThrow(
      "Tolerance must be a finite non-negative number, got -0.1",
    );
  });
});

describe("authenticateAsync", () => {
  const records = [
    record("carol", [[1, 1]]),
    record("dave", [[0.2, 0.1], [0.3, 0]]),
    record("erin", [[-1, 0.5]]),
  ];

  it("reaches the same decision as authenticate", async () => {
    const registry = view(records);
    const result = await authenticateAsync([0.25, 0.05], registry, { chunkSize: 1 });
    expect(result).toEqual(authenticate([0.25, 0.05], registry));
  });

  it("does not start when the signal is already aborted", async () => {
    await expect(
      authenticateAsync([0, 0], view(records), { signal: AbortSignal.abort() }),
    ).rejects.toMatchObject({ name: "AbortError" });
  });

  it("stops between chunks once aborted", async () => {
    const controller = new AbortController();
    const pending = authenticateAsync([0, 0], view(records), {
      signal: controller.signal,
      chunkSize: 1,
    });
    controller.abort();

    await expect(pending).rejects.toMatchObject({ name: "AbortError" });
  });

  it("rejects a chunk size below 1", async () => {
    await expect(authenticateAsync([0, 0], view(records), { chunkSize: 0 })).rejects.toThrow(
      InvalidValueError,
    );
  });
});
