import { describe, expect, it } from "vitest";
import { dedupeRecords } from "../src/records/dedupe.js";
import { makeRecord } from "./helpers.js";

describe("dedupeRecords", () => {
  it("keeps the first occurrence of each id in input order", () => {
    const records = [
      makeRecord("A", "first A", 0),
      makeRecord("B", "only B", 1),
      makeRecord("A", "second A", 2),
      makeRecord("C", "only C", 3)
    ];
    const { unique, duplicates } = dedupeRecords(records);

    expect(unique.map((record) => record.id)).toEqual(["A", "B", "C"]);
    expect(unique[0].narrative).toBe("first A");
    expect(duplicates).toEqual([{ kind: "duplicate_record", id: "A", droppedRowIndex: 2, keptRowIndex: 0 }]);
  });

  it("returns an empty result for no records", () => {
    expect(dedupeRecords([])).toEqual({ unique: [], duplicates: [] });
  });

  it("does not merge ids that differ only in case", () => {
    const { unique } = dedupeRecords([makeRecord("a1", "x", 0), makeRecord("A1", "y", 1)]);
    expect(unique).toHaveLength(2);
  });
});
