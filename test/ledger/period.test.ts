import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { segmentPeriods, comparePeriods } from "../../src/ledger/period.js";
import { UNASSIGNED_PERIOD } from "../../src/ledger/types.js";
import type { RawRow } from "../../src/ledger/types.js";

const options = { markerColumn: "Broker", amountColumns: ["Amount"] };

function labels(rows: RawRow[]): (string | null)[] {
  return segmentPeriods(rows, options).map((a) => (a.marker ? null : a.period.label));
}

describe("segmentPeriods", () => {
  it("forward-fills the label from each marker", () => {
    const rows: RawRow[] = [
      { Broker: "WEEK 4", Amount: null },
      { Broker: "TQL", Amount: "100" },
      { Broker: "CH Robinson", Amount: "50" },
      { Broker: "week 5", Amount: "" },
      { Broker: "TQL", Amount: "200" },
    ];
    assert.deepStrictEqual(labels(rows), [null, "Week 4", "Week 4", null, "Week 5"]);
  });

  it("labels rows before the first marker as unassigned", () => {
    const rows: RawRow[] = [
      { Broker: "TQL", Amount: "75" },
      { Broker: "Week 1", Amount: null },
      { Broker: "TQL", Amount: "20" },
    ];
    const result = segmentPeriods(rows, options);
    assert.equal(result[0].period, UNASSIGNED_PERIOD);
    assert.equal(result[0].marker, false);
    assert.deepStrictEqual(result[2].period, { ordinal: 1, label: "Week 1" });
  });

  it("does not treat a data row mentioning a week as a marker", () => {
    const rows: RawRow[] = [
      { Broker: "Week 2", Amount: null },
      { Broker: "Rebooked from week 9", Amount: "$300" },
    ];
    const result = segmentPeriods(rows, options);
    assert.equal(result[1].marker, false);
    assert.deepStrictEqual(result[1].period, { ordinal: 2, label: "Week 2" });
  });

  it("treats a missing amount cell as empty", () => {
    const rows: RawRow[] = [{ Broker: "Week #3 (Mar 10-16)" }];
    const result = segmentPeriods(rows, options);
    assert.equal(result[0].marker, true);
    assert.deepStrictEqual(result[0].period, { ordinal: 3, label: "Week 3" });
  });

  it("accepts a custom pattern with a single ordinal group", () => {
    const rows: RawRow[] = [
      { Broker: "P7", Amount: null },
      { Broker: "TQL", Amount: "10" },
    ];
    const result = segmentPeriods(rows, { ...options, pattern: /^P(\d+)$/ });
    assert.deepStrictEqual(result[1].period, { ordinal: 7, label: "7" });
  });

  it("finds every marker with a global or sticky pattern", () => {
    const rows: RawRow[] = [
      { Broker: "Week 1", Amount: null },
      { Broker: "Week 2", Amount: null },
      { Broker: "Week 3", Amount: null },
      { Broker: "TQL", Amount: "10" },
    ];
    for (const pattern of [/\b(week)\s*(\d+)/gi, /(week)\s*(\d+)/iy]) {
      const result = segmentPeriods(rows, { ...options, pattern });
      assert.deepStrictEqual(result.map((a) => a.marker), [true, true, true, false]);
      assert.deepStrictEqual(result[3].period, { ordinal: 3, label: "Week 3" });
      assert.equal(pattern.lastIndex, 0);
    }
  });

  it("returns one assignment per row", () => {
    assert.deepStrictEqual(segmentPeriods([], options), []);
  });
});

describe("comparePeriods", () => {
  it("orders unassigned first, then by ordinal", () => {
    const periods = [
      { ordinal: 5, label: "Week 5" },
      UNASSIGNED_PERIOD,
      { ordinal: 4, label: "Week 4" },
    ];
    const sorted = [...periods].sort(comparePeriods).map((p) => p.label);
    assert.deepStrictEqual(sorted, ["Unassigned", "Week 4", "Week 5"]);
  });
});
