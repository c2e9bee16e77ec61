import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import {
  validateConfig,
  createRateTable,
  checkRateTable,
  lookupRate,
  rateTableToRecord,
} from "../../src/ledger/rates.js";

describe("validateConfig", () => {
  it("parses name: value lines", () => {
    const { table, errors } = validateConfig("Java: 10\nBaxa: 1.5%\n  Big Rig  : 2");
    assert.deepStrictEqual(errors, []);
    assert.equal(table.method, "percentage");
    assert.deepStrictEqual(lookupRate(table, "java"), { entity: "Java", rate: 10 });
    assert.deepStrictEqual(lookupRate(table, "baxa"), { entity: "Baxa", rate: 1.5 });
    assert.deepStrictEqual(lookupRate(table, "big rig"), { entity: "Big Rig", rate: 2 });
  });

  it("keeps valid lines when one line is malformed", () => {
    const { table, errors } = validateConfig("Java: 10\nBaxa: lots\nMira: 12\nOtto: 3");
    assert.equal(table.entries.size, 3);
    assert.equal(errors.length, 1);
    assert.equal(errors[0].rule, "non-numeric-rate");
    assert.equal(errors[0].line, 2);
    assert.equal(errors[0].text, "Baxa: lots");
  });

  it("reports each kind of bad line", () => {
    const { table, errors } = validateConfig("no separator\n: 5\nJava: 150\nMira: -1\n\nOtto: 7");
    assert.deepStrictEqual(
      errors.map((e) => [e.line, e.rule]),
      [
        [1, "missing-separator"],
        [2, "empty-entity"],
        [3, "rate-out-of-range"],
        [4, "rate-out-of-range"],
      ]
    );
    assert.deepStrictEqual(rateTableToRecord(table), { Otto: 7 });
  });

  it("allows rates above 100 for flat rates", () => {
    const { table, errors } = validateConfig("Java: $1,250", "flat_rate");
    assert.deepStrictEqual(errors, []);
    assert.equal(table.method, "flat_rate");
    assert.equal(lookupRate(table, "java")?.rate, 1250);
  });

  it("lets a later line override an earlier one for the same entity", () => {
    const { table } = validateConfig("Java: 10\nJAVA: 12");
    assert.deepStrictEqual(rateTableToRecord(table), { JAVA: 12 });
  });

  it("never throws on empty input", () => {
    const { table, errors } = validateConfig("");
    assert.equal(table.entries.size, 0);
    assert.deepStrictEqual(errors, []);
  });
});

describe("checkRateTable", () => {
  it("passes a valid table", () => {
    assert.deepStrictEqual(checkRateTable(createRateTable("percentage", { Java: 10 })), []);
  });

  it("rejects an empty table unless the method is sum_only", () => {
    assert.ok(checkRateTable(createRateTable("percentage", {})).some((e) => e.rule === "empty-table"));
    assert.deepStrictEqual(checkRateTable(createRateTable("sum_only", {})), []);
  });

  it("rejects out-of-range and non-finite rates", () => {
    const errors = checkRateTable(createRateTable("percentage", { Java: 120, Mira: Number.NaN }));
    assert.ok(errors.some((e) => e.rule === "rate-out-of-range" && e.message.includes("Java")));
    assert.ok(errors.some((e) => e.rule === "invalid-rate" && e.message.includes("Mira")));
  });

  it("rejects negative flat rates", () => {
    const errors = checkRateTable(createRateTable("flat_rate", { Java: -5 }));
    assert.ok(errors.some((e) => e.rule === "rate-out-of-range"));
  });
});
