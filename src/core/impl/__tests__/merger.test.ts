import { describe, expect, it } from "vitest";
import {
  InvalidPolicyConfigurationError,
  NegativeCountError,
  PolicyMerger,
  frequencyRecord,
  termIdentity,
  termKey,
  type SourceTable,
  type UnifiedCounts,
} from "../../../index.js";

function table(source: string, rows: Array<[string, number] | [string, number, string]>): SourceTable {
  return {
    source,
    records: rows.map(([surface, count, reading]) => frequencyRecord(termIdentity(surface, reading), count, source)),
  };
}

function countsOf(unified: UnifiedCounts): Record<string, number> {
  const out: Record<string, number> = {};
  for (const { identity, count } of unified.values()) {
    out[identity.reading === undefined ? identity.surface : `${identity.surface}[${identity.reading}]`] = count;
  }
  return out;
}

function totalMass(records: Iterable<{ count: number }>): number {
  let n = 0;
  for (const r of records) n += r.count;
  return n;
}

describe("PolicyMerger", () => {
  const merger = new PolicyMerger();

  it("sums counts across sources for ADDITIVE", () => {
    const out = merger.merge({ mode: "ADDITIVE" }, [table("A", [["火", 10], ["水", 1]]), table("B", [["火", 5]])]);
    expect(countsOf(out)).toEqual({ 火: 15, 水: 1 });
  });

  it("keeps only the preferred source count for EXCLUSIVE_PREFERRED", () => {
    const out = merger.merge({ mode: "EXCLUSIVE_PREFERRED", priority: ["LUW", "SUW"] }, [
      table("SUW", [["火曜日", 3], ["火", 40]]),
      table("LUW", [["火曜日", 8]]),
    ]);
    expect(countsOf(out)).toEqual({ 火曜日: 8, 火: 40 });
  });

  it("returns the sole count for SINGLE", () => {
    const out = merger.merge({ mode: "SINGLE" }, [table("SUW", [["本", 100], ["家", 50]])]);
    expect(countsOf(out)).toEqual({ 本: 100, 家: 50 });
  });

  it("adds up repeated rows within one source before applying the policy", () => {
    const out = merger.merge({ mode: "EXCLUSIVE_PREFERRED", priority: ["SUW", "LUW"] }, [
      table("SUW", [["の", 7], ["の", 3]]),
      table("LUW", [["の", 100]]),
    ]);
    expect(countsOf(out)).toEqual({ の: 10 });
  });

  it("treats different readings as different terms", () => {
    const out = merger.merge({ mode: "ADDITIVE" }, [
      table("A", [["生", 5, "なま"], ["生", 2, "せい"]]),
      table("B", [["生", 1, "なま"], ["生", 4]]),
    ]);
    expect(countsOf(out)).toEqual({ "生[なま]": 6, "生[せい]": 2, 生: 4 });
  });

  it("does not depend on the order of tables or records", () => {
    const policy = { mode: "EXCLUSIVE_PREFERRED", priority: ["SUW", "LUW"] } as const;
    const suw = table("SUW", [["本", 100], ["家", 50], ["山", 9]]);
    const luw = table("LUW", [["本", 20], ["新しい家", 30], ["山", 12]]);
    const reversed = (t: SourceTable): SourceTable => ({ source: t.source, records: [...t.records].reverse() });

    const a = merger.merge(policy, [suw, luw]);
    const b = merger.merge(policy, [reversed(luw), reversed(suw)]);
    expect(b).toEqual(a);
    expect(countsOf(a)).toEqual({ 本: 100, 家: 50, 山: 9, 新しい家: 30 });
  });

  it("never exceeds the combined mass of the sources for EXCLUSIVE_PREFERRED", () => {
    const suw = table("SUW", [["a", 5], ["b", 7], ["c", 1]]);
    const luw = table("LUW", [["a", 9], ["b", 2], ["d", 4]]);
    const out = merger.merge({ mode: "EXCLUSIVE_PREFERRED", priority: ["SUW", "LUW"] }, [suw, luw]);
    const merged = totalMass(out.values());
    // SUW mass 13 + LUW-only mass 4
    expect(merged).toBe(17);
    expect(merged).toBeLessThan(totalMass(suw.records) + totalMass(luw.records));
  });

  it("keeps each overlapping term within the preferred source's mass", () => {
    const suw = table("SUW", [["本", 40], ["家", 12], ["木", 3]]);
    const luw = table("LUW", [["本", 55], ["家", 1], ["新しい家", 8]]);
    const out = merger.merge({ mode: "EXCLUSIVE_PREFERRED", priority: ["SUW", "LUW"] }, [suw, luw]);

    const overlapping = ["本", "家"];
    const massOn = (t: SourceTable) => totalMass([...t.records].filter((r) => overlapping.includes(r.identity.surface)));
    const unified = totalMass(overlapping.map((surface) => out.get(termKey(termIdentity(surface))) ?? { count: 0 }));

    // 52 from SUW; LUW holds 56 on the same terms, their sum 108
    expect(unified).toBe(massOn(suw));
    expect(unified).toBeLessThanOrEqual(Math.max(massOn(suw), massOn(luw)));
    for (const surface of overlapping) {
      const count = out.get(termKey(termIdentity(surface)))?.count;
      const perSource = [suw, luw].map((t) => [...t.records].find((r) => r.identity.surface === surface)?.count);
      expect(perSource).toContain(count);
    }
  });

  it("groups only identical identities, whatever characters they contain", () => {
    const records = [
      frequencyRecord(termIdentity("x", "\u0001"), 3, "A"),
      frequencyRecord(termIdentity("x"), 4, "A"),
      frequencyRecord(termIdentity("a\u0000b"), 5, "A"),
      frequencyRecord(termIdentity("a", "b\u0000\u0001"), 6, "A"),
    ];
    const out = merger.merge({ mode: "SINGLE" }, [{ source: "A", records }]);
    expect(out.size).toBe(4);
    expect(out.get(termKey(termIdentity("x")))?.count).toBe(4);
    expect(out.get(termKey(termIdentity("x", "\u0001")))?.count).toBe(3);
  });

  it("is a no-op when re-merging a unified mapping through SINGLE", () => {
    const first = merger.merge({ mode: "ADDITIVE" }, [table("A", [["火", 10]]), table("B", [["火", 5], ["水", 2]])]);
    const again = merger.merge({ mode: "SINGLE" }, [
      { source: "ALL", records: [...first.values()].map((u) => frequencyRecord(u.identity, u.count, "ALL")) },
    ]);
    expect(again).toEqual(first);
  });

  it("does not mutate its input records", () => {
    const t = table("A", [["火", 10]]);
    merger.merge({ mode: "ADDITIVE" }, [t, table("B", [["火", 5]])]);
    expect([...t.records][0]).toEqual({ identity: { surface: "火" }, count: 10, source: "A" });
  });

  it("keys the output by term identity", () => {
    const out = merger.merge({ mode: "SINGLE" }, [table("A", [["火", 1, "ひ"]])]);
    expect(out.get(termKey(termIdentity("火", "ひ")))?.count).toBe(1);
    expect(out.get(termKey(termIdentity("火")))).toBeUndefined();
  });

  it("rejects EXCLUSIVE_PREFERRED without a priority order", () => {
    expect(() => merger.merge({ mode: "EXCLUSIVE_PREFERRED", priority: [] }, [table("SUW", [["本", 1]])])).toThrow(
      InvalidPolicyConfigurationError,
    );
  });

  it("rejects a source missing from the priority order", () => {
    expect(() =>
      merger.merge({ mode: "EXCLUSIVE_PREFERRED", priority: ["SUW"] }, [table("SUW", [["本", 1]]), table("LUW", [["本", 1]])]),
    ).toThrow('source "LUW" is not in the priority order [SUW]');
  });

  it("rejects a record whose tag differs from its table", () => {
    const bad: SourceTable = { source: "SUW", records: [frequencyRecord(termIdentity("本"), 1, "LUW")] };
    expect(() => merger.merge({ mode: "ADDITIVE" }, [bad])).toThrow(InvalidPolicyConfigurationError);
  });

  it("rejects SINGLE with two source tables", () => {
    expect(() => merger.merge({ mode: "SINGLE" }, [table("A", []), table("B", [])])).toThrow(
      "SINGLE policy expects one source table, got 2: A, B",
    );
  });

  it("rejects negative counts", () => {
    expect(() => merger.merge({ mode: "ADDITIVE" }, [table("A", [["本", 3], ["家", -1]])])).toThrow(NegativeCountError);
    expect(() => merger.merge({ mode: "ADDITIVE" }, [table("A", [["家", -1]])])).toThrow(
      'source A reports count -1 for "家"',
    );
  });

  it("returns an empty mapping for empty tables", () => {
    expect(merger.merge({ mode: "ADDITIVE" }, []).size).toBe(0);
  });
});
