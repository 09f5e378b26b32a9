import { describe, expect, it } from "vitest";
import { ID_PREFIXES, kindOf, newId, type EntityKind } from "../src/ids";

describe("newId", () => {
  it("prefixes doctor ids with doc-", () => {
    for (let i = 0; i < 100; i++) {
      expect(newId("doctor").startsWith("doc-")).toBe(true);
    }
  });

  it("does not repeat across 10,000 doctor ids", () => {
    const ids = new Set<string>();
    for (let i = 0; i < 10_000; i++) {
      ids.add(newId("doctor"));
    }
    expect(ids.size).toBe(10_000);
  });

  it("uses a full UUID for record-oriented kinds", () => {
    expect(newId("patient")).toMatch(/^pat-[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(newId("followUp")).toMatch(/^follow-[0-9a-f-]{36}$/);
  });

  it("uses a 12 digit hex token for display-oriented kinds", () => {
    expect(newId("prescription")).toMatch(/^pres-[0-9a-f]{12}$/);
    expect(newId("healthTip")).toMatch(/^tip-[0-9a-f]{12}$/);
    expect(newId("user")).toMatch(/^usr-[0-9a-f]{12}$/);
  });

  it("gives every kind a distinct prefix", () => {
    const prefixes = Object.values(ID_PREFIXES);
    expect(new Set(prefixes).size).toBe(prefixes.length);
  });
});

describe("kindOf", () => {
  it("maps a generated id back to its kind", () => {
    const kinds: EntityKind[] = ["doctor", "patient", "prescription", "medicine", "healthTip", "notification", "followUp", "user"];
    for (const kind of kinds) {
      expect(kindOf(newId(kind))).toBe(kind);
    }
  });

  it("reads seeded identifiers", () => {
    expect(kindOf("med-10")).toBe("medicine");
    expect(kindOf("notif-123456")).toBe("notification");
  });

  it("returns undefined for unknown or missing prefixes", () => {
    expect(kindOf("abc")).toBeUndefined();
    expect(kindOf("-123")).toBeUndefined();
    expect(kindOf("rx-123")).toBeUndefined();
  });
});
