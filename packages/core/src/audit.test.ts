import { describe, it, expect } from "vitest";
import { BasicPasswordAnalyzer } from "./analyzer";
import { auditEntries, violationReason, type Entry } from "./audit";
import { PasswordPolicy } from "./policy";

const entries: Entry[] = [
  { site: "mail", username: "ann", password: "password" },
  { site: "bank", username: "ann", password: "Tr0ub4dor&3xQ" },
  { site: "shop", username: "bob", password: "Tr0ub4dor&3xQ" },
  { site: "forum", username: "cy", password: "password" },
];

describe("auditEntries", () => {
  const report = auditEntries(entries);

  it("summarises weak and reused entries", () => {
    expect(report.summary).toEqual({ total: 4, weak: 2, reusedGroups: 2, reusedAccounts: 4 });
  });

  it("explains why an entry is weak", () => {
    expect(report.weakFindings[0]).toEqual({
      index: 0,
      site: "mail",
      username: "ann",
      classification: "Weak",
      violations: ["requireUppercase", "requireDigit", "requireSymbol"],
      flags: ["CommonPassword"],
      reasons: ["No uppercase", "No number", "No symbol", "Common password", "Strength: Weak"],
    });
    expect(report.weakFindings.map((f) => f.index)).toEqual([0, 3]);
  });

  it("groups identical passwords", () => {
    expect(report.reuseGroups).toEqual([
      {
        count: 2,
        sites: [
          { index: 0, site: "mail", username: "ann" },
          { index: 3, site: "forum", username: "cy" },
        ],
      },
      {
        count: 2,
        sites: [
          { index: 1, site: "bank", username: "ann" },
          { index: 2, site: "shop", username: "bob" },
        ],
      },
    ]);
  });

  it("keeps rows that share a site and username apart", () => {
    const twin = auditEntries([
      { site: "mail", username: "ann", password: "Xk7$qPz2!mWv" },
      { site: "mail", username: "ann", password: "Zp4#rTq8@nLw" },
      { site: "bank", username: "bob", password: "Xk7$qPz2!mWv" },
    ]);
    expect(twin.reuseGroups).toEqual([
      {
        count: 2,
        sites: [
          { index: 0, site: "mail", username: "ann" },
          { index: 2, site: "bank", username: "bob" },
        ],
      },
    ]);
  });

  it("orders reuse groups by size", () => {
    const more = auditEntries([
      ...entries,
      { site: "blog", username: "dee", password: "Tr0ub4dor&3xQ" },
    ]);
    expect(more.reuseGroups.map((g) => g.count)).toEqual([3, 2]);
    expect(more.summary.reusedAccounts).toBe(5);
  });

  it("does not group empty passwords", () => {
    const empty = auditEntries([
      { site: "a", username: "x", password: "" },
      { site: "b", username: "y", password: "" },
    ]);
    expect(empty.reuseGroups).toEqual([]);
    expect(empty.weakFindings[0].reasons).toEqual([
      "Length < 8",
      "No uppercase",
      "No lowercase",
      "No number",
      "No symbol",
      "Strength: Very weak",
    ]);
  });

  it("uses the analyzer and policy it is given", () => {
    const custom = auditEntries(entries, {
      analyzer: new BasicPasswordAnalyzer(),
      policy: new PasswordPolicy([{ kind: "minLength", value: 10 }]),
    });
    expect(custom.weakFindings.map((f) => f.reasons)).toEqual([
      ["Length < 10", "Common password", "Strength: Weak"],
      ["Length < 10", "Common password", "Strength: Weak"],
    ]);
  });
});

describe("violationReason", () => {
  it("names class minimums above one", () => {
    expect(violationReason({ kind: "requireDigit", min: 3 })).toBe("Fewer than 3 number characters");
    expect(violationReason({ kind: "maxRepeatedChars", value: 0 })).toBe("Repeated characters");
  });
});
