import { AdvancedPasswordAnalyzer, type AnalysisFlag, type PasswordAnalyzer } from "./analyzer";
import { compareClassifications, type Classification } from "./entropy";
import { PasswordPolicy, type PolicyRule, type RuleKind } from "./policy";
import { CLASSIFICATION_LABELS } from "./report";

export type Entry = { site: string; username: string; password: string };

export type WeakFinding = {
  index: number;
  site: string;
  username: string;
  classification: Classification;
  violations: RuleKind[];
  flags: AnalysisFlag[];
  reasons: string[];
};

export type ReuseGroup = {
  count: number;
  /** `index` is the entry's position in the audited list. */
  sites: { index: number; site: string; username: string }[];
};

export type AuditReport = {
  summary: {
    total: number;
    weak: number;
    reusedGroups: number;
    reusedAccounts: number;
  };
  weakFindings: WeakFinding[];
  reuseGroups: ReuseGroup[];
};

export type AuditOptions = {
  analyzer?: PasswordAnalyzer;
  policy?: PasswordPolicy;
  /** Entries at or below this strength count as weak. Default "Weak". */
  weakAt?: Classification;
};

const FLAG_REASONS: Readonly<Record<AnalysisFlag, string>> = {
  CommonPassword: "Common password",
  RepeatedPattern: "Repeated pattern",
  SequentialRun: "Sequential run",
};

function classReason(min: number, name: string) {
  return min === 1 ? `No ${name}` : `Fewer than ${min} ${name} characters`;
}

export function violationReason(rule: PolicyRule): string {
  switch (rule.kind) {
    case "minLength":
      return `Length < ${rule.value}`;
    case "maxLength":
      return `Length > ${rule.value}`;
    case "requireLowercase":
      return classReason(rule.min, "lowercase");
    case "requireUppercase":
      return classReason(rule.min, "uppercase");
    case "requireDigit":
      return classReason(rule.min, "number");
    case "requireSymbol":
      return classReason(rule.min, "symbol");
    case "maxRepeatedChars":
      return "Repeated characters";
  }
}

export function auditEntries(entries: readonly Entry[], options: AuditOptions = {}): AuditReport {
  const analyzer = options.analyzer ?? new AdvancedPasswordAnalyzer();
  const policy = options.policy ?? new PasswordPolicy();
  const weakAt = options.weakAt ?? "Weak";

  // Weak checks
  const weakFindings: WeakFinding[] = [];
  entries.forEach((e, index) => {
    const analysis = analyzer.analyze(e.password);
    const { violations } = policy.validate(e.password);
    const flags = [...analysis.flags];

    const reasons = policy.rules
      .filter((rule) => violations.includes(rule.kind))
      .map(violationReason);
    for (const flag of flags) reasons.push(FLAG_REASONS[flag]);
    if (compareClassifications(analysis.classification, weakAt) <= 0) {
      reasons.push(`Strength: ${CLASSIFICATION_LABELS[analysis.classification]}`);
    }

    if (reasons.length) {
      weakFindings.push({
        index,
        site: e.site,
        username: e.username,
        classification: analysis.classification,
        violations: [...violations],
        flags,
        reasons,
      });
    }
  });

  // Reuse detection on exact password matches; empty passwords are not grouped
  const bySecret = new Map<string, ReuseGroup["sites"]>();
  entries.forEach((e, index) => {
    if (!e.password) return;
    const sites = bySecret.get(e.password) ?? [];
    sites.push({ index, site: e.site, username: e.username });
    bySecret.set(e.password, sites);
  });

  const reuseGroups: ReuseGroup[] = [];
  for (const [, sites] of bySecret) {
    if (sites.length >= 2) reuseGroups.push({ count: sites.length, sites });
  }
  reuseGroups.sort((a, b) => b.count - a.count);

  return {
    summary: {
      total: entries.length,
      weak: weakFindings.length,
      reusedGroups: reuseGroups.length,
      reusedAccounts: reuseGroups.reduce((acc, g) => acc + g.count, 0),
    },
    weakFindings,
    reuseGroups,
  };
}
