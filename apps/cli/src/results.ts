import {
  describeViolation,
  type AuditReport,
  type PasswordPolicy,
  type WeakFinding,
} from "@passgauge/core";
import type { ExportEntry } from "./csv";

export type IssueMode = "all" | "reuse" | "weak";
export type SortMode = "risk" | "domain" | "reuseCount";
export type Risk = "LOW" | "MEDIUM" | "HIGH";

export type ResultRow = {
  key: string;
  site: string;
  domain: string;
  username: string;
  url?: string;
  reuseCount: number;
  weakReasons: string[];
  isWeak: boolean;
  risk: Risk;
  fixes: string[];
};

export type ResultOptions = {
  policy: PasswordPolicy;
  issueMode?: IssueMode;
  sortMode?: SortMode;
  query?: string;
  mask?: boolean;
};

export function keyOf(site: string, username: string) {
  return `${site}||${username}`;
}

export function isDevUrl(url: string) {
  const devUrlRegex =
    /(^https?:\/\/localhost\b)|(^https?:\/\/127\.0\.0\.1\b)|(^https?:\/\/0\.0\.0\.0\b)|(^https?:\/\/192\.168\.)|(^https?:\/\/10\.)|(^https?:\/\/172\.(1[6-9]|2\d|3[0-1])\.)/i;
  return devUrlRegex.test(url);
}

export function asDomainLabel(site: string) {
  if (/^https?:\/\//i.test(site) && URL.canParse(site)) {
    return new URL(site).hostname || site;
  }
  return site;
}

export function riskLabel(reuseCount: number, isWeak: boolean): Risk {
  if (reuseCount >= 10 && isWeak) return "HIGH";
  if (reuseCount >= 2 && isWeak) return "MEDIUM";
  if (reuseCount >= 10) return "MEDIUM";
  if (isWeak) return "MEDIUM";
  return "LOW";
}

export function riskScore(reuseCount: number, isWeak: boolean) {
  return reuseCount * 10 + (isWeak ? 15 : 0);
}

export function fixTextFor(
  reuseCount: number,
  finding: WeakFinding | undefined,
  policy: PasswordPolicy
) {
  const fixes: string[] = [];

  if (reuseCount >= 2) {
    fixes.push(
      `Change this password so it is unique (currently reused across ${reuseCount} accounts).`
    );
  }

  if (finding) {
    for (const rule of policy.rules) {
      if (finding.violations.includes(rule.kind)) fixes.push(`${describeViolation(rule)}.`);
    }
    if (finding.flags.includes("CommonPassword")) {
      fixes.push("Replace it: this password appears on common-password lists.");
    }
    if (finding.flags.includes("RepeatedPattern") || finding.flags.includes("SequentialRun")) {
      fixes.push("Avoid common patterns (sequences, keyboard runs, repeats).");
    }
    if (finding.reasons.some((r) => r.startsWith("Strength:"))) {
      fixes.push("Make it longer and mix more kinds of characters.");
    }
  }

  if (!fixes.length) fixes.push("No action needed based on current checks.");

  return fixes;
}

export function maskDomain(domain: string) {
  // Keep TLD, mask the rest
  const parts = domain.split(".");
  if (parts.length <= 1) return "site.example";
  return `site.${parts[parts.length - 1]}`;
}

export function maskUsername(username: string) {
  if (!username) return "";
  // email? keep domain, mask local part
  const at = username.indexOf("@");
  if (at >= 0) return `user@${username.slice(at + 1) || "example.com"}`;
  return "user";
}

export function buildResults(
  entries: readonly ExportEntry[],
  report: AuditReport,
  options: ResultOptions
): ResultRow[] {
  const issueMode = options.issueMode ?? "all";
  const sortMode = options.sortMode ?? "risk";
  const q = (options.query ?? "").trim().toLowerCase();

  const reuseCountByIndex = new Map<number, number>();
  for (const g of report.reuseGroups) {
    for (const s of g.sites) reuseCountByIndex.set(s.index, g.count);
  }
  const findingByIndex = new Map(report.weakFindings.map((f) => [f.index, f]));

  const results: ResultRow[] = [];
  entries.forEach((e, index) => {
    const k = keyOf(e.site, e.username);
    const reuseCount = reuseCountByIndex.get(index) ?? 0;
    const finding = findingByIndex.get(index);
    const weakReasons = finding?.reasons ?? [];
    const isWeak = weakReasons.length > 0;

    if (issueMode === "reuse" && reuseCount < 2) return;
    if (issueMode === "weak" && !isWeak) return;

    const domain = asDomainLabel(e.site);
    if (q) {
      const hay = `${domain} ${e.site} ${e.username} ${e.url ?? ""}`.toLowerCase();
      if (!hay.includes(q)) return;
    }

    results.push({
      key: k,
      site: options.mask ? maskDomain(domain) : e.site,
      domain: options.mask ? maskDomain(domain) : domain,
      username: options.mask ? maskUsername(e.username) : e.username,
      url: options.mask ? undefined : e.url,
      reuseCount,
      weakReasons,
      isWeak,
      risk: riskLabel(reuseCount, isWeak),
      fixes: fixTextFor(reuseCount, finding, options.policy),
    });
  });

  results.sort((a, b) => {
    if (sortMode === "domain") return a.domain.localeCompare(b.domain);
    if (sortMode === "reuseCount") return b.reuseCount - a.reuseCount;
    return riskScore(b.reuseCount, b.isWeak) - riskScore(a.reuseCount, a.isWeak);
  });

  return results;
}

export function formatResults(report: AuditReport, rows: readonly ResultRow[]): string {
  const { total, weak, reusedGroups, reusedAccounts } = report.summary;
  const lines = [
    `Audited ${total} accounts: ${weak} weak, ${reusedGroups} reused ${
      reusedGroups === 1 ? "password" : "passwords"
    } (${reusedAccounts} accounts)`,
  ];
  for (const r of rows) {
    const issues = [...(r.reuseCount >= 2 ? [`reused x${r.reuseCount}`] : []), ...r.weakReasons];
    lines.push("");
    lines.push(`[${r.risk}] ${r.domain} ${r.username || "(no username)"}`);
    if (issues.length) lines.push(`  issues: ${issues.join("; ")}`);
    for (const fix of r.fixes) lines.push(`  fix: ${fix}`);
  }
  return lines.join("\n");
}
