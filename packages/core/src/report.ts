import type { AnalysisResult, CheckName, PasswordAnalyzer } from "./analyzer";
import type { Classification } from "./entropy";
import type { PasswordInput } from "./password";
import type { PasswordPolicy, PolicyRule, ValidationResult } from "./policy";

export const CLASSIFICATION_LABELS: Readonly<Record<Classification, string>> = {
  VeryWeak: "Very weak",
  Weak: "Weak",
  Moderate: "Moderate",
  Strong: "Strong",
  VeryStrong: "Very strong",
};

const FINDING_LABELS: readonly (readonly [CheckName, string])[] = [
  ["commonPassword", "Common password"],
  ["repeatedPattern", "Repeated pattern"],
  ["sequentialRun", "Sequential run"],
];

function heading(title: string) {
  return [title, "-".repeat(title.length)];
}

function plural(n: number, word: string) {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

export function describeViolation(rule: PolicyRule): string {
  switch (rule.kind) {
    case "minLength":
      return `Use at least ${plural(rule.value, "character")}`;
    case "maxLength":
      return `Use at most ${plural(rule.value, "character")}`;
    case "requireLowercase":
      return `Add at least ${plural(rule.min, "lowercase letter")}`;
    case "requireUppercase":
      return `Add at least ${plural(rule.min, "uppercase letter")}`;
    case "requireDigit":
      return `Add at least ${plural(rule.min, "number")}`;
    case "requireSymbol":
      return `Add at least ${plural(rule.min, "symbol")}`;
    case "maxRepeatedChars":
      return rule.value === 0
        ? "Do not repeat a character back to back"
        : `Do not repeat a character more than ${plural(rule.value, "time")} in a row`;
  }
}

export function formatAnalysis(result: AnalysisResult): string {
  const lines = [
    ...heading("Password Analysis Report"),
    `Analyzer: ${result.analyzer}`,
    `Password: ${result.masked}`,
    `Length: ${result.length}`,
    `Entropy: ${result.entropyBits} bits`,
    `Score: ${result.score}/100`,
    `Strength: ${CLASSIFICATION_LABELS[result.classification]}`,
    `Flags: ${result.flags.size ? [...result.flags].join(", ") : "none"}`,
  ];

  for (const [check, label] of FINDING_LABELS) {
    const finding = result.details[check];
    if (finding) lines.push(`${label}: ${finding}`);
  }
  return lines.join("\n");
}

export function formatValidation(result: ValidationResult, policy: PasswordPolicy): string {
  const lines = [
    ...heading("Policy Validation"),
    result.passed ? "Result: passed" : `Result: failed (${plural(result.violations.length, "violation")})`,
  ];
  for (const rule of policy.rules) {
    if (result.violations.includes(rule.kind)) lines.push(`- ${describeViolation(rule)}`);
  }
  return lines.join("\n");
}

export function runAnalysis(analyzer: PasswordAnalyzer, password: PasswordInput): string {
  return formatAnalysis(analyzer.analyze(password));
}
