import { z } from "zod";
import { CHAR_CLASSES, countByClass, type CharClass } from "./classifier";
import { PolicyConstructionError } from "./errors";
import { Password, type PasswordInput } from "./password";

const length = z.number().int().min(0);
const classMinimum = z.number().int().min(1).default(1);

export const policyRuleSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("minLength"), value: length }).strict(),
  z.object({ kind: z.literal("maxLength"), value: z.number().int().min(1) }).strict(),
  z.object({ kind: z.literal("requireLowercase"), min: classMinimum }).strict(),
  z.object({ kind: z.literal("requireUppercase"), min: classMinimum }).strict(),
  z.object({ kind: z.literal("requireDigit"), min: classMinimum }).strict(),
  z.object({ kind: z.literal("requireSymbol"), min: classMinimum }).strict(),
  // how many times a character may repeat right after itself; 0 forbids "aa"
  z.object({ kind: z.literal("maxRepeatedChars"), value: length }).strict(),
]);

export type PolicyRule = z.output<typeof policyRuleSchema>;
export type PolicyRuleInput = z.input<typeof policyRuleSchema>;
export type RuleKind = PolicyRule["kind"];

export const REQUIRED_CLASS: Readonly<Partial<Record<RuleKind, CharClass>>> = {
  requireLowercase: "lower",
  requireUppercase: "upper",
  requireDigit: "digit",
  requireSymbol: "symbol",
};

export type PolicyRequirements = {
  /** Shortest length any compliant password can have. */
  minLength: number;
  maxLength?: number;
  classMinimums: Record<CharClass, number>;
  maxRepeatedChars?: number;
};

export type ValidationResult = Readonly<{
  passed: boolean;
  violations: readonly RuleKind[];
}>;

function requirementsOf(rules: readonly PolicyRule[]): PolicyRequirements {
  const classMinimums: Record<CharClass, number> = { lower: 0, upper: 0, digit: 0, symbol: 0 };
  let minLength = 0;
  let maxLength: number | undefined;
  let maxRepeatedChars: number | undefined;

  for (const rule of rules) {
    switch (rule.kind) {
      case "minLength":
        minLength = rule.value;
        break;
      case "maxLength":
        maxLength = rule.value;
        break;
      case "maxRepeatedChars":
        maxRepeatedChars = rule.value;
        break;
      default: {
        const cls = REQUIRED_CLASS[rule.kind];
        if (cls) classMinimums[cls] = rule.min;
      }
    }
  }

  const classTotal = CHAR_CLASSES.reduce((acc, cls) => acc + classMinimums[cls], 0);
  return { minLength: Math.max(minLength, classTotal), maxLength, classMinimums, maxRepeatedChars };
}

const ruleListSchema = z.array(policyRuleSchema).superRefine((rules, ctx) => {
  const seen = new Set<RuleKind>();
  rules.forEach((rule, index) => {
    if (seen.has(rule.kind)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index], message: `duplicate ${rule.kind} rule` });
    }
    seen.add(rule.kind);
  });

  const req = requirementsOf(rules);
  const minRule = rules.find((r) => r.kind === "minLength");
  if (req.maxLength !== undefined && minRule && minRule.value > req.maxLength) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `minLength ${minRule.value} exceeds maxLength ${req.maxLength}`,
    });
  } else if (req.maxLength !== undefined && req.minLength > req.maxLength) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `required characters (${req.minLength}) exceed maxLength ${req.maxLength}`,
    });
  }
});

export const policyConfigSchema = z.object({ rules: z.array(policyRuleSchema) }).strict();

function issuesOf(error: z.ZodError, prefix: (string | number)[] = []): string[] {
  return error.issues.map((issue) => {
    const path = [...prefix, ...issue.path];
    return path.length ? `${path.join(".")}: ${issue.message}` : issue.message;
  });
}

function longestRun(chars: string[]): number {
  let longest = 0;
  let current = 0;
  chars.forEach((ch, i) => {
    current = i > 0 && chars[i - 1] === ch ? current + 1 : 1;
    longest = Math.max(longest, current);
  });
  return longest;
}

export const DEFAULT_POLICY_RULES: readonly PolicyRuleInput[] = [
  { kind: "minLength", value: 8 },
  { kind: "requireUppercase" },
  { kind: "requireLowercase" },
  { kind: "requireDigit" },
  { kind: "requireSymbol" },
];

export class PasswordPolicy {
  readonly rules: readonly PolicyRule[];

  constructor(rules: readonly PolicyRuleInput[] = DEFAULT_POLICY_RULES) {
    const parsed = ruleListSchema.safeParse(rules);
    if (!parsed.success) throw new PolicyConstructionError(issuesOf(parsed.error, ["rules"]));
    this.rules = Object.freeze(parsed.data.map((rule) => Object.freeze(rule)));
  }

  /** Builds a policy from a `{ "rules": [...] }` document, e.g. a parsed JSON file. */
  static fromConfig(config: unknown): PasswordPolicy {
    const parsed = policyConfigSchema.safeParse(config);
    if (!parsed.success) throw new PolicyConstructionError(issuesOf(parsed.error));
    return new PasswordPolicy(parsed.data.rules);
  }

  requirements(): PolicyRequirements {
    return requirementsOf(this.rules);
  }

  validate(password: PasswordInput): ValidationResult {
    const pw = Password.of(password);
    const chars = pw.chars;
    const counts = countByClass(pw.value);

    const holds = (rule: PolicyRule): boolean => {
      switch (rule.kind) {
        case "minLength":
          return pw.length >= rule.value;
        case "maxLength":
          return pw.length <= rule.value;
        case "maxRepeatedChars":
          return longestRun(chars) - 1 <= rule.value;
        case "requireLowercase":
          return counts.lower >= rule.min;
        case "requireUppercase":
          return counts.upper >= rule.min;
        case "requireDigit":
          return counts.digit >= rule.min;
        case "requireSymbol":
          return counts.symbol >= rule.min;
      }
    };

    const violations = this.rules.filter((rule) => !holds(rule)).map((rule) => rule.kind);
    return Object.freeze({ passed: violations.length === 0, violations: Object.freeze(violations) });
  }
}
