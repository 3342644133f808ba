import { CommonPasswordChecker } from "./common";
import { EntropyScorer, capClassification, type Classification } from "./entropy";
import { Password, type PasswordInput } from "./password";
import { PatternDetector, type PatternFlag } from "./patterns";

export type AnalysisFlag = "CommonPassword" | PatternFlag;

export type CheckName = "entropy" | "commonPassword" | "repeatedPattern" | "sequentialRun";

export type AnalyzerKind = "basic" | "advanced";

export type AnalysisResult = Readonly<{
  analyzer: AnalyzerKind;
  masked: string;
  length: number;
  score: number;
  classification: Classification;
  entropyBits: number;
  flags: ReadonlySet<AnalysisFlag>;
  details: Readonly<Partial<Record<CheckName, string>>>;
}>;

/** Anything that can turn a password into an {@link AnalysisResult}. */
export type PasswordAnalyzer = {
  readonly kind: AnalyzerKind;
  analyze(password: PasswordInput): AnalysisResult;
};

export type AnalyzerOptions = {
  scorer?: EntropyScorer;
  commonPasswords?: CommonPasswordChecker;
  patterns?: PatternDetector;
};

// Ceilings applied on top of the entropy bucket; the score itself is never recomputed.
const COMMON_PASSWORD_CEILING: Classification = "Weak";
const PATTERN_CEILING: Classification = "Moderate";

function rejectChange(): never {
  throw new TypeError("Analysis flags are read-only");
}

// Object.freeze leaves a Set's contents writable, so the mutators are shadowed too.
function lockFlags(flags: Set<AnalysisFlag>): ReadonlySet<AnalysisFlag> {
  for (const method of ["add", "delete", "clear"] as const) {
    Object.defineProperty(flags, method, { value: rejectChange });
  }
  return Object.freeze(flags);
}

function freezeResult(
  result: Omit<AnalysisResult, "flags"> & { flags: Set<AnalysisFlag> }
): AnalysisResult {
  Object.freeze(result.details);
  return Object.freeze({ ...result, flags: lockFlags(result.flags) });
}

export class BasicPasswordAnalyzer implements PasswordAnalyzer {
  readonly kind = "basic";
  private readonly scorer: EntropyScorer;
  private readonly commonPasswords: CommonPasswordChecker;

  constructor(options: AnalyzerOptions = {}) {
    this.scorer = options.scorer ?? new EntropyScorer();
    this.commonPasswords = options.commonPasswords ?? CommonPasswordChecker.withDefaults();
  }

  analyze(password: PasswordInput): AnalysisResult {
    const pw = Password.of(password);
    const { entropyBits, score, classification } = this.scorer.score(pw);
    const flags = new Set<AnalysisFlag>();
    const details: Partial<Record<CheckName, string>> = {
      entropy: `${entropyBits} bits`,
    };

    let verdict = classification;
    if (this.commonPasswords.isCommon(pw)) {
      flags.add("CommonPassword");
      details.commonPassword = "found in the common-password list";
      verdict = capClassification(verdict, COMMON_PASSWORD_CEILING);
    }

    return freezeResult({
      analyzer: this.kind,
      masked: pw.masked,
      length: pw.length,
      score,
      classification: verdict,
      entropyBits,
      flags,
      details,
    });
  }
}

/** Basic analysis plus pattern detection; any pattern caps the verdict at Moderate. */
export class AdvancedPasswordAnalyzer implements PasswordAnalyzer {
  readonly kind = "advanced";
  private readonly basic: BasicPasswordAnalyzer;
  private readonly patterns: PatternDetector;

  constructor(options: AnalyzerOptions = {}) {
    this.basic = new BasicPasswordAnalyzer(options);
    this.patterns = options.patterns ?? new PatternDetector();
  }

  analyze(password: PasswordInput): AnalysisResult {
    const pw = Password.of(password);
    const base = this.basic.analyze(pw);
    const findings = this.patterns.inspect(pw);

    const flags = new Set<AnalysisFlag>(base.flags);
    for (const flag of findings.flags) flags.add(flag);

    const details: Partial<Record<CheckName, string>> = { ...base.details };
    if (findings.repeatedPattern) details.repeatedPattern = findings.repeatedPattern;
    if (findings.sequentialRun) details.sequentialRun = findings.sequentialRun;

    const classification =
      findings.flags.size > 0
        ? capClassification(base.classification, PATTERN_CEILING)
        : base.classification;

    return freezeResult({ ...base, analyzer: this.kind, classification, flags, details });
  }
}

export function createAnalyzer(kind: AnalyzerKind, options: AnalyzerOptions = {}): PasswordAnalyzer {
  switch (kind) {
    case "basic":
      return new BasicPasswordAnalyzer(options);
    case "advanced":
      return new AdvancedPasswordAnalyzer(options);
  }
}
