import { ALPHABETS, CHAR_CLASSES, classesOf, type CharClass } from "./classifier";
import { InvalidInputError } from "./errors";
import { Password, type PasswordInput } from "./password";

export type Classification = "VeryWeak" | "Weak" | "Moderate" | "Strong" | "VeryStrong";

/** Weakest first. */
export const CLASSIFICATIONS: readonly Classification[] = [
  "VeryWeak",
  "Weak",
  "Moderate",
  "Strong",
  "VeryStrong",
];

export type EntropyScore = {
  entropyBits: number;
  score: number;
  classification: Classification;
};

export type EntropyScorerOptions = {
  poolSizes?: Partial<Record<CharClass, number>>;
};

// [entropy bits, score]; linear in between, 100 past the last point
const BREAKPOINTS: readonly (readonly [number, number])[] = [
  [0, 0],
  [28, 20],
  [36, 40],
  [60, 60],
  [128, 80],
  [160, 100],
];

// lower bound of each bucket, in CLASSIFICATIONS order
const BUCKET_FLOORS = [0, 20, 40, 60, 80] as const;

function round2(n: number) {
  return Math.round(n * 100) / 100;
}

export function scoreForBits(bits: number): number {
  if (bits <= 0) return 0;
  for (let i = 1; i < BREAKPOINTS.length; i++) {
    const [b0, s0] = BREAKPOINTS[i - 1];
    const [b1, s1] = BREAKPOINTS[i];
    if (bits <= b1) return s0 + ((bits - b0) / (b1 - b0)) * (s1 - s0);
  }
  return 100;
}

export function classificationFor(score: number): Classification {
  let bucket = 0;
  BUCKET_FLOORS.forEach((floor, i) => {
    if (score >= floor) bucket = i;
  });
  return CLASSIFICATIONS[bucket];
}

export function compareClassifications(a: Classification, b: Classification): number {
  return CLASSIFICATIONS.indexOf(a) - CLASSIFICATIONS.indexOf(b);
}

/** Lowers `classification` to `ceiling` when it sits above it. */
export function capClassification(
  classification: Classification,
  ceiling: Classification
): Classification {
  return compareClassifications(classification, ceiling) > 0 ? ceiling : classification;
}

export class EntropyScorer {
  private readonly poolSizes: Readonly<Record<CharClass, number>>;

  constructor(options: EntropyScorerOptions = {}) {
    const sizes: Record<CharClass, number> = {
      lower: ALPHABETS.lower.length,
      upper: ALPHABETS.upper.length,
      digit: ALPHABETS.digit.length,
      symbol: ALPHABETS.symbol.length,
    };
    for (const cls of CHAR_CLASSES) {
      const size = options.poolSizes?.[cls];
      if (size === undefined) continue;
      if (!Number.isInteger(size) || size < 1) {
        throw new InvalidInputError(`Pool size for ${cls} must be a positive integer, got ${size}`);
      }
      sizes[cls] = size;
    }
    this.poolSizes = Object.freeze(sizes);
  }

  poolSize(password: PasswordInput): number {
    const pw = Password.of(password);
    let pool = 0;
    for (const cls of classesOf(pw.value)) pool += this.poolSizes[cls];
    return pool;
  }

  score(password: PasswordInput): EntropyScore {
    const pw = Password.of(password);
    if (pw.length === 0) {
      return { entropyBits: 0, score: 0, classification: "VeryWeak" };
    }

    const pool = Math.max(this.poolSize(pw), 2);
    const bits = pw.length * Math.log2(pool);
    const score = round2(Math.min(100, scoreForBits(bits)));

    return {
      entropyBits: round2(bits),
      score,
      classification: classificationFor(score),
    };
  }
}
