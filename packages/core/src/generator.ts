import { ALPHABETS, CHAR_CLASSES, classify, type CharClass } from "./classifier";
import { GenerationError, InvalidInputError } from "./errors";
import { Password } from "./password";
import type { PasswordPolicy, PolicyRequirements } from "./policy";
import { cryptoRandom, randomIndex, shuffle, type RandomSource } from "./random";

export const DEFAULT_GENERATED_LENGTH = 16;
export const DEFAULT_MAX_ATTEMPTS = 10;

export type GeneratorOptions = {
  random?: RandomSource;
  /** Used when `generate` is called without a length. */
  length?: number;
  /** Classes filler characters are drawn from; classes the policy requires are always added. */
  include?: readonly CharClass[];
  /** Per-class character sets; every character must belong to its class. */
  alphabets?: Partial<Record<CharClass, string>>;
};

export type GenerateOptions = {
  length?: number;
  maxAttempts?: number;
};

// "any" slots draw from every included class
type Slot = CharClass | "any";

export class PasswordGenerator {
  readonly policy: PasswordPolicy;
  private readonly random: RandomSource;
  private readonly defaultLength: number;
  private readonly alphabets: Readonly<Record<CharClass, string[]>>;
  private readonly fillerClasses: readonly CharClass[];

  constructor(policy: PasswordPolicy, options: GeneratorOptions = {}) {
    this.policy = policy;
    this.random = options.random ?? cryptoRandom;
    this.defaultLength = options.length ?? DEFAULT_GENERATED_LENGTH;

    const alphabets: Record<CharClass, string[]> = { lower: [], upper: [], digit: [], symbol: [] };
    for (const cls of CHAR_CLASSES) {
      const chars = Array.from(new Set(options.alphabets?.[cls] ?? ALPHABETS[cls]));
      if (chars.length === 0) throw new InvalidInputError(`Alphabet for ${cls} is empty`);
      const stray = chars.find((ch) => !classify(ch).has(cls));
      if (stray !== undefined) {
        throw new InvalidInputError(`Character ${JSON.stringify(stray)} is not in class ${cls}`);
      }
      alphabets[cls] = chars;
    }
    this.alphabets = alphabets;

    const { classMinimums } = policy.requirements();
    const include = new Set(options.include ?? CHAR_CLASSES);
    this.fillerClasses = CHAR_CLASSES.filter((cls) => include.has(cls) || classMinimums[cls] > 0);
    if (this.fillerClasses.length === 0) {
      throw new InvalidInputError("At least one character class must be included");
    }
  }

  generate(options: GenerateOptions = {}): Password {
    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new InvalidInputError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }

    const req = this.policy.requirements();
    const length = this.resolveLength(req, options.length);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const candidate = Password.of(this.candidate(req, length));
      if (this.policy.validate(candidate).passed) return candidate;
    }
    throw new GenerationError(maxAttempts);
  }

  private resolveLength(req: PolicyRequirements, requested: number | undefined): number {
    if (requested !== undefined) {
      if (!Number.isInteger(requested) || requested < 0) {
        throw new InvalidInputError(`Length must be a non-negative integer, got ${requested}`);
      }
      if (requested < req.minLength) {
        throw new InvalidInputError(`Length ${requested} is below the policy minimum of ${req.minLength}`);
      }
      if (req.maxLength !== undefined && requested > req.maxLength) {
        throw new InvalidInputError(`Length ${requested} is above the policy maximum of ${req.maxLength}`);
      }
      return requested;
    }
    const length = Math.max(this.defaultLength, req.minLength);
    return req.maxLength === undefined ? length : Math.min(length, req.maxLength);
  }

  private candidate(req: PolicyRequirements, length: number): string {
    // Required classes get their slots up front; the rest is filler.
    const slots: Slot[] = [];
    for (const cls of CHAR_CLASSES) {
      for (let i = 0; i < req.classMinimums[cls]; i++) slots.push(cls);
    }
    while (slots.length < length) slots.push("any");
    shuffle(slots, this.random);

    const filler = this.fillerClasses.flatMap((cls) => this.alphabets[cls]);
    const maxRun = req.maxRepeatedChars === undefined ? Infinity : req.maxRepeatedChars + 1;

    const out: string[] = [];
    let run = 0;
    for (const slot of slots) {
      const pool = slot === "any" ? filler : this.alphabets[slot];
      const last = out[out.length - 1];
      const allowed = run >= maxRun ? pool.filter((ch) => ch !== last) : pool;
      // An exhausted pool yields a non-compliant candidate; validation rejects it.
      const choices = allowed.length > 0 ? allowed : pool;
      const ch = choices[randomIndex(this.random, choices.length)];
      run = ch === last ? run + 1 : 1;
      out.push(ch);
    }
    return out.join("");
  }
}
