import { Password, type PasswordInput } from "./password";

export type PatternFlag = "RepeatedPattern" | "SequentialRun";

export type PatternFindings = {
  flags: ReadonlySet<PatternFlag>;
  /** e.g. `"ab" x4` */
  repeatedPattern?: string;
  sequentialRun?: string;
};

export type PatternDetectorOptions = {
  /** Also treat runs of adjacent keys ("qwe", "lkj") as sequential. Default true. */
  keyboard?: boolean;
};

const KEYBOARD_ROWS = ["1234567890", "qwertyuiop", "asdfghjkl", "zxcvbnm"];

const KEY_POSITIONS = new Map<string, { row: number; col: number }>();
KEYBOARD_ROWS.forEach((keys, row) => {
  Array.from(keys).forEach((key, col) => KEY_POSITIONS.set(key, { row, col }));
});

// Direction (+1 / -1) from one character to the next, or null when not a step.
type Step = (a: string, b: string) => number | null;

function codePointStep(a: string, b: string): number | null {
  const d = (b.codePointAt(0) ?? 0) - (a.codePointAt(0) ?? 0);
  return d === 1 || d === -1 ? d : null;
}

function keyboardStep(a: string, b: string): number | null {
  const pa = KEY_POSITIONS.get(a);
  const pb = KEY_POSITIONS.get(b);
  if (!pa || !pb || pa.row !== pb.row) return null;
  const d = pb.col - pa.col;
  return d === 1 || d === -1 ? d : null;
}

function findRun(chars: string[], step: Step, minLength: number): string | undefined {
  for (let i = 0; i + minLength <= chars.length; i++) {
    const dir = step(chars[i], chars[i + 1]);
    if (dir === null) continue;
    let end = i + 1;
    while (end + 1 < chars.length && step(chars[end], chars[end + 1]) === dir) end++;
    if (end - i + 1 >= minLength) return chars.slice(i, end + 1).join("");
  }
  return undefined;
}

// A stretch where chars[j] === chars[j + size] holds `matched` times in a row
// is `matched + size` characters long, i.e. floor((matched + size) / size) copies.
function findRepeat(chars: string[]): string | undefined {
  const n = chars.length;
  for (let size = 2; size * 2 <= n; size++) {
    let j = 0;
    // past this point a stretch cannot cover half the password
    while (j + size < n && (n - j) * 2 >= n) {
      if (chars[j] !== chars[j + size]) {
        j++;
        continue;
      }
      const start = j;
      while (j + size < n && chars[j] === chars[j + size]) j++;
      const copies = Math.floor((j - start + size) / size);
      if (copies >= 2 && copies * size * 2 >= n) {
        return `"${chars.slice(start, start + size).join("")}" x${copies}`;
      }
    }
  }
  return undefined;
}

export class PatternDetector {
  private readonly keyboard: boolean;

  constructor(options: PatternDetectorOptions = {}) {
    this.keyboard = options.keyboard ?? true;
  }

  inspect(password: PasswordInput): PatternFindings {
    const chars = Password.of(password).chars;
    const flags = new Set<PatternFlag>();

    const repeatedPattern = findRepeat(chars);
    if (repeatedPattern) flags.add("RepeatedPattern");

    const sequentialRun =
      findRun(chars, codePointStep, 3) ??
      (this.keyboard ? findRun(chars, keyboardStep, 3) : undefined);
    if (sequentialRun) flags.add("SequentialRun");

    return { flags, repeatedPattern, sequentialRun };
  }

  detect(password: PasswordInput): ReadonlySet<PatternFlag> {
    return this.inspect(password).flags;
  }
}
