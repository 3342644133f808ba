export type CharClass = "lower" | "upper" | "digit" | "symbol";

export const CHAR_CLASSES: readonly CharClass[] = ["lower", "upper", "digit", "symbol"];

export const ALPHABETS: Readonly<Record<CharClass, string>> = {
  lower: "abcdefghijklmnopqrstuvwxyz",
  upper: "ABCDEFGHIJKLMNOPQRSTUVWXYZ",
  digit: "0123456789",
  symbol: "!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~",
};

const EMPTY: ReadonlySet<CharClass> = new Set<CharClass>();
const SINGLETONS: Readonly<Record<CharClass, ReadonlySet<CharClass>>> = {
  lower: new Set<CharClass>(["lower"]),
  upper: new Set<CharClass>(["upper"]),
  digit: new Set<CharClass>(["digit"]),
  symbol: new Set<CharClass>(["symbol"]),
};

function classOf(char: string): CharClass | null {
  if (/^[a-z]$/.test(char)) return "lower";
  if (/^[A-Z]$/.test(char)) return "upper";
  if (/^[0-9]$/.test(char)) return "digit";
  if (/^[!-\/:-@[-`{-~]$/.test(char)) return "symbol";
  return null;
}

/**
 * ASCII classes of a single character. Whitespace, control and non-ASCII
 * characters, as well as strings that are not exactly one character, belong
 * to no class.
 */
export function classify(char: string): ReadonlySet<CharClass> {
  const cls = classOf(char);
  return cls ? SINGLETONS[cls] : EMPTY;
}

export function countByClass(password: string): Record<CharClass, number> {
  const counts: Record<CharClass, number> = { lower: 0, upper: 0, digit: 0, symbol: 0 };
  for (const ch of password) {
    const cls = classOf(ch);
    if (cls) counts[cls] += 1;
  }
  return counts;
}

export function classesOf(password: string): Set<CharClass> {
  const counts = countByClass(password);
  return new Set(CHAR_CLASSES.filter((cls) => counts[cls] > 0));
}
