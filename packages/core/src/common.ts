import defaultList from "./data/common-passwords.json";
import { Password, type PasswordInput } from "./password";

export const DEFAULT_COMMON_PASSWORDS: readonly string[] = defaultList;

/** Exact, case-sensitive membership against a fixed list of known-weak passwords. */
export class CommonPasswordChecker {
  private readonly known: ReadonlySet<string>;

  constructor(passwords: Iterable<string>) {
    this.known = new Set(passwords);
  }

  static withDefaults(): CommonPasswordChecker {
    return new CommonPasswordChecker(DEFAULT_COMMON_PASSWORDS);
  }

  get size(): number {
    return this.known.size;
  }

  isCommon(password: PasswordInput): boolean {
    return this.known.has(Password.of(password).value);
  }
}
