import { InvalidInputError } from "./errors";

export type PasswordInput = string | Password;

export class Password {
  readonly value: string;
  readonly length: number;

  private constructor(value: string) {
    this.value = value;
    this.length = Array.from(value).length;
    Object.freeze(this);
  }

  static of(input: unknown): Password {
    if (input instanceof Password) return input;
    if (typeof input !== "string") {
      throw new InvalidInputError(
        `Password must be a string, got ${input === null ? "null" : typeof input}`
      );
    }
    return new Password(input);
  }

  get chars(): string[] {
    return Array.from(this.value);
  }

  get masked(): string {
    return "*".repeat(this.length);
  }

  toString(): string {
    return `Password(masked='${this.masked}', length=${this.length})`;
  }

  toJSON(): string {
    return this.masked;
  }
}
