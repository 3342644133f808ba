import { describe, it, expect } from "vitest";
import { GenerationError, InvalidInputError } from "./errors";
import { PasswordGenerator } from "./generator";
import { PasswordPolicy } from "./policy";
import { createSeededRandom } from "./random";

const zero = () => 0;

describe("PasswordGenerator", () => {
  it("satisfies a strict policy on the first try", () => {
    const policy = new PasswordPolicy([
      { kind: "minLength", value: 20 },
      { kind: "requireUppercase" },
      { kind: "requireDigit" },
      { kind: "requireSymbol" },
      { kind: "maxRepeatedChars", value: 0 },
    ]);
    const generator = new PasswordGenerator(policy, { random: createSeededRandom(42) });

    const password = generator.generate({ maxAttempts: 5 });
    expect(password.length).toBe(20);
    expect(policy.validate(password)).toEqual({ passed: true, violations: [] });
  });

  it("always returns compliant passwords", () => {
    const policy = new PasswordPolicy();
    for (let seed = 1; seed <= 50; seed++) {
      const generator = new PasswordGenerator(policy, { random: createSeededRandom(seed) });
      const password = generator.generate();
      expect(password.length).toBe(16);
      expect(policy.validate(password).passed).toBe(true);
    }
  });

  it("is reproducible under a seeded source", () => {
    const policy = new PasswordPolicy();
    const a = new PasswordGenerator(policy, { random: createSeededRandom(7) }).generate();
    const b = new PasswordGenerator(policy, { random: createSeededRandom(7) }).generate();
    expect(a.value).toBe(b.value);
  });

  it("places required classes by construction", () => {
    const policy = new PasswordPolicy([{ kind: "minLength", value: 4 }, { kind: "requireDigit" }]);
    const generator = new PasswordGenerator(policy, { random: zero, include: ["lower"], length: 4 });
    expect(generator.generate().value).toBe("aaa0");
  });

  it("never extends a run past maxRepeatedChars", () => {
    const policy = new PasswordPolicy([
      { kind: "minLength", value: 4 },
      { kind: "requireDigit" },
      { kind: "maxRepeatedChars", value: 0 },
    ]);
    const generator = new PasswordGenerator(policy, { random: zero, include: ["lower"], length: 4 });
    expect(generator.generate().value).toBe("aba0");
  });

  it("fits the length between the policy bounds", () => {
    const capped = new PasswordGenerator(new PasswordPolicy([{ kind: "maxLength", value: 10 }]), {
      random: createSeededRandom(3),
    });
    expect(capped.generate().length).toBe(10);

    const raised = new PasswordGenerator(new PasswordPolicy([{ kind: "minLength", value: 24 }]), {
      random: createSeededRandom(3),
    });
    expect(raised.generate().length).toBe(24);
    expect(raised.generate({ length: 30 }).length).toBe(30);
  });

  it("rejects lengths outside the policy bounds", () => {
    const policy = new PasswordPolicy([
      { kind: "minLength", value: 12 },
      { kind: "maxLength", value: 20 },
    ]);
    const generator = new PasswordGenerator(policy, { random: zero });
    expect(() => generator.generate({ length: 8 })).toThrow(
      "Length 8 is below the policy minimum of 12"
    );
    expect(() => generator.generate({ length: 21 })).toThrow(InvalidInputError);
  });

  it("rejects a non-positive attempt budget", () => {
    const generator = new PasswordGenerator(new PasswordPolicy(), { random: zero });
    expect(() => generator.generate({ maxAttempts: 0 })).toThrow(InvalidInputError);
  });

  it("rejects alphabets with characters outside their class", () => {
    expect(
      () => new PasswordGenerator(new PasswordPolicy(), { alphabets: { digit: "12a" } })
    ).toThrow('Character "a" is not in class digit');
  });

  it("gives up with GenerationError when no candidate can comply", () => {
    const policy = new PasswordPolicy([
      { kind: "minLength", value: 3 },
      { kind: "maxRepeatedChars", value: 0 },
    ]);
    const generator = new PasswordGenerator(policy, {
      random: createSeededRandom(1),
      include: ["lower"],
      alphabets: { lower: "a" },
    });

    let caught: unknown;
    try {
      generator.generate({ maxAttempts: 3 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(GenerationError);
    expect(caught).toMatchObject({
      code: "UNSATISFIABLE_POLICY",
      attempts: 3,
      message: "No password satisfying the policy after 3 attempts",
    });
  });
});
