export type ErrorCode =
  | "INVALID_INPUT"
  | "UNSATISFIABLE_POLICY"
  | "POLICY_CONSTRUCTION";

export class PassgaugeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidInputError extends PassgaugeError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
  }
}

/** The generator ran out of attempts without producing a compliant password. */
export class GenerationError extends PassgaugeError {
  readonly attempts: number;

  constructor(attempts: number) {
    super(
      "UNSATISFIABLE_POLICY",
      `No password satisfying the policy after ${attempts} attempt${attempts === 1 ? "" : "s"}`
    );
    this.attempts = attempts;
  }
}

export class PolicyConstructionError extends PassgaugeError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("POLICY_CONSTRUCTION", `Invalid password policy: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export function isPassgaugeError(err: unknown): err is PassgaugeError {
  return err instanceof PassgaugeError;
}
