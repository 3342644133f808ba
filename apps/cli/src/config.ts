import { InvalidInputError, PasswordPolicy } from "@passgauge/core";
import { debug } from "./debug";

export type CliEnv = Record<string, string | undefined>;

export type ReadFile = (path: string) => string;

/**
 * Policy for a command: `--policy <file>`, else the file named by
 * PASSGAUGE_POLICY, else the built-in defaults.
 */
export function loadPolicy(readFile: ReadFile, env: CliEnv, path?: string): PasswordPolicy {
  const source = path ?? env.PASSGAUGE_POLICY;
  if (!source) {
    debug("config", "using default policy");
    return new PasswordPolicy();
  }

  debug("config", "loading policy from", source);
  let text: string;
  try {
    text = readFile(source);
  } catch (err) {
    throw new InvalidInputError(
      `Cannot read policy file ${source}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  let config: unknown;
  try {
    config = JSON.parse(text);
  } catch (err) {
    throw new InvalidInputError(
      `Policy file ${source} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return PasswordPolicy.fromConfig(config);
}
