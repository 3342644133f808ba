import { parseArgs } from "node:util";
import { z } from "zod";
import {
  DEFAULT_MAX_ATTEMPTS,
  InvalidInputError,
  PasswordGenerator,
  auditEntries,
  createAnalyzer,
  createSeededRandom,
  cryptoRandom,
  formatAnalysis,
  formatValidation,
  type AnalysisResult,
} from "@passgauge/core";
import { parseCSV } from "./csv";
import { loadPolicy, type CliEnv, type ReadFile } from "./config";
import { debug } from "./debug";
import { buildResults, formatResults, isDevUrl } from "./results";

export type CliIO = {
  out: (text: string) => void;
  readFile: ReadFile;
  env: CliEnv;
};

export const USAGE = `Usage: passgauge <command> [options]

Commands:
  check <password>     analyze a password and validate it against the policy
      --basic            skip pattern detection
      --json             print the result as JSON
  generate             print passwords that satisfy the policy
      --length <n>       password length
      --count <n>        how many passwords (default 1)
      --attempts <n>     attempts per password (default 10)
      --seed <n>         reproducible output
  audit <export.csv>   audit a password-manager CSV export
      --issues <mode>    all | reuse | weak (default all)
      --sort <mode>      risk | domain | reuseCount (default risk)
      --query <text>     only accounts matching text
      --include-dev-urls keep localhost and private-network entries
      --mask             hide sites and usernames

Common options:
  --policy <file>      JSON policy file ({ "rules": [...] }); defaults to $PASSGAUGE_POLICY
  -h, --help           show this help`;

const positiveInt = z.coerce.number().int().positive();

const generateSchema = z.object({
  length: z.coerce.number().int().nonnegative().optional(),
  count: positiveInt.default(1),
  attempts: positiveInt.default(DEFAULT_MAX_ATTEMPTS),
  seed: z.coerce.number().int().optional(),
});

const auditSchema = z.object({
  issues: z.enum(["all", "reuse", "weak"]).default("all"),
  sort: z.enum(["risk", "domain", "reuseCount"]).default("risk"),
});

function parseOptions<T extends z.ZodTypeAny>(schema: T, values: unknown): z.output<T> {
  const parsed = schema.safeParse(values);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidInputError(`--${issue.path.join(".")}: ${issue.message}`);
  }
  return parsed.data;
}

function toJSON(result: AnalysisResult) {
  return { ...result, flags: [...result.flags] };
}

function parseCliArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        basic: { type: "boolean" },
        json: { type: "boolean" },
        policy: { type: "string" },
        length: { type: "string" },
        count: { type: "string" },
        attempts: { type: "string" },
        seed: { type: "string" },
        issues: { type: "string" },
        sort: { type: "string" },
        query: { type: "string" },
        "include-dev-urls": { type: "boolean" },
        mask: { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (err) {
    throw new InvalidInputError(err instanceof Error ? err.message : String(err));
  }
}

export function runCli(argv: string[], io: CliIO): number {
  const { values, positionals } = parseCliArgs(argv);
  const [command, ...rest] = positionals;
  debug("cli", "command", command, "options", Object.keys(values));

  if (values.help || !command) {
    io.out(USAGE);
    return command || values.help ? 0 : 2;
  }

  switch (command) {
    case "check": {
      const [password] = rest;
      if (password === undefined) throw new InvalidInputError("check needs a password");
      const policy = loadPolicy(io.readFile, io.env, values.policy);
      const analysis = createAnalyzer(values.basic ? "basic" : "advanced").analyze(password);
      const validation = policy.validate(password);

      if (values.json) {
        io.out(JSON.stringify({ analysis: toJSON(analysis), validation }, null, 2));
      } else {
        io.out(formatAnalysis(analysis));
        io.out("");
        io.out(formatValidation(validation, policy));
      }
      return validation.passed ? 0 : 1;
    }

    case "generate": {
      const opts = parseOptions(generateSchema, values);
      const policy = loadPolicy(io.readFile, io.env, values.policy);
      const random = opts.seed === undefined ? cryptoRandom : createSeededRandom(opts.seed);
      const generator = new PasswordGenerator(policy, { random });
      for (let i = 0; i < opts.count; i++) {
        io.out(generator.generate({ length: opts.length, maxAttempts: opts.attempts }).value);
      }
      return 0;
    }

    case "audit": {
      const [file] = rest;
      if (file === undefined) throw new InvalidInputError("audit needs a CSV export file");
      const opts = parseOptions(auditSchema, values);
      const policy = loadPolicy(io.readFile, io.env, values.policy);

      let text: string;
      try {
        text = io.readFile(file);
      } catch (err) {
        throw new InvalidInputError(
          `Cannot read export ${file}: ${err instanceof Error ? err.message : String(err)}`
        );
      }

      const res = parseCSV(text);
      if (!res.ok) throw new InvalidInputError(res.error);

      const entries = res.entries.filter((e) => {
        if (!e.password) return false;
        if (!values["include-dev-urls"] && e.url && isDevUrl(e.url)) return false;
        return true;
      });
      debug("audit", `${res.rows.length} rows, ${entries.length} audited`);

      const report = auditEntries(entries, { policy });
      const rows = buildResults(entries, report, {
        policy,
        issueMode: opts.issues,
        sortMode: opts.sort,
        query: values.query,
        mask: values.mask,
      });
      io.out(formatResults(report, rows));
      return report.summary.weak || report.summary.reusedGroups ? 1 : 0;
    }

    default:
      throw new InvalidInputError(`Unknown command: ${command}`);
  }
}
