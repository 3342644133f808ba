import { readFileSync } from "node:fs";
import { isPassgaugeError } from "@passgauge/core";
import { runCli } from "./commands";

try {
  process.exitCode = runCli(process.argv.slice(2), {
    out: (text) => console.log(text),
    readFile: (path) => readFileSync(path, "utf8"),
    env: process.env,
  });
} catch (err) {
  if (!isPassgaugeError(err)) throw err;
  console.error(`error: ${err.message}`);
  process.exitCode = 2;
}
