#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { optimizeSource } from "../compiler/index.js";
import { HELP_TEXT, parseArgs } from "./options.js";

function main(): void {
  const opts = parseArgs(process.argv.slice(2));

  if (opts.help) {
    console.log(HELP_TEXT);
    return;
  }
  if (opts.input === null) {
    console.log(HELP_TEXT);
    process.exitCode = 1;
    return;
  }

  const resolvedInput = path.resolve(opts.input);
  if (!fs.existsSync(resolvedInput)) {
    console.error(`Input not found: ${resolvedInput}`);
    process.exitCode = 1;
    return;
  }

  const source = fs.readFileSync(resolvedInput, "utf8");
  const result = optimizeSource(source, {
    filePath: opts.input,
    cleanup: opts.cleanup,
    maxScopeNames: opts.maxScopeNames,
  });

  if (opts.verbose) {
    for (const fn of result.report.functions) {
      const { threading } = fn;
      const detail = threading.skipped
        ? `skipped (${threading.skipped})`
        : `${threading.threadedChecks} check(s) threaded`;
      console.log(`$${fn.name}: ${detail}`);
    }
    console.log(
      `Threaded ${result.report.threadedChecks} check(s) in ${result.report.functions.length} function(s)`,
    );
  }

  if (opts.output) {
    const outPath = path.resolve(opts.output);
    fs.mkdirSync(path.dirname(outPath), { recursive: true });
    fs.writeFileSync(outPath, result.text);
    if (opts.verbose) console.log(`Generated: ${outPath}`);
  } else {
    process.stdout.write(result.text);
  }
}

try {
  main();
} catch (err) {
  if (err instanceof Error) console.error(err.message);
  else console.error(err);
  process.exitCode = 1;
}
