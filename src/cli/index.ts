#!/usr/bin/env node
import { Command } from "commander";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { build_problem, format_failure, to_pretty_spaces, write_output, type CliOptions } from "./problem";

function error_message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function error_code(err: unknown): unknown {
  return typeof err === "object" && err !== null && "code" in err ? err.code : undefined;
}

const program = new Command();

program
  .name("outcome-cli")
  .description("Turn a serialized failure result into an HTTP problem report")
  .version("0.1.0")
  .argument("<file>", "JSON file holding a serialized result")
  .option("--detail <text>", "override the problem detail")
  .option("--instance <uri>", "problem instance URI")
  .option("--status <code>", "override the HTTP status code")
  .option("--title <text>", "override the problem title")
  .option("--type <uri>", "override the problem type URI")
  .option("--pretty [n]", "pretty-print JSON with n spaces (default: 2)")
  .option("--minify", "minify JSON (overrides --pretty)", false)
  .option("-o, --out <file>", "write the report to a file instead of stdout")
  .action(async (file: string, opts: CliOptions) => {
    const spaces = to_pretty_spaces(opts);
    const input_path = resolve(file);
    try {
      const content = await readFile(input_path, "utf8");
      let input: unknown;
      try {
        input = JSON.parse(content);
      } catch (e) {
        console.error(`❌ Invalid JSON in ${input_path}: ${error_message(e)}`);
        process.exitCode = 1;
        return;
      }

      const problem = build_problem(input, opts);
      if (!problem.ok) {
        for (const line of format_failure(problem)) console.error(line);
        process.exitCode = 1;
        return;
      }

      const text = JSON.stringify(problem.value, null, spaces);
      if (opts.out) {
        const target = await write_output(resolve(opts.out), text);
        console.log(`✅ Problem report written to: ${target}`);
      } else {
        console.log(text);
      }
    } catch (err) {
      if (error_code(err) === "ENOENT") {
        console.error(`❌ Not found: ${input_path}`);
      } else {
        console.error(`💥 Unexpected error: ${error_message(err)}`);
      }
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`💥 Unexpected error: ${error_message(err)}`);
  process.exitCode = 1;
});
