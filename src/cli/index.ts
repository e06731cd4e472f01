#!/usr/bin/env node
import { Command } from "commander";
import { error_message, run_cli, type CliOptions } from "./run";

const program = new Command();

program
  .name("namecheck")
  .description("Report naming-convention advisories for a declaration tree")
  .version("0.1.0")
  .argument("<file>", "JSON file holding an array of declaration nodes")
  .option("--json", "print a JSON report instead of text lines", false)
  .option("--pretty [n]", "indent the JSON report with n spaces (default: 2)")
  .option("-o, --out <file>", "also write the JSON report to this file")
  .action(async (file: string, opts: CliOptions) => {
    process.exitCode = await run_cli(file, opts);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`💥 ${error_message(err)}`);
  process.exitCode = 1;
});
