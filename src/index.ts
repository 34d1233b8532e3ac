#!/usr/bin/env node
import { Command } from "commander";
import { run, type CliOptions } from "./cli.js";

const program = new Command()
  .name("brine")
  .description("Scan brine source into tokens; starts a prompt when no script is given")
  .version("0.1.0")
  .argument("[script...]", "Script file to scan")
  .option("--json", "Print tokens as JSON")
  .action(async (scripts: string[], opts: CliOptions) => {
    process.exit(await run(scripts, opts));
  });

program.parseAsync().catch((e: unknown) => {
  console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
});
