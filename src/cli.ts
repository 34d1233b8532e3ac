import { readFile } from "node:fs/promises";
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { scan } from "./scan.js";
import { Scanner } from "./lexer/scanner.js";
import type { Token } from "./lexer/tokens.js";
import { DiagnosticCollector } from "./errors/diagnostic.js";
import { formatDiagnostics, formatLegacy } from "./errors/reporter.js";

// sysexits.h
export const EX_OK = 0;
export const EX_USAGE = 64;
export const EX_DATAERR = 65;
export const EX_NOINPUT = 66;

export interface CliOptions {
  json?: boolean;
}

/** Where the CLI writes; one call per printed block. */
export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

export interface PromptStreams {
  input: Readable;
  output: Writable;
}

function printTokens(io: CliIO, tokens: readonly Token[], opts: CliOptions): void {
  if (opts.json) {
    io.out(JSON.stringify(tokens, null, 2));
    return;
  }
  for (const tok of tokens) {
    io.out(tok.toString());
  }
}

export async function runFile(file: string, opts: CliOptions, io: CliIO = consoleIO): Promise<number> {
  let source: string;
  try {
    source = await readFile(file, "utf-8");
  } catch (e) {
    io.err(`Error: ${e instanceof Error ? e.message : String(e)}`);
    return EX_NOINPUT;
  }

  const result = scan(source, file);
  printTokens(io, result.tokens, opts);

  if (result.errors.length > 0) {
    io.err(formatDiagnostics(source, result.errors));
    return EX_DATAERR;
  }
  return EX_OK;
}

/** Scans each input line on its own; resolves once the input ends. */
export function runPrompt(
  streams: PromptStreams,
  opts: CliOptions,
  io: CliIO = consoleIO,
): Promise<number> {
  const rl = createInterface({ input: streams.input, output: streams.output, prompt: "> " });
  const collector = new DiagnosticCollector("<stdin>");

  rl.on("line", (line) => {
    // Errors on one line must not leak into the next
    collector.clear();
    const tokens = new Scanner(line, collector).scanTokens();
    printTokens(io, tokens, opts);
    for (const diag of collector.diagnostics) {
      io.err(formatLegacy(diag));
    }
    rl.prompt();
  });

  return new Promise((resolve) => {
    rl.on("close", () => resolve(EX_OK));
    rl.prompt();
  });
}

export async function run(
  scripts: readonly string[],
  opts: CliOptions,
  io: CliIO = consoleIO,
  streams: PromptStreams = { input: process.stdin, output: process.stdout },
): Promise<number> {
  if (scripts.length > 1) {
    io.out("Usage: brine [script]");
    return EX_USAGE;
  }
  if (scripts.length === 1) {
    return runFile(scripts[0], opts, io);
  }
  return runPrompt(streams, opts, io);
}
