import { Scanner } from "./lexer/scanner.js";
import type { Token } from "./lexer/tokens.js";
import { DiagnosticCollector, type Diagnostic } from "./errors/diagnostic.js";

export interface ScanResult {
  tokens: readonly Token[];
  /** Non-empty means the run failed, though `tokens` is still complete. */
  errors: Diagnostic[];
}

/**
 * Scan a whole source string. Each call collects its own diagnostics, so
 * repeated or interleaved calls never see each other's errors.
 */
export function scan(source: string, filename: string = "<stdin>"): ScanResult {
  const collector = new DiagnosticCollector(filename);
  const tokens = new Scanner(source, collector).scanTokens();
  return { tokens, errors: collector.errors };
}
