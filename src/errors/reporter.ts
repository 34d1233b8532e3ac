import chalk from "chalk";
import type { Diagnostic } from "./diagnostic.js";

export function formatDiagnostic(source: string, diag: Diagnostic): string {
  const lines = source.split("\n");
  const line = (lines[diag.line - 1] ?? "").replace(/\r$/, "");
  const lineNum = String(diag.line);
  const padding = " ".repeat(lineNum.length);

  let output = `${chalk.red.bold(diag.severity)}: ${chalk.bold(diag.message)}\n`;
  output += `${padding} ${chalk.blue("-->")} ${diag.source}:${diag.line}\n`;
  output += `${padding} ${chalk.blue("|")}\n`;
  output += `${chalk.blue(lineNum)} ${chalk.blue("|")} ${line}\n`;

  return output;
}

export function formatDiagnostics(source: string, diagnostics: readonly Diagnostic[]): string {
  return diagnostics.map((d) => formatDiagnostic(source, d)).join("\n");
}

/** One-line form: `[line 3] Error: Unexpected character.` */
export function formatLegacy(diag: Diagnostic): string {
  return `[line ${diag.line}] Error: ${diag.message}`;
}
