export type Severity = "error";

export interface Diagnostic {
  severity: Severity;
  message: string;
  line: number;
  source: string;
}

export function error(message: string, line: number, source: string): Diagnostic {
  return { severity: "error", message, line, source };
}

/** Receives lexical faults as they are found. Reporting never stops the scan. */
export interface DiagnosticSink {
  report(line: number, message: string): void;
}

export class DiagnosticCollector implements DiagnosticSink {
  private readonly items: Diagnostic[] = [];
  private readonly source: string;

  constructor(source: string = "<stdin>") {
    this.source = source;
  }

  report(line: number, message: string): void {
    this.items.push(error(message, line, this.source));
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.items;
  }

  get errors(): Diagnostic[] {
    return this.items.filter((d) => d.severity === "error");
  }

  get hadError(): boolean {
    return this.items.some((d) => d.severity === "error");
  }

  clear(): void {
    this.items.length = 0;
  }
}
