/**
 * Structured diagnostics for problems that do not abort processing.
 */

export type DiagnosticSeverity = "error" | "warning" | "information" | "hint";

export interface Diagnostic {
  /** Stable identifier, e.g. `symgraph.SymbolNodeNotFound` */
  readonly identifier: string;
  readonly severity: DiagnosticSeverity;
  readonly summary: string;
  readonly explanation?: string;
  /** File or symbol the problem was found in, when known */
  readonly source?: string;
}

export function createDiagnostic(
  identifier: string,
  severity: DiagnosticSeverity,
  summary: string,
  options: { explanation?: string; source?: string } = {}
): Diagnostic {
  return {
    identifier,
    severity,
    summary,
    ...(options.explanation !== undefined ? { explanation: options.explanation } : {}),
    ...(options.source !== undefined ? { source: options.source } : {}),
  };
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const location = diagnostic.source ? `${diagnostic.source}: ` : "";
  const lines = [`${location}${diagnostic.severity}: ${diagnostic.summary} [${diagnostic.identifier}]`];
  if (diagnostic.explanation) {
    lines.push(`  ${diagnostic.explanation}`);
  }
  return lines.join("\n");
}

/**
 * Collects diagnostics emitted during a build.
 */
export class DiagnosticEngine {
  private readonly collected: Diagnostic[] = [];

  emit(diagnostic: Diagnostic): void {
    this.collected.push(diagnostic);
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.collected;
  }

  withIdentifier(identifier: string): Diagnostic[] {
    return this.collected.filter((d) => d.identifier === identifier);
  }

  clear(): void {
    this.collected.length = 0;
  }
}
