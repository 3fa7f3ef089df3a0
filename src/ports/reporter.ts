import { getConfig } from "../config/config";
import { atLeast, type Diagnostic } from "../outcome/diagnostic";

/**
 * Reporter port interface.
 * Receives every diagnostic raised by contract checks and table lookups.
 */
export interface DiagnosticReporter {
  report(diag: Diagnostic): void;
}

const PREFIX = "[accessible-values]";

export function formatDiagnostic(diag: Diagnostic): string {
  return `${PREFIX} ${diag.severity.toUpperCase()} ${diag.code}: ${diag.message}`;
}

/**
 * Default reporter: writes to the console, filtered by the active
 * diagnostics configuration.
 */
export class ConsoleReporter implements DiagnosticReporter {
  report(diag: Diagnostic): void {
    const { quiet, minSeverity } = getConfig().diagnostics;
    if (quiet || !atLeast(diag, minSeverity)) return;

    const line = formatDiagnostic(diag);
    switch (diag.severity) {
      case "critical":
      case "error":
        console.error(line);
        break;
      case "warning":
        console.warn(line);
        break;
      default:
        console.info(line);
    }
  }
}

/**
 * Keeps diagnostics in memory, for tests and for callers that surface
 * them in their own UI.
 */
export class CollectingReporter implements DiagnosticReporter {
  readonly diagnostics: Diagnostic[] = [];

  report(diag: Diagnostic): void {
    this.diagnostics.push(diag);
  }

  codes(): string[] {
    return this.diagnostics.map(d => d.code);
  }

  clear(): void {
    this.diagnostics.length = 0;
  }
}

let current: DiagnosticReporter = new ConsoleReporter();

export function getDiagnosticReporter(): DiagnosticReporter {
  return current;
}

/**
 * Install a reporter. Returns the previously installed one.
 */
export function setDiagnosticReporter(reporter: DiagnosticReporter): DiagnosticReporter {
  const previous = current;
  current = reporter;
  return previous;
}
