import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0100: { code: "E0100", severity: "error", category: "Contract", template: "Missing {what}" },
  E0101: { code: "E0101", severity: "error", category: "Contract", template: "Value kind mismatch: expected {expected}, got {actual}" },
  E0102: { code: "E0102", severity: "error", category: "Contract", template: "Unregistered value kind: {kind}" },
  E0103: { code: "E0103", severity: "error", category: "Contract", template: "{kind} used after its last reference was released" },
  E0104: { code: "E0104", severity: "error", category: "Contract", template: "Invalid {family} token: {value}" },
  E0105: { code: "E0105", severity: "error", category: "Contract", template: "Integer required, got {value}" },
  E0106: { code: "E0106", severity: "error", category: "Contract", template: "Argument type mismatch for \"{name}\": expected {expected}, got {actual}" },
  E0107: { code: "E0107", severity: "error", category: "Contract", template: "Argument list exhausted while collecting \"{name}\"" },
  E0108: { code: "E0108", severity: "error", category: "Contract", template: "Value box type mismatch for \"{name}\": expected {expected}, got {actual}" },
  E0109: { code: "E0109", severity: "error", category: "Contract", template: "Unknown accessible {space}: {id}" },
  E0110: { code: "E0110", severity: "error", category: "Contract", template: "Not an accessible object: {actual}" },

  E0200: { code: "E0200", severity: "critical", category: "Configuration", template: "Unknown type for accessible {space} “{name}”" },
  E0201: { code: "E0201", severity: "critical", category: "Configuration", template: "Unknown value for accessible {space} “{name}”" },

  E0300: { code: "E0300", severity: "error", category: "Value", template: "Invalid token “{value}” for {name}" },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    category: def.category,
    message,
    data: params,
  };
}
