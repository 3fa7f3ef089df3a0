// src/config/config.ts
// Configuration for contract checking and diagnostic output

import type { DiagnosticSeverity } from "../outcome/diagnostic";
import { SEVERITY_RANK } from "../outcome/diagnostic";

// =========================================================================
// Configuration Types
// =========================================================================

/**
 * "throw" aborts on a contract violation (debug builds);
 * "report" logs it and continues with a null or zero result.
 */
export type ContractMode = "report" | "throw";

export type ContractConfig = {
  mode: ContractMode;
};

export type DiagnosticsConfig = {
  /** Suppress console output of the default reporter */
  quiet: boolean;
  /** Diagnostics below this severity are not written */
  minSeverity: DiagnosticSeverity;
};

export type ValuesConfig = {
  contracts: ContractConfig;
  diagnostics: DiagnosticsConfig;
};

export type ValuesConfigOverrides = {
  contracts?: Partial<ContractConfig>;
  diagnostics?: Partial<DiagnosticsConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_CONTRACT_CONFIG: ContractConfig = {
  mode: "report",
};

export const DEFAULT_DIAGNOSTICS_CONFIG: DiagnosticsConfig = {
  quiet: false,
  minSeverity: "warning",
};

export const DEFAULT_CONFIG: ValuesConfig = {
  contracts: DEFAULT_CONTRACT_CONFIG,
  diagnostics: DEFAULT_DIAGNOSTICS_CONFIG,
};

// =========================================================================
// Configuration Loading
// =========================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isContractMode(value: unknown): value is ContractMode {
  return value === "report" || value === "throw";
}

function isSeverity(value: unknown): value is DiagnosticSeverity {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(SEVERITY_RANK, value);
}

/**
 * Create configuration from a plain object (e.g., parsed JSON).
 * Accepts camelCase and snake_case keys; unknown or malformed entries
 * fall back to the defaults.
 */
export function configFromObject(data: Record<string, unknown>): ValuesConfig {
  const contractData: Record<string, unknown> = isRecord(data.contracts) ? data.contracts : {};
  const diagData: Record<string, unknown> = isRecord(data.diagnostics) ? data.diagnostics : {};

  const quiet = diagData.quiet;
  const minSeverity = diagData.minSeverity ?? diagData.min_severity;

  return {
    contracts: {
      mode: isContractMode(contractData.mode) ? contractData.mode : DEFAULT_CONTRACT_CONFIG.mode,
    },
    diagnostics: {
      quiet: typeof quiet === "boolean" ? quiet : DEFAULT_DIAGNOSTICS_CONFIG.quiet,
      minSeverity: isSeverity(minSeverity) ? minSeverity : DEFAULT_DIAGNOSTICS_CONFIG.minSeverity,
    },
  };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: ValuesConfigOverrides[]): ValuesConfig {
  const result: ValuesConfig = {
    contracts: { ...DEFAULT_CONTRACT_CONFIG },
    diagnostics: { ...DEFAULT_DIAGNOSTICS_CONFIG },
  };

  for (const cfg of configs) {
    if (cfg.contracts) {
      result.contracts = { ...result.contracts, ...cfg.contracts };
    }
    if (cfg.diagnostics) {
      result.diagnostics = { ...result.diagnostics, ...cfg.diagnostics };
    }
  }

  return result;
}

// =========================================================================
// Active Configuration
// =========================================================================

let active: ValuesConfig = mergeConfigs();

export function getConfig(): ValuesConfig {
  return active;
}

/**
 * Apply overrides on top of the active configuration.
 * Returns the configuration that was active before the call.
 */
export function configure(overrides: ValuesConfigOverrides): ValuesConfig {
  const previous = active;
  active = mergeConfigs(previous, overrides);
  return previous;
}

export function resetConfig(): void {
  active = mergeConfigs();
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: ValuesConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isContractMode(config.contracts.mode)) {
    errors.push(`Unknown contract mode: ${String(config.contracts.mode)}`);
  }
  if (!isSeverity(config.diagnostics.minSeverity)) {
    errors.push(`Unknown severity: ${String(config.diagnostics.minSeverity)}`);
  } else if (SEVERITY_RANK[config.diagnostics.minSeverity] > SEVERITY_RANK.error) {
    warnings.push("Contract violations will not be written with minSeverity above \"error\"");
  }
  if (config.diagnostics.quiet && config.contracts.mode === "report") {
    warnings.push("Contract violations are neither thrown nor written");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
