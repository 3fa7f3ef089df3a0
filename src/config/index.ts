// src/config/index.ts
// Configuration system exports

export {
  type ContractMode,
  type ContractConfig,
  type DiagnosticsConfig,
  type ValuesConfig,
  type ValuesConfigOverrides,
  type ConfigValidation,
  DEFAULT_CONTRACT_CONFIG,
  DEFAULT_DIAGNOSTICS_CONFIG,
  DEFAULT_CONFIG,
  configFromObject,
  mergeConfigs,
  getConfig,
  configure,
  resetConfig,
  validateConfig,
} from "./config";
