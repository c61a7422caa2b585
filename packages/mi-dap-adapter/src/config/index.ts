import { BackendConfig, BackendConfigLoader, LoggerInterface } from 'mi-dap-core';
import defaultBackendConfig from './defaultBackendConfig.json';

export interface BackendConfigOverrides {
  /** JSON file whose keys replace the defaults. */
  configPath?: string;
  /** Takes precedence over both the defaults and the file. */
  gdbPath?: string;
}

/**
 * Resolves the backend configuration: built-in defaults, then the optional
 * file, then command-line flags.
 */
export function resolveBackendConfig(logger: LoggerInterface, overrides: BackendConfigOverrides = {}): BackendConfig {
  const loader = new BackendConfigLoader(logger);
  const defaults = loader.fromObject(defaultBackendConfig);
  const config = overrides.configPath ? loader.loadFromFile(overrides.configPath, defaults) : defaults;
  return overrides.gdbPath ? { ...config, gdbPath: overrides.gdbPath } : config;
}
