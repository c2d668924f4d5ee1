/**
 * @fileoverview Wires settings, logging and connections for a host process.
 * @module age-graph-bridge/bootstrap
 */

import { AppSettings, loadAppSettings } from './config/AppSettings.js';
import { ConnectionRegistry } from './connection/ConnectionRegistry.js';
import type { ConnectionLifecycleManagerOptions } from './connection/ConnectionLifecycleManager.js';
import { configureRootLogger } from './logging/loggerFactory.js';

export interface GraphBridge {
  settings: AppSettings;
  connections: ConnectionRegistry;
}

/**
 * Loads settings from `env`, sets the root log level and registers every
 * configured connection. Call `connections.shutdown()` on exit.
 */
export function createGraphBridge(
  env: NodeJS.ProcessEnv = process.env,
  managerOptions: ConnectionLifecycleManagerOptions = {},
): GraphBridge {
  const settings = loadAppSettings(env);
  configureRootLogger({ level: settings.logLevel });
  return {
    settings,
    connections: ConnectionRegistry.fromAppSettings(settings, managerOptions),
  };
}
