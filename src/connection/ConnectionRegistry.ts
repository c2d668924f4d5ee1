/**
 * @fileoverview Named set of lifecycle managers, one per database target.
 * @module age-graph-bridge/connection/ConnectionRegistry
 */

import { PRIMARY_CONNECTION, type AppSettings } from '../config/AppSettings.js';
import { ValidationError } from '../utils/errors.js';
import {
  ConnectionLifecycleManager,
  type ConnectionLifecycleManagerOptions,
} from './ConnectionLifecycleManager.js';
import type { ConnectionSettings } from './ConnectionSettings.js';

export class ConnectionRegistry {
  private readonly managers = new Map<string, ConnectionLifecycleManager>();

  constructor(private readonly managerOptions: ConnectionLifecycleManagerOptions = {}) {}

  static fromAppSettings(
    settings: AppSettings,
    managerOptions: ConnectionLifecycleManagerOptions = {},
  ): ConnectionRegistry {
    const registry = new ConnectionRegistry({
      loadAgeExtension: settings.age.loadExtension,
      ...managerOptions,
    });
    for (const connection of Object.values(settings.db.connections)) {
      registry.register(connection);
    }
    return registry;
  }

  /** @throws ValidationError when the name is already taken. */
  register(settings: ConnectionSettings): ConnectionLifecycleManager {
    if (this.managers.has(settings.name)) {
      throw new ValidationError(`Connection '${settings.name}' is already registered`, {
        name: settings.name,
      }, 'ConnectionRegistry');
    }
    const manager = new ConnectionLifecycleManager(settings, this.managerOptions);
    this.managers.set(settings.name, manager);
    return manager;
  }

  /** @throws ValidationError for an unknown name. */
  get(name: string): ConnectionLifecycleManager {
    const manager = this.managers.get(name);
    if (!manager) {
      throw new ValidationError(`Connection '${name}' is not defined`, {
        name,
        known: this.names(),
      }, 'ConnectionRegistry');
    }
    return manager;
  }

  primary(): ConnectionLifecycleManager {
    return this.get(PRIMARY_CONNECTION);
  }

  names(): string[] {
    return Array.from(this.managers.keys());
  }

  /** Disposes every engine of every connection. */
  async shutdown(): Promise<void> {
    const managers = Array.from(this.managers.values());
    const results = await Promise.allSettled(managers.map((manager) => manager.disposeAll()));
    const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure) throw failure.reason;
  }
}
