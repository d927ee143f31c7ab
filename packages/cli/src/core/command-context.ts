/**
 * Command Context - Lazy service creation
 *
 * This is NOT a framework - just an object that knows how to create the services a
 * command needs. Removes service instantiation from handlers, and lets tests swap any
 * of them through CommandContextOptions.
 */

import {
  ArtifactRegistry,
  GitSourceControl,
  createSystemClock,
  type ClockPort,
  type SourceControlPort,
  type StorageTransportPort,
} from '@modelledger/core';
import { createStorageTransport } from '@modelledger/storage';
import {
  getControlPlaneConfig,
  getServerConfig,
  type ControlPlaneConfig,
  type ServerConfig,
} from '@modelledger/utils';

/**
 * Services available in command context
 */
export interface CommandServices {
  config(): ControlPlaneConfig;
  /** Inference gateway settings, from the environment */
  serverConfig(): ServerConfig;
  registry(): ArtifactRegistry;
  transport(): StorageTransportPort;
  sourceControl(): SourceControlPort;
  clock(): ClockPort;
}

/**
 * Options for creating a CommandContext with service overrides
 */
export interface CommandContextOptions {
  /** Project root holding `.modelledgerrc` and the registry file (default: cwd) */
  projectRoot?: string;
  env?: NodeJS.ProcessEnv;
  configOverride?: ControlPlaneConfig;
  transportOverride?: StorageTransportPort;
  sourceControlOverride?: SourceControlPort;
  clockOverride?: ClockPort;
}

/**
 * Command context - provides services
 */
export class CommandContext {
  private _services: CommandServices | null = null;
  private readonly _options: CommandContextOptions;

  constructor(options: CommandContextOptions = {}) {
    this._options = options;
  }

  /**
   * Get services (lazy creation)
   */
  get services(): CommandServices {
    if (!this._services) {
      this._services = this._createServices();
    }
    return this._services;
  }

  /**
   * Create service instances. Each is built on first use and then reused,
   * so a command that never touches storage never needs a bucket configured.
   */
  private _createServices(): CommandServices {
    const projectRoot = this._options.projectRoot ?? process.cwd();
    let config: ControlPlaneConfig | undefined = this._options.configOverride;
    let registry: ArtifactRegistry | undefined;
    let transport: StorageTransportPort | undefined = this._options.transportOverride;
    let sourceControl: SourceControlPort | undefined = this._options.sourceControlOverride;
    const clock = this._options.clockOverride ?? createSystemClock();

    const services: CommandServices = {
      config: () => {
        config ??= getControlPlaneConfig(projectRoot, this._options.env ?? process.env);
        return config;
      },
      serverConfig: () => getServerConfig(this._options.env ?? process.env),
      registry: () => {
        registry ??= ArtifactRegistry.load(services.config().registryFile);
        return registry;
      },
      transport: () => {
        transport ??= createStorageTransport(services.config());
        return transport;
      },
      sourceControl: () => {
        sourceControl ??= new GitSourceControl(projectRoot);
        return sourceControl;
      },
      clock: () => clock,
    };
    return services;
  }
}

/**
 * Factory function to create CommandContext with optional overrides
 */
export function createCommandContext(options: CommandContextOptions = {}): CommandContext {
  return new CommandContext(options);
}
