import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import { EventEmitter } from 'events';
import { DestinationCatalog } from '../catalog/DestinationCatalog';
import { LoggingConfig } from '../common/logger';
import { StreamDescriptor } from '../types';

/**
 * YAML sync run configuration
 */
export interface YamlSyncConfig {
  /** Sync run identification */
  sync: {
    name: string;
    environment?: 'development' | 'staging' | 'production';
  };

  /** Streams the destination accepts */
  catalog: {
    streams: Array<{
      namespace?: string;
      name: string;
    }>;
  };

  /** Checkpoint release settings */
  checkpoints?: {
    /** Interval between flushes of ready checkpoints (ms) */
    flush_interval?: number;
  };

  logging?: {
    enable_checkpoint_logs?: boolean;
    enable_stream_logs?: boolean;
    enable_sync_logs?: boolean;
  };

  /** Environment-specific overrides */
  environments?: {
    [env: string]: YamlSyncOverride;
  };
}

/**
 * Sections an environment may override
 */
export type YamlSyncOverride = Partial<Pick<YamlSyncConfig, 'catalog' | 'checkpoints' | 'logging'>>;

export const DEFAULT_FLUSH_INTERVAL = 1000;

/**
 * YAML configuration loader for a sync run
 */
export class YamlSyncConfiguration extends EventEmitter {
  private config: YamlSyncConfig | null = null;
  private baseConfig: YamlSyncConfig | null = null;
  private configPath: string | null = null;
  private currentEnvironment: string;

  constructor(environment: string = 'development') {
    super();
    this.currentEnvironment = environment;
  }

  /**
   * Load configuration from YAML file
   */
  async loadFromFile(filePath: string): Promise<void> {
    try {
      const yamlContent = await fs.readFile(filePath, 'utf8');
      this.baseConfig = this.parseFromYaml(yamlContent);
      this.configPath = filePath;

      // Apply environment-specific overrides
      this.applyEnvironmentOverrides();

      this.emit('config-loaded', { filePath, config: this.config });
    } catch (error) {
      this.emit('config-error', { filePath, error });
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load YAML configuration from ${filePath}: ${errorMessage}`);
    }
  }

  /**
   * Parse YAML content into configuration object
   */
  parseFromYaml(yamlContent: string): YamlSyncConfig {
    try {
      const parsed: unknown = yaml.load(yamlContent);
      return validateConfiguration(parsed);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to parse YAML configuration: ${errorMessage}`);
    }
  }

  /**
   * Use an already parsed configuration
   */
  useConfig(config: YamlSyncConfig): void {
    this.baseConfig = config;
    this.applyEnvironmentOverrides();
  }

  toCatalog(): DestinationCatalog {
    if (!this.config) {
      throw new Error('No configuration loaded');
    }

    const descriptors: StreamDescriptor[] = this.config.catalog.streams.map(stream =>
      stream.namespace === undefined ? { name: stream.name } : { namespace: stream.namespace, name: stream.name }
    );
    return DestinationCatalog.fromDescriptors(descriptors);
  }

  getCheckpointConfig(): { flushInterval: number } {
    return {
      flushInterval: this.config?.checkpoints?.flush_interval ?? DEFAULT_FLUSH_INTERVAL
    };
  }

  getLoggingConfig(): LoggingConfig {
    const logging: NonNullable<YamlSyncConfig['logging']> = this.config?.logging ?? {};
    return {
      enableCheckpointLogs: logging.enable_checkpoint_logs ?? false,
      enableStreamLogs: logging.enable_stream_logs ?? false,
      enableSyncLogs: logging.enable_sync_logs ?? false
    };
  }

  /**
   * Save configuration to YAML file
   */
  async saveToFile(filePath: string): Promise<void> {
    if (!this.config) {
      throw new Error('No configuration to save');
    }

    try {
      const yamlContent = yaml.dump(this.config, {
        indent: 2,
        lineWidth: 100,
        quotingType: '"',
        forceQuotes: false
      });

      await fs.writeFile(filePath, yamlContent, 'utf8');
      this.emit('config-saved', { filePath });
    } catch (error) {
      this.emit('config-error', { filePath, error });
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to save YAML configuration to ${filePath}: ${errorMessage}`);
    }
  }

  /**
   * Merge configurations with precedence
   */
  static mergeConfigurations(base: YamlSyncConfig, override: YamlSyncOverride): YamlSyncConfig {
    const merged: YamlSyncConfig = {
      sync: { ...base.sync },
      catalog: override.catalog ?? base.catalog,
      checkpoints: { ...base.checkpoints, ...override.checkpoints },
      logging: { ...base.logging, ...override.logging }
    };
    if (base.environments) {
      merged.environments = base.environments;
    }
    return merged;
  }

  /**
   * Get current configuration
   */
  getConfig(): YamlSyncConfig | null {
    return this.config;
  }

  getConfigPath(): string | null {
    return this.configPath;
  }

  /**
   * Set environment for configuration overrides
   */
  setEnvironment(environment: string): void {
    this.currentEnvironment = environment;
    this.applyEnvironmentOverrides();
  }

  /**
   * Apply environment-specific configuration overrides
   */
  private applyEnvironmentOverrides(): void {
    if (!this.baseConfig) {
      return;
    }

    const envOverrides = this.baseConfig.environments?.[this.currentEnvironment];
    this.config = envOverrides
      ? YamlSyncConfiguration.mergeConfigurations(this.baseConfig, envOverrides)
      : this.baseConfig;
  }
}

type SyncEnvironment = NonNullable<YamlSyncConfig['sync']['environment']>;

const ENVIRONMENTS: readonly SyncEnvironment[] = ['development', 'staging', 'production'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEnvironment(value: unknown): value is SyncEnvironment {
  return ENVIRONMENTS.some(environment => environment === value);
}

function optionalBoolean(section: Record<string, unknown>, key: string, path: string): boolean | undefined {
  const value = section[key];
  if (value === undefined || typeof value === 'boolean') {
    return value;
  }
  throw new Error(`${path}.${key} must be a boolean`);
}

function validateStream(stream: unknown, path: string): { namespace?: string; name: string } {
  if (!isRecord(stream)) {
    throw new Error(`${path}.streams[] must be a mapping`);
  }
  const name = stream.name;
  const namespace = stream.namespace;
  if (typeof name !== 'string' || name.length === 0) {
    throw new Error(`${path}.streams[].name is required`);
  }
  if (namespace === undefined) {
    return { name };
  }
  if (typeof namespace !== 'string') {
    throw new Error(`${path}.streams[].namespace must be a string`);
  }
  return { namespace, name };
}

function validateStreams(catalog: unknown, path: string): YamlSyncConfig['catalog'] {
  const streams: unknown = isRecord(catalog) ? catalog.streams : undefined;
  if (!Array.isArray(streams)) {
    throw new Error(`${path}.streams must be an array`);
  }
  const items: unknown[] = streams;
  return { streams: items.map(stream => validateStream(stream, path)) };
}

function validateCheckpoints(checkpoints: unknown, path: string): YamlSyncConfig['checkpoints'] {
  if (checkpoints === undefined) {
    return undefined;
  }
  if (!isRecord(checkpoints)) {
    throw new Error(`${path} must be a mapping`);
  }
  const flushInterval = checkpoints.flush_interval;
  if (flushInterval === undefined) {
    return {};
  }
  if (typeof flushInterval !== 'number' || !Number.isFinite(flushInterval) || flushInterval <= 0) {
    throw new Error(`${path}.flush_interval must be a positive number`);
  }
  return { flush_interval: flushInterval };
}

function validateLogging(logging: unknown, path: string): YamlSyncConfig['logging'] {
  if (logging === undefined) {
    return undefined;
  }
  if (!isRecord(logging)) {
    throw new Error(`${path} must be a mapping`);
  }
  const result: NonNullable<YamlSyncConfig['logging']> = {};
  const checkpointLogs = optionalBoolean(logging, 'enable_checkpoint_logs', path);
  const streamLogs = optionalBoolean(logging, 'enable_stream_logs', path);
  const syncLogs = optionalBoolean(logging, 'enable_sync_logs', path);
  // js-yaml refuses to dump undefined values, so only set what was given
  if (checkpointLogs !== undefined) result.enable_checkpoint_logs = checkpointLogs;
  if (streamLogs !== undefined) result.enable_stream_logs = streamLogs;
  if (syncLogs !== undefined) result.enable_sync_logs = syncLogs;
  return result;
}

function validateOverride(override: unknown, env: string): YamlSyncOverride {
  const path = `environments.${env}`;
  if (!isRecord(override)) {
    throw new Error(`${path} must be a mapping`);
  }
  for (const key of ['sync', 'environments']) {
    if (override[key] !== undefined) {
      throw new Error(`${path}.${key} cannot be overridden per environment`);
    }
  }

  const result: YamlSyncOverride = {};
  if (override.catalog !== undefined) {
    result.catalog = validateStreams(override.catalog, `${path}.catalog`);
  }
  const checkpoints = validateCheckpoints(override.checkpoints, `${path}.checkpoints`);
  if (checkpoints) {
    result.checkpoints = checkpoints;
  }
  const logging = validateLogging(override.logging, `${path}.logging`);
  if (logging) {
    result.logging = logging;
  }
  return result;
}

/**
 * Validate configuration structure
 */
function validateConfiguration(config: unknown): YamlSyncConfig {
  if (!isRecord(config)) {
    throw new Error('configuration must be a mapping');
  }

  const sync = config.sync;
  if (!isRecord(sync)) {
    throw new Error('sync.name is required');
  }
  const name = sync.name;
  const environment = sync.environment;
  if (typeof name !== 'string' || name.length === 0) {
    throw new Error('sync.name is required');
  }
  if (environment !== undefined && !isEnvironment(environment)) {
    throw new Error('sync.environment must be development, staging or production');
  }

  const result: YamlSyncConfig = {
    sync: isEnvironment(environment) ? { name, environment } : { name },
    catalog: validateStreams(config.catalog, 'catalog')
  };

  const checkpoints = validateCheckpoints(config.checkpoints, 'checkpoints');
  if (checkpoints) {
    result.checkpoints = checkpoints;
  }
  const logging = validateLogging(config.logging, 'logging');
  if (logging) {
    result.logging = logging;
  }

  const environments = config.environments;
  if (environments !== undefined) {
    if (!isRecord(environments)) {
      throw new Error('environments must be a mapping');
    }
    result.environments = {};
    for (const [env, override] of Object.entries(environments)) {
      result.environments[env] = validateOverride(override, env);
    }
  }

  return result;
}
