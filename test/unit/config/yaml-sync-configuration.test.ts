import { YamlSyncConfiguration, YamlSyncConfig } from '../../../src/config/YamlSyncConfiguration';
import { promises as fs } from 'fs';
import * as path from 'path';
import * as os from 'os';

const BASIC_YAML = `
sync:
  name: users-sync
  environment: development

catalog:
  streams:
    - namespace: public
      name: users
    - name: events

checkpoints:
  flush_interval: 5000

logging:
  enable_checkpoint_logs: true

environments:
  production:
    checkpoints:
      flush_interval: 250
    logging:
      enable_sync_logs: true
`;

describe('YamlSyncConfiguration', () => {
  let yamlConfig: YamlSyncConfiguration;
  let tempDir: string;
  let tempFile: string;

  beforeEach(async () => {
    yamlConfig = new YamlSyncConfiguration('development');

    // Create temporary directory for test files
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'yaml-sync-config-test-'));
    tempFile = path.join(tempDir, 'sync.yaml');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('parseFromYaml', () => {
    it('should parse a valid configuration', () => {
      const config = yamlConfig.parseFromYaml(BASIC_YAML);

      expect(config.sync).toEqual({ name: 'users-sync', environment: 'development' });
      expect(config.catalog.streams).toEqual([{ namespace: 'public', name: 'users' }, { name: 'events' }]);
      expect(config.checkpoints).toEqual({ flush_interval: 5000 });
      expect(config.logging).toEqual({ enable_checkpoint_logs: true });
      expect(config.environments?.production).toEqual({
        checkpoints: { flush_interval: 250 },
        logging: { enable_sync_logs: true }
      });
    });

    it('should require sync.name', () => {
      expect(() => yamlConfig.parseFromYaml('catalog:\n  streams: []\n')).toThrow(
        'Failed to parse YAML configuration: sync.name is required'
      );
    });

    it('should require a stream list', () => {
      expect(() => yamlConfig.parseFromYaml('sync:\n  name: s\ncatalog: {}\n')).toThrow(
        'Failed to parse YAML configuration: catalog.streams must be an array'
      );
    });

    it('should require every stream to have a name', () => {
      const yamlContent = 'sync:\n  name: s\ncatalog:\n  streams:\n    - namespace: public\n';

      expect(() => yamlConfig.parseFromYaml(yamlContent)).toThrow(
        'Failed to parse YAML configuration: catalog.streams[].name is required'
      );
    });

    it('should reject a non-positive flush interval', () => {
      const yamlContent = 'sync:\n  name: s\ncatalog:\n  streams: []\ncheckpoints:\n  flush_interval: -5\n';

      expect(() => yamlConfig.parseFromYaml(yamlContent)).toThrow(
        'Failed to parse YAML configuration: checkpoints.flush_interval must be a positive number'
      );
    });

    it('should reject an unknown environment name', () => {
      const yamlContent = 'sync:\n  name: s\n  environment: qa\ncatalog:\n  streams: []\n';

      expect(() => yamlConfig.parseFromYaml(yamlContent)).toThrow(
        'Failed to parse YAML configuration: sync.environment must be development, staging or production'
      );
    });

    it('should reject a sync section inside an environment override', () => {
      const yamlContent = [
        'sync:',
        '  name: s',
        'catalog:',
        '  streams: []',
        'environments:',
        '  production:',
        '    sync:',
        '      name: other',
        ''
      ].join('\n');

      expect(() => yamlConfig.parseFromYaml(yamlContent)).toThrow(
        'Failed to parse YAML configuration: environments.production.sync cannot be overridden per environment'
      );
    });

    it('should reject malformed YAML', () => {
      expect(() => yamlConfig.parseFromYaml('sync: [unclosed')).toThrow(/^Failed to parse YAML configuration: /);
    });
  });

  describe('loadFromFile', () => {
    it('should load the file and emit config-loaded', async () => {
      await fs.writeFile(tempFile, BASIC_YAML, 'utf8');
      const loaded = jest.fn();
      yamlConfig.on('config-loaded', loaded);

      await yamlConfig.loadFromFile(tempFile);

      expect(loaded).toHaveBeenCalledTimes(1);
      expect(yamlConfig.getConfig()?.sync.name).toBe('users-sync');
      expect(yamlConfig.getConfigPath()).toBe(tempFile);
    });

    it('should emit config-error and throw for a missing file', async () => {
      const failed = jest.fn();
      yamlConfig.on('config-error', failed);
      const missing = path.join(tempDir, 'missing.yaml');

      await expect(yamlConfig.loadFromFile(missing)).rejects.toThrow(
        `Failed to load YAML configuration from ${missing}`
      );
      expect(failed).toHaveBeenCalledTimes(1);
    });
  });

  describe('derived settings', () => {
    beforeEach(async () => {
      await fs.writeFile(tempFile, BASIC_YAML, 'utf8');
    });

    it('should build a catalog of the configured streams', async () => {
      await yamlConfig.loadFromFile(tempFile);
      const catalog = yamlConfig.toCatalog();

      expect(catalog.size()).toBe(2);
      expect(catalog.hasStream({ namespace: 'public', name: 'users' })).toBe(true);
      expect(catalog.hasStream({ name: 'events' })).toBe(true);
    });

    it('should fail to build a catalog before loading', () => {
      expect(() => yamlConfig.toCatalog()).toThrow('No configuration loaded');
    });

    it('should default the flush interval and logging switches', () => {
      expect(yamlConfig.getCheckpointConfig()).toEqual({ flushInterval: 1000 });
      expect(yamlConfig.getLoggingConfig()).toEqual({
        enableCheckpointLogs: false,
        enableStreamLogs: false,
        enableSyncLogs: false
      });
    });

    it('should read settings for the development environment', async () => {
      await yamlConfig.loadFromFile(tempFile);

      expect(yamlConfig.getCheckpointConfig()).toEqual({ flushInterval: 5000 });
      expect(yamlConfig.getLoggingConfig()).toEqual({
        enableCheckpointLogs: true,
        enableStreamLogs: false,
        enableSyncLogs: false
      });
    });

    it('should apply production overrides', async () => {
      const production = new YamlSyncConfiguration('production');
      await production.loadFromFile(tempFile);

      expect(production.getCheckpointConfig()).toEqual({ flushInterval: 250 });
      expect(production.getLoggingConfig()).toEqual({
        enableCheckpointLogs: true,
        enableStreamLogs: false,
        enableSyncLogs: true
      });
    });

    it('should reapply overrides when the environment changes', async () => {
      await yamlConfig.loadFromFile(tempFile);

      yamlConfig.setEnvironment('production');
      expect(yamlConfig.getCheckpointConfig().flushInterval).toBe(250);

      yamlConfig.setEnvironment('development');
      expect(yamlConfig.getCheckpointConfig().flushInterval).toBe(5000);
    });
  });

  describe('saveToFile', () => {
    it('should write a file that loads back to the same configuration', async () => {
      await fs.writeFile(tempFile, BASIC_YAML, 'utf8');
      await yamlConfig.loadFromFile(tempFile);
      const savedPath = path.join(tempDir, 'saved.yaml');

      await yamlConfig.saveToFile(savedPath);
      const reloaded = new YamlSyncConfiguration('development');
      await reloaded.loadFromFile(savedPath);

      expect(reloaded.getConfig()).toEqual(yamlConfig.getConfig());
    });

    it('should refuse to save without a configuration', async () => {
      await expect(yamlConfig.saveToFile(tempFile)).rejects.toThrow('No configuration to save');
    });
  });

  describe('mergeConfigurations', () => {
    it('should let the override win per section', () => {
      const base: YamlSyncConfig = {
        sync: { name: 'base' },
        catalog: { streams: [{ name: 'a' }] },
        checkpoints: { flush_interval: 1000 },
        logging: { enable_checkpoint_logs: true }
      };

      const merged = YamlSyncConfiguration.mergeConfigurations(base, {
        catalog: { streams: [{ name: 'b' }] },
        logging: { enable_stream_logs: true }
      });

      expect(merged.catalog.streams).toEqual([{ name: 'b' }]);
      expect(merged.checkpoints).toEqual({ flush_interval: 1000 });
      expect(merged.logging).toEqual({ enable_checkpoint_logs: true, enable_stream_logs: true });
    });

    it('should keep the base sync section and environments', () => {
      const base: YamlSyncConfig = {
        sync: { name: 'base', environment: 'staging' },
        catalog: { streams: [] },
        environments: { production: { checkpoints: { flush_interval: 250 } } }
      };

      const merged = YamlSyncConfiguration.mergeConfigurations(base, { checkpoints: { flush_interval: 250 } });

      expect(merged).toEqual({
        sync: { name: 'base', environment: 'staging' },
        catalog: { streams: [] },
        checkpoints: { flush_interval: 250 },
        logging: {},
        environments: { production: { checkpoints: { flush_interval: 250 } } }
      });
    });
  });
});
