import fs from 'fs';
import path from 'path';
import {
  ConfigManager,
  DownloadConfig,
  assertValid,
  defaultConfig,
  validateDownloadConfig,
  validateLaunchConfig
} from '../../src/common/config/config-manager';
import { OpsError, OpsErrorType } from '../../src/common/utils/error-handler';
import { LogLevel } from '../../src/common/utils/logger';
import { MISSING_CONFIG, isolateEnv, makeTempDir, removeDir } from '../helpers/test-utils';

describe('ConfigManager', () => {
  let restoreEnv: () => void;
  let dir: string;

  beforeEach(() => {
    restoreEnv = isolateEnv();
    dir = makeTempDir();
  });

  afterEach(() => {
    restoreEnv();
    removeDir(dir);
  });

  function writeYaml(content: string): string {
    const file = path.join(dir, 'ops.yaml');
    fs.writeFileSync(file, content);
    return file;
  }

  describe('defaults', () => {
    it('should use built-in defaults without a file or environment', () => {
      const manager = new ConfigManager(MISSING_CONFIG);
      const launcher = manager.getLaunchConfig();
      const download = manager.getDownloadConfig();

      expect(launcher.appModule).toBe('api.dataAPI:app');
      expect(launcher.host).toBe('0.0.0.0');
      expect(launcher.port).toBe(8000);
      expect(launcher.reload).toBe(true);
      expect(launcher.kill).toBe(false);
      expect(download.baseUrl).toBe('http://localhost:8000');
      expect(download.startHour).toBe(0);
      expect(download.endHour).toBe(23);
      expect(download.sleepBetween).toBe(0.5);
      expect(download.yearsBack).toBe(10);
      expect(download.cities).toBeNull();
      expect(download.requestTimeout).toBe(0);
      expect(manager.getLogLevel()).toBe(LogLevel.INFO);
    });

    it('should read the file named by OPS_CONFIG', () => {
      process.env.OPS_CONFIG = writeYaml('launcher:\n  port: 9001\n');

      expect(new ConfigManager().getLaunchConfig().port).toBe(9001);
    });
  });

  describe('file configuration', () => {
    it('should apply values from the YAML file', () => {
      const file = writeYaml([
        'launcher:',
        '  port: 8100',
        '  reload: false',
        'download:',
        '  baseUrl: http://api.test:9000',
        '  windOnly: true',
        '  cities: [riohacha, uribia]',
        '  sleepBetween: 0',
        'logLevel: debug'
      ].join('\n'));

      const manager = new ConfigManager(file);

      expect(manager.getLaunchConfig().port).toBe(8100);
      expect(manager.getLaunchConfig().reload).toBe(false);
      expect(manager.getDownloadConfig().baseUrl).toBe('http://api.test:9000');
      expect(manager.getDownloadConfig().windOnly).toBe(true);
      expect(manager.getDownloadConfig().cities).toEqual(['riohacha', 'uribia']);
      expect(manager.getDownloadConfig().sleepBetween).toBe(0);
      expect(manager.getLogLevel()).toBe(LogLevel.DEBUG);
    });

    it('should treat an empty city list as all cities', () => {
      const manager = new ConfigManager(writeYaml('download:\n  cities: []\n'));

      expect(manager.getDownloadConfig().cities).toBeNull();
    });

    it('should reject values of the wrong type', () => {
      const file = writeYaml('launcher:\n  port: "eighty"\n');

      expect(() => new ConfigManager(file)).toThrow('Configuration key "port" must be a number');
    });

    it('should reject a section that is not a mapping', () => {
      const file = writeYaml('download: 5\n');

      expect(() => new ConfigManager(file)).toThrow('Configuration section "download" must be a mapping');
    });

    it('should reject an unknown log level', () => {
      const file = writeYaml('logLevel: loud\n');

      expect(() => new ConfigManager(file)).toThrow('Invalid logLevel in configuration file: loud');
    });
  });

  describe('environment overrides', () => {
    it('should let the environment win over the file', () => {
      const file = writeYaml('launcher:\n  port: 8100\n');
      process.env.PORT = '8200';
      process.env.HOST = '127.0.0.1';
      process.env.RELOAD = 'false';

      const launcher = new ConfigManager(file).getLaunchConfig();

      expect(launcher.port).toBe(8200);
      expect(launcher.host).toBe('127.0.0.1');
      expect(launcher.reload).toBe(false);
    });

    it('should apply DATA_DIR to both tools', () => {
      process.env.DATA_DIR = '/srv/climate/raw';

      const manager = new ConfigManager(MISSING_CONFIG);

      expect(manager.getLaunchConfig().dataDir).toBe('/srv/climate/raw');
      expect(manager.getDownloadConfig().dataDir).toBe('/srv/climate/raw');
    });

    it('should split CITIES on commas', () => {
      process.env.CITIES = ' riohacha, maicao ,,';

      expect(new ConfigManager(MISSING_CONFIG).getDownloadConfig().cities).toEqual(['riohacha', 'maicao']);
    });

    it('should ignore empty variables', () => {
      process.env.BASE_URL = '';

      expect(new ConfigManager(MISSING_CONFIG).getDownloadConfig().baseUrl).toBe('http://localhost:8000');
    });

    it('should reject a non-numeric PORT', () => {
      process.env.PORT = 'abc';

      expect(() => new ConfigManager(MISSING_CONFIG)).toThrow('Environment variable PORT is not a number: abc');
    });

    it('should reject an unknown LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'chatty';

      expect(() => new ConfigManager(MISSING_CONFIG)).toThrow('Invalid LOG_LEVEL: chatty');
    });
  });

  it('should return copies of the configuration', () => {
    process.env.CITIES = 'riohacha';
    const manager = new ConfigManager(MISSING_CONFIG);

    const first = manager.getDownloadConfig();
    first.cities?.push('uribia');
    first.yearsBack = 1;

    expect(manager.getDownloadConfig().cities).toEqual(['riohacha']);
    expect(manager.getDownloadConfig().yearsBack).toBe(10);
  });
});

describe('validation', () => {
  function download(overrides: Partial<DownloadConfig>): DownloadConfig {
    return { ...defaultConfig().download, ...overrides };
  }

  it('should reject ports outside 1-65535', () => {
    const launcher = { ...defaultConfig().launcher, port: 70000 };

    expect(validateLaunchConfig(launcher)).toEqual(['Port must be an integer between 1 and 65535, got 70000']);
  });

  it('should reject hours outside 0-23', () => {
    expect(validateDownloadConfig(download({ endHour: 24 }))).toEqual([
      'End hour must be an integer between 0 and 23, got 24'
    ]);
  });

  it('should reject a start hour after the end hour', () => {
    expect(validateDownloadConfig(download({ startHour: 18, endHour: 6 }))).toEqual([
      'Start hour (18) must not be after end hour (6)'
    ]);
  });

  it('should reject a base URL without a scheme', () => {
    expect(validateDownloadConfig(download({ baseUrl: 'localhost:8000' }))).toEqual([
      'Base URL must start with http:// or https://, got localhost:8000'
    ]);
  });

  it('should reject an unknown time zone', () => {
    expect(validateDownloadConfig(download({ timezone: 'Mars/Olympus' }))).toEqual([
      'Timezone must be an IANA time zone name, got Mars/Olympus'
    ]);
    expect(validateDownloadConfig(download({ timezone: 'America/Bogota' }))).toEqual([]);
  });

  it('should reject zero years', () => {
    expect(validateDownloadConfig(download({ yearsBack: 0 }))).toEqual([
      'Years back must be a positive integer, got 0'
    ]);
  });

  it('should throw a configuration error listing every problem', () => {
    const errors = validateDownloadConfig(download({ sleepBetween: -1, requestTimeout: -5 }));

    let thrown: unknown;
    try {
      assertValid(errors, 'download');
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(OpsError);
    if (thrown instanceof OpsError) {
      expect(thrown.errorType).toBe(OpsErrorType.CONFIGURATION_ERROR);
      expect(thrown.message).toBe(
        'Sleep between blocks must be a non-negative number of seconds, got -1; ' +
        'Request timeout must be a non-negative number of milliseconds, got -5'
      );
    }
  });

  it('should not throw when there are no errors', () => {
    expect(() => assertValid([], 'download')).not.toThrow();
  });
});
