import fs from 'fs';
import path from 'path';
import { LogLevel, OpsLogger, formatLogEntry, parseLogLevel } from '../../src/common/utils/logger';
import { makeTempDir, removeDir } from '../helpers/test-utils';

describe('OpsLogger', () => {
  let infoSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => {});
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    infoSpy.mockRestore();
    warnSpy.mockRestore();
  });

  describe('console output', () => {
    it('should prefix messages with level, module and operation', () => {
      const logger = new OpsLogger({ moduleName: 'test' });

      logger.info('hello', undefined, 'greet');

      expect(infoSpy).toHaveBeenCalledTimes(1);
      expect(infoSpy.mock.calls[0][0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+Z INFO  \[test\] \[greet\] hello$/);
    });

    it('should name sub loggers after their parent', () => {
      const root = new OpsLogger({ moduleName: 'ops' });
      const sub = root.createSubLogger('download').createSubLogger('driver');

      expect(sub.moduleName).toBe('ops.download.driver');

      sub.warn('careful');
      expect(warnSpy.mock.calls[0][0]).toMatch(/ WARN  \[ops\.download\.driver\] careful$/);
    });

    it('should apply the root level to sub loggers', () => {
      const root = new OpsLogger({ moduleName: 'ops' });
      const sub = root.createSubLogger('launcher');

      root.configure({ minLevel: LogLevel.WARN });
      sub.info('hidden');
      sub.warn('shown');

      expect(infoSpy).not.toHaveBeenCalled();
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('file output', () => {
    let dir: string;

    beforeEach(() => {
      dir = makeTempDir();
    });

    afterEach(() => {
      removeDir(dir);
    });

    it('should append every entry to the configured file', () => {
      const filePath = path.join(dir, 'logs', 'download.log');
      const root = new OpsLogger({ moduleName: 'ops', consoleOutput: false });
      root.configure({ filePath });

      root.createSubLogger('driver').info('first');
      root.info('second');

      const lines = fs.readFileSync(filePath, 'utf-8').trim().split('\n');
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/ INFO  \[ops\.driver\] first$/);
      expect(lines[1]).toMatch(/ INFO  \[ops\] second$/);
      expect(infoSpy).not.toHaveBeenCalled();
    });
  });

  describe('formatLogEntry', () => {
    it('should render data as indented JSON', () => {
      const line = formatLogEntry({
        level: LogLevel.WARN,
        message: 'block failed',
        module: 'ops.driver',
        timestamp: new Date('2024-01-02T03:04:05.000Z'),
        data: { city: 'riohacha' }
      });

      expect(line).toBe('2024-01-02T03:04:05.000Z WARN  [ops.driver] block failed\nData: {\n  "city": "riohacha"\n}');
    });

    it('should append the error message', () => {
      const error = new Error('boom');
      error.stack = undefined;

      const line = formatLogEntry({
        level: LogLevel.ERROR,
        message: 'failed',
        module: 'ops',
        operation: 'run',
        timestamp: new Date('2024-01-02T03:04:05.000Z'),
        error
      });

      expect(line).toBe('2024-01-02T03:04:05.000Z ERROR [ops] [run] failed\nError: boom');
    });
  });

  describe('parseLogLevel', () => {
    it('should accept known levels in any case', () => {
      expect(parseLogLevel('WARN')).toBe(LogLevel.WARN);
      expect(parseLogLevel(' debug ')).toBe(LogLevel.DEBUG);
    });

    it('should reject unknown levels', () => {
      expect(parseLogLevel('verbose')).toBeUndefined();
      expect(parseLogLevel(undefined)).toBeUndefined();
    });
  });
});
