import fs from 'fs';
import path from 'path';
import { EnvLoader } from '../../src/common/config/env';
import { makeTempDir, removeDir } from '../helpers/test-utils';

const KEYS = ['OPS_TEST_NAME', 'OPS_TEST_PORT', 'OPS_TEST_FLAG', 'OPS_TEST_LIST'];

describe('EnvLoader', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    KEYS.forEach(key => delete process.env[key]);
    EnvLoader.reset();
  });

  afterEach(() => {
    removeDir(dir);
    KEYS.forEach(key => delete process.env[key]);
    EnvLoader.reset();
  });

  it('should prefer .env.local over .env', () => {
    fs.writeFileSync(path.join(dir, '.env'), 'OPS_TEST_NAME=from-env\nOPS_TEST_PORT=8100\n');
    fs.writeFileSync(path.join(dir, '.env.local'), 'OPS_TEST_NAME=from-local\n');

    EnvLoader.initialize(dir);

    expect(EnvLoader.get('OPS_TEST_NAME')).toBe('from-local');
    expect(EnvLoader.get('OPS_TEST_PORT')).toBeUndefined();
  });

  it('should not override variables that are already set', () => {
    process.env.OPS_TEST_NAME = 'from-shell';
    fs.writeFileSync(path.join(dir, '.env'), 'OPS_TEST_NAME=from-file\n');

    EnvLoader.initialize(dir);

    expect(EnvLoader.get('OPS_TEST_NAME')).toBe('from-shell');
  });

  it('should convert typed values', () => {
    process.env.OPS_TEST_PORT = '8100';
    process.env.OPS_TEST_FLAG = 'YES';
    process.env.OPS_TEST_LIST = 'a, b,,c';

    expect(EnvLoader.getNumber('OPS_TEST_PORT')).toBe(8100);
    expect(EnvLoader.getBoolean('OPS_TEST_FLAG')).toBe(true);
    expect(EnvLoader.getArray('OPS_TEST_LIST')).toEqual(['a', 'b', 'c']);
    expect(EnvLoader.getNumber('OPS_TEST_MISSING', 5)).toBe(5);
  });

  it('should treat empty values as unset', () => {
    process.env.OPS_TEST_NAME = '';

    expect(EnvLoader.get('OPS_TEST_NAME', 'fallback')).toBe('fallback');
  });

  it('should reject non-numeric values', () => {
    process.env.OPS_TEST_PORT = '80a';

    expect(() => EnvLoader.getNumber('OPS_TEST_PORT')).toThrow('Environment variable OPS_TEST_PORT is not a number: 80a');
  });
});
