import fs from 'fs';
import path from 'path';
import { cleanCsvFiles, isAffirmative } from '../../src/download/csv-cleaner';
import { makeTempDir, removeDir, silentLogger } from '../helpers/test-utils';

describe('cleanCsvFiles', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    fs.writeFileSync(path.join(dir, 'uribia.csv'), 'date,wind\n');
    fs.writeFileSync(path.join(dir, 'riohacha.csv'), 'date,wind\n');
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'keep');
    fs.mkdirSync(path.join(dir, 'archive'));
    fs.writeFileSync(path.join(dir, 'archive', 'old.csv'), 'keep');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should delete top-level CSV files after confirmation', async () => {
    const confirm = jest.fn().mockResolvedValue(true);

    const result = await cleanCsvFiles(dir, { assumeYes: false, confirm, logger: silentLogger() });

    expect(confirm).toHaveBeenCalledWith(`Delete *.csv in ${dir}?`);
    expect(result).toEqual({
      cancelled: false,
      deleted: [path.join(dir, 'riohacha.csv'), path.join(dir, 'uribia.csv')]
    });
    expect(fs.readdirSync(dir).sort()).toEqual(['archive', 'notes.txt']);
    expect(fs.existsSync(path.join(dir, 'archive', 'old.csv'))).toBe(true);
  });

  it('should keep the files when the prompt is declined', async () => {
    const confirm = jest.fn().mockResolvedValue(false);

    const result = await cleanCsvFiles(dir, { assumeYes: false, confirm, logger: silentLogger() });

    expect(result).toEqual({ cancelled: true, deleted: [] });
    expect(fs.existsSync(path.join(dir, 'uribia.csv'))).toBe(true);
  });

  it('should skip the prompt with assumeYes', async () => {
    const confirm = jest.fn();

    const result = await cleanCsvFiles(dir, { assumeYes: true, confirm, logger: silentLogger() });

    expect(confirm).not.toHaveBeenCalled();
    expect(result.deleted).toHaveLength(2);
  });

  it('should create a missing data directory', async () => {
    const target = path.join(dir, 'fresh', 'raw');

    const result = await cleanCsvFiles(target, { assumeYes: true, logger: silentLogger() });

    expect(result).toEqual({ cancelled: false, deleted: [] });
    expect(fs.statSync(target).isDirectory()).toBe(true);
  });
});

describe('isAffirmative', () => {
  it('should accept y and yes only', () => {
    expect(isAffirmative('y')).toBe(true);
    expect(isAffirmative(' YES ')).toBe(true);
    expect(isAffirmative('')).toBe(false);
    expect(isAffirmative('n')).toBe(false);
    expect(isAffirmative('yep')).toBe(false);
  });
});
