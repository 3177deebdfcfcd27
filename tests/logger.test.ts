import fs from 'fs';
import path from 'path';
import winston from 'winston';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { configureLogger, logger } from '../src/utils/logger';
import { makeTempDir, removeDir } from './helpers';

describe('configureLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    for (const transport of logger.transports.filter((t) => t instanceof winston.transports.File)) {
      logger.remove(transport);
    }
    removeDir(dir);
  });

  it('resolves a relative log file against the given directory', () => {
    const file = configureLogger({ file: 'logs/workflow_{timestamp}.log', baseDir: dir });

    expect(file).toBeDefined();
    expect(path.dirname(file ?? '')).toBe(path.join(dir, 'logs'));
    expect(path.basename(file ?? '')).toMatch(/^workflow_\d{8}_\d{6}\.log$/);
    expect(fs.existsSync(path.join(dir, 'logs'))).toBe(true);
  });

  it('keeps an absolute log file as given', () => {
    const target = path.join(dir, 'abs', 'run.log');

    expect(configureLogger({ file: target, baseDir: '/elsewhere' })).toBe(target);
  });

  it('adds no file without a path', () => {
    expect(configureLogger({})).toBeUndefined();
  });
});
