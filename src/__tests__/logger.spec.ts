import chalk from 'chalk';
import { Logger } from '../utils/logger';

describe('Logger', () => {
  let previousLevel: typeof chalk.level;
  let lines: string[];
  const write = (line: string): void => {
    lines.push(line);
  };

  beforeAll(() => {
    previousLevel = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = previousLevel;
  });

  beforeEach(() => {
    lines = [];
  });

  it('writes messages at or above its level', () => {
    const logger = new Logger('info', write);
    logger.warn('header is short');
    logger.info('resolving');
    logger.debug('hidden');

    expect(lines).toEqual(['[warn] header is short', '[info] resolving']);
  });

  it('appends the error message to error lines', () => {
    const logger = new Logger('error', write);
    logger.error('decode failed:', new Error('bad magic'));
    logger.error('plain');
    logger.warn('hidden');

    expect(lines).toEqual(['[error] decode failed: bad magic', '[error] plain']);
  });

  it('stays quiet when silent', () => {
    const logger = new Logger('debug', write);
    logger.setLevel('silent');
    logger.error('nothing');

    expect(lines).toEqual([]);
    expect(logger.currentLevel).toBe('silent');
    expect(logger.isEnabled('error')).toBe(false);
  });
});
