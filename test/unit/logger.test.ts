import fs from 'fs';
import os from 'os';
import path from 'path';
import { configureLogger, isLogLevel, logger } from '../../agent/utils/logger';

describe('logger', () => {
  afterEach(() => {
    configureLogger({ level: 'info', file: null });
  });

  it('recognizes log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });

  it('writes info to stdout and warnings to stderr', () => {
    logger.info('🎙️  Recording started');
    logger.warn('⚠️  careful', { retry: false });

    expect(console.log).toHaveBeenCalledWith('🎙️  Recording started');
    expect(console.warn).toHaveBeenCalledWith('⚠️  careful', { retry: false });
  });

  it('drops messages below the configured level', () => {
    configureLogger({ level: 'warn' });
    logger.debug('hidden');
    logger.info('hidden');
    logger.error('shown');

    expect(console.log).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith('shown');
  });

  it('appends lines to the log file', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dictation-log-'));
    const file = path.join(dir, 'nested', 'dictation.log');
    configureLogger({ file });

    logger.error('boom', { code: 1 });
    await new Promise((resolve) => setTimeout(resolve, 50));

    const contents = fs.readFileSync(file, 'utf8');
    expect(contents).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] ERROR: boom \{"code":1\}\n$/);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
