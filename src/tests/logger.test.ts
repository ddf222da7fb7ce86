import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Logger, StepTimer, formatLogLine, formatTimestamp, isLogLevel } from '../logger';

const AT = new Date(2024, 0, 2, 3, 4, 5);

describe('formatting', () => {
  it('formats local timestamps', () => {
    expect(formatTimestamp(AT)).toBe('2024-01-02 03:04:05');
  });

  it('renders meta after the message', () => {
    expect(formatLogLine('warn', 'Hello', [{ a: 1 }, new Error('boom'), 'x'], AT)).toBe(
      '2024-01-02 03:04:05 - WARN - Hello {"a":1} boom x'
    );
    expect(formatLogLine('info', 'Plain', [], AT)).toBe('2024-01-02 03:04:05 - INFO - Plain');
  });

  it('recognizes log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});

describe('Logger', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'logger-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('drops messages below the configured level', () => {
    const stderr = jest.spyOn(console, 'error');
    stderr.mockClear();
    const log = new Logger('warn');

    log.info('hidden');
    log.warn('shown');

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0][0])).toMatch(/ - WARN - shown$/);
  });

  it('rotates the log file and keeps the configured number of backups', () => {
    const logPath = join(dir, 'logs', 'extractor.log');
    const log = new Logger('info');
    log.attachFile({ path: logPath, maxBytes: 10, backups: 2 });

    log.info('one');
    log.info('two');
    log.info('three');
    log.info('four');

    expect(readFileSync(logPath, 'utf-8')).toMatch(/ - INFO - four\n$/);
    expect(readFileSync(`${logPath}.1`, 'utf-8')).toMatch(/ - INFO - three\n$/);
    expect(readFileSync(`${logPath}.2`, 'utf-8')).toMatch(/ - INFO - two\n$/);
    expect(existsSync(`${logPath}.3`)).toBe(false);
  });

  it('keeps logging to stderr when the log directory cannot be created', () => {
    const blocker = join(dir, 'blocker');
    writeFileSync(blocker, 'not a directory');
    const stderr = jest.spyOn(console, 'error');
    const log = new Logger('info');

    expect(log.attachFile({ path: join(blocker, 'logs', 'run.log') })).toBe(false);
    stderr.mockClear();
    log.info('still here');

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0][0])).toMatch(/ - INFO - still here$/);
    expect(existsSync(join(blocker, 'logs'))).toBe(false);
  });

  it('stops writing the file once detached', () => {
    const logPath = join(dir, 'extractor.log');
    const log = new Logger('info');
    log.attachFile({ path: logPath });
    log.info('kept');
    log.detachFile();
    log.info('console only');

    expect(readFileSync(logPath, 'utf-8').trim().split('\n')).toHaveLength(1);
  });
});

describe('StepTimer', () => {
  it('measures each step and the whole run', () => {
    const ticks = [1_000, 2_500, 4_000];
    const timer = new StepTimer(() => ticks.shift() ?? 0);

    timer.start('run');
    expect(timer.step('login')).toBe(1_500);
    expect(timer.finish('run')).toBe(3_000);
  });
});
