/**
 * Logger Tests
 *
 * Tests:
 * - Respects logLevel threshold (silent, errors, warnings, info, debug)
 * - Each method goes to the matching console method with a level label
 * - Context is appended as JSON, bigint and circular values included
 * - FileLogger truncates, timestamps and appends
 * - MultiLogger and createLogger() fan out to every logger
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';

import { existsSync, readFileSync, writeFileSync, mkdirSync, mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import {
  ConsoleLogger,
  FileLogger,
  LOG_LEVELS,
  MultiLogger,
  NULL_LOGGER,
  createLogger,
  isLogLevel,
  type Logger,
  type LogLevel,
} from '@apimeta/core';

// =============================================================================
// Test Helpers
// =============================================================================

/**
 * Captures console output during test execution
 */
interface ConsoleMock {
  logs: { method: string; line: string }[];
  install: () => void;
  restore: () => void;
}

function createConsoleMock(): ConsoleMock {
  const original = {
    error: console.error,
    warn: console.warn,
    info: console.info,
    log: console.log,
    debug: console.debug,
  };
  const mockObj: ConsoleMock = {
    logs: [],
    install() {
      const capture = (method: string) => (...args: unknown[]) => {
        mockObj.logs.push({ method, line: args.map(String).join(' ') });
      };
      console.error = capture('error');
      console.warn = capture('warn');
      console.info = capture('info');
      console.log = capture('log');
      console.debug = capture('debug');
    },
    restore() {
      Object.assign(console, original);
    },
  };
  return mockObj;
}

function logAtEveryLevel(logger: Logger): void {
  logger.error('error');
  logger.warn('warn');
  logger.info('info');
  logger.debug('debug');
  logger.trace('trace');
}

// =============================================================================
// TESTS: ConsoleLogger
// =============================================================================

describe('Logger', () => {
  describe('ConsoleLogger', () => {
    let consoleMock: ConsoleMock;

    beforeEach(() => {
      consoleMock = createConsoleMock();
      consoleMock.install();
    });

    afterEach(() => {
      consoleMock.restore();
    });

    it('should route each method to its console method with a label', () => {
      logAtEveryLevel(new ConsoleLogger('debug'));

      assert.deepStrictEqual(consoleMock.logs, [
        { method: 'error', line: '[ERROR] error' },
        { method: 'warn', line: '[WARN] warn' },
        { method: 'info', line: '[INFO] info' },
        { method: 'debug', line: '[DEBUG] debug' },
        { method: 'debug', line: '[TRACE] trace' },
      ]);
    });

    it('should default to info level', () => {
      logAtEveryLevel(new ConsoleLogger());
      assert.deepStrictEqual(consoleMock.logs.map((log) => log.method), ['error', 'warn', 'info']);
    });

    describe('log level threshold', () => {
      const expectedCounts: Record<LogLevel, number> = {
        silent: 0,
        errors: 1,
        warnings: 2,
        info: 3,
        debug: 5,
      };

      for (const level of LOG_LEVELS) {
        it(`${level}: should emit ${expectedCounts[level]} of 5 messages`, () => {
          logAtEveryLevel(new ConsoleLogger(level));
          assert.strictEqual(consoleMock.logs.length, expectedCounts[level]);
        });
      }
    });

    describe('context formatting', () => {
      it('should append context as JSON', () => {
        new ConsoleLogger('errors').error('Error occurred', { filePath: 'api.txt', line: 42 });
        assert.strictEqual(consoleMock.logs[0].line, '[ERROR] Error occurred {"filePath":"api.txt","line":42}');
      });

      it('should omit an empty context', () => {
        new ConsoleLogger('info').info('Done', {});
        assert.strictEqual(consoleMock.logs[0].line, '[INFO] Done');
      });

      it('should write bigint values as strings', () => {
        new ConsoleLogger('info').info('Variant', { value: 2n ** 64n - 1n });
        assert.strictEqual(consoleMock.logs[0].line, '[INFO] Variant {"value":"18446744073709551615"}');
      });

      it('should not throw on circular references', () => {
        const context: Record<string, unknown> = { name: 'a' };
        context.self = context;

        new ConsoleLogger('info').info('Circular', context);
        assert.strictEqual(consoleMock.logs[0].line, '[INFO] Circular {"name":"a","self":"[Circular]"}');
      });
    });

    it('should drop everything through NULL_LOGGER', () => {
      logAtEveryLevel(NULL_LOGGER);
      assert.strictEqual(consoleMock.logs.length, 0);
    });
  });

  // ===========================================================================
  // TESTS: isLogLevel
  // ===========================================================================

  describe('isLogLevel', () => {
    it('should accept every level name', () => {
      for (const level of LOG_LEVELS) {
        assert.ok(isLogLevel(level), level);
      }
    });

    it('should reject other strings', () => {
      assert.strictEqual(isLogLevel('verbose'), false);
      assert.strictEqual(isLogLevel('INFO'), false);
      assert.strictEqual(isLogLevel(''), false);
    });
  });

  // ===========================================================================
  // TESTS: FileLogger
  // ===========================================================================

  describe('FileLogger', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = mkdtempSync(join(tmpdir(), 'apimeta-logger-'));
    });

    afterEach(() => {
      rmSync(testDir, { recursive: true, force: true });
    });

    it('should write timestamped lines', () => {
      const logFile = join(testDir, 'run.log');
      const logger = new FileLogger('debug', logFile);

      logger.info('Collected Foo 1.0', { functions: 2 });
      logger.trace('meth Close');

      const lines = readFileSync(logFile, 'utf-8').split('\n');
      assert.strictEqual(lines.length, 3);
      assert.match(lines[0], /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z \[INFO\] Collected Foo 1\.0 \{"functions":2\}$/);
      assert.match(lines[1], /^\S+ \[TRACE\] meth Close$/);
      assert.strictEqual(lines[2], '');
    });

    it('should respect its own level', () => {
      const logFile = join(testDir, 'run.log');
      logAtEveryLevel(new FileLogger('warnings', logFile));

      const content = readFileSync(logFile, 'utf-8');
      assert.strictEqual(content.trim().split('\n').length, 2);
    });

    it('should truncate an existing file', () => {
      const logFile = join(testDir, 'run.log');
      writeFileSync(logFile, 'stale line\n');

      new FileLogger('debug', logFile);

      assert.strictEqual(readFileSync(logFile, 'utf-8'), '');
    });

    it('should create parent directories', () => {
      const logFile = join(testDir, 'nested', 'deeper', 'run.log');
      new FileLogger('debug', logFile).error('failed');

      assert.ok(existsSync(logFile));
    });

    it('should throw when the path is a directory', () => {
      const logDir = join(testDir, 'logs');
      mkdirSync(logDir);

      assert.throws(() => new FileLogger('debug', logDir), /is a directory/);
    });
  });

  // ===========================================================================
  // TESTS: MultiLogger and createLogger
  // ===========================================================================

  describe('MultiLogger', () => {
    it('should forward each call to every logger', () => {
      const received: string[] = [];
      const recorder = (prefix: string): Logger => ({
        error: (msg) => { received.push(`${prefix}:error:${msg}`); },
        warn: (msg) => { received.push(`${prefix}:warn:${msg}`); },
        info: (msg) => { received.push(`${prefix}:info:${msg}`); },
        debug: (msg) => { received.push(`${prefix}:debug:${msg}`); },
        trace: (msg) => { received.push(`${prefix}:trace:${msg}`); },
      });

      const logger = new MultiLogger([recorder('a'), recorder('b')]);
      logger.warn('w');
      logger.trace('t');

      assert.deepStrictEqual(received, ['a:warn:w', 'b:warn:w', 'a:trace:t', 'b:trace:t']);
    });
  });

  describe('createLogger', () => {
    let consoleMock: ConsoleMock;
    let testDir: string;

    beforeEach(() => {
      consoleMock = createConsoleMock();
      consoleMock.install();
      testDir = mkdtempSync(join(tmpdir(), 'apimeta-logger-'));
    });

    afterEach(() => {
      consoleMock.restore();
      rmSync(testDir, { recursive: true, force: true });
    });

    it('should return a console logger at the given level', () => {
      const logger = createLogger('errors');
      assert.ok(logger instanceof ConsoleLogger);

      logAtEveryLevel(logger);
      assert.strictEqual(consoleMock.logs.length, 1);
    });

    it('should add a debug file logger with logFile', () => {
      const logFile = join(testDir, 'apimeta.log');
      const logger = createLogger('errors', { logFile });
      assert.ok(logger instanceof MultiLogger);

      logAtEveryLevel(logger);

      assert.strictEqual(consoleMock.logs.length, 1);
      assert.strictEqual(readFileSync(logFile, 'utf-8').trim().split('\n').length, 5);
    });
  });
});
