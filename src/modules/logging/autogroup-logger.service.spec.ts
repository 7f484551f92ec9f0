import { AutogroupLogger } from './autogroup-logger.service';
import { LogLevel, LogCategory } from './log-levels';

describe('AutogroupLogger', () => {
  let logger: AutogroupLogger;

  let stdoutSpy: jest.SpyInstance;
  let stderrSpy: jest.SpyInstance;
  let consoleLogSpy: jest.SpyInstance;
  let consoleDebugSpy: jest.SpyInstance;
  let consoleWarnSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(() => {
    logger = new AutogroupLogger();
    logger.updateConfig({
      globalLevel: LogLevel.TRACE,
      categoryLevels: {},
      includeStackTraces: true,
      maxPayloadSizeBytes: 8192,
      format: 'json',
    });

    stdoutSpy = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    stderrSpy = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleDebugSpy = jest.spyOn(console, 'debug').mockImplementation();
    consoleWarnSpy = jest.spyOn(console, 'warn').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  // ─── Configuration ────────────────────────────────────────────────

  describe('configuration', () => {
    it('getConfig should return a copy', () => {
      const config = logger.getConfig();
      config.categoryLevels[LogCategory.DATABASE] = LogLevel.OFF;

      expect(logger.getConfig().categoryLevels).toEqual({});
    });

    it('updateConfig should merge partial updates', () => {
      logger.updateConfig({ globalLevel: LogLevel.WARN });

      expect(logger.getConfig().globalLevel).toBe(LogLevel.WARN);
      expect(logger.getConfig().format).toBe('json');
    });
  });

  // ─── isEnabled ────────────────────────────────────────────────────

  describe('isEnabled', () => {
    it('should compare against the global level', () => {
      logger.updateConfig({ globalLevel: LogLevel.INFO });

      expect(logger.isEnabled(LogLevel.DEBUG)).toBe(false);
      expect(logger.isEnabled(LogLevel.INFO)).toBe(true);
      expect(logger.isEnabled(LogLevel.ERROR)).toBe(true);
    });

    it('should let a category override win over the global level', () => {
      logger.updateConfig({
        globalLevel: LogLevel.WARN,
        categoryLevels: { [LogCategory.MEMBERSHIP]: LogLevel.TRACE },
      });

      expect(logger.isEnabled(LogLevel.DEBUG, LogCategory.MEMBERSHIP)).toBe(true);
      expect(logger.isEnabled(LogLevel.DEBUG, LogCategory.LIFECYCLE)).toBe(false);
    });

    it('should never enable OFF', () => {
      expect(logger.isEnabled(LogLevel.OFF)).toBe(false);
    });
  });

  // ─── Correlation context ──────────────────────────────────────────

  describe('correlation context', () => {
    it('should be undefined outside runWithContext', () => {
      expect(logger.getContext()).toBeUndefined();
    });

    it('should expose and enrich the context inside the callback', () => {
      const result = logger.runWithContext({ operationId: 'op-1', groupId: 5 }, () => {
        logger.enrichContext({ courseId: 2 });
        return logger.getContext();
      });

      expect(result).toEqual({ operationId: 'op-1', groupId: 5, courseId: 2 });
      expect(logger.getContext()).toBeUndefined();
    });

    it('should propagate across awaits', async () => {
      await logger.runWithContext({ operationId: 'op-2' }, async () => {
        await Promise.resolve();
        logger.info(LogCategory.MEMBERSHIP, 'Member added');
      });

      expect(logger.getRecentLogs()[0]).toMatchObject({ operationId: 'op-2', message: 'Member added' });
    });

    it('should ignore enrichContext outside a context', () => {
      logger.enrichContext({ groupId: 9 });

      expect(logger.getContext()).toBeUndefined();
    });

    it('should compute durationMs from startTime', () => {
      jest.spyOn(Date, 'now').mockReturnValue(1500);

      logger.runWithContext({ operationId: 'op-3', startTime: 1000 }, () => {
        logger.info(LogCategory.LIFECYCLE, 'Group removed');
      });

      expect(logger.getRecentLogs()[0].durationMs).toBe(500);
    });
  });

  // ─── Output ───────────────────────────────────────────────────────

  describe('json output', () => {
    it('should write one JSON line to stdout below WARN', () => {
      logger.info(LogCategory.EVENT, 'group_member_added', { groupId: 5, userId: 7 });

      expect(stdoutSpy).toHaveBeenCalledTimes(1);
      const line = String(stdoutSpy.mock.calls[0][0]);
      expect(line.endsWith('\n')).toBe(true);
      expect(JSON.parse(line)).toMatchObject({
        level: 'INFO',
        category: 'autogroup.event',
        message: 'group_member_added',
        data: { groupId: 5, userId: 7 },
      });
    });

    it('should write WARN and above to stderr', () => {
      logger.warn(LogCategory.ENTITY, 'Rejected autogroup argument');
      logger.error(LogCategory.DATABASE, 'Query failed', new Error('boom'));

      expect(stderrSpy).toHaveBeenCalledTimes(2);
      expect(stdoutSpy).not.toHaveBeenCalled();
    });
  });

  describe('pretty output', () => {
    beforeEach(() => {
      logger.updateConfig({ format: 'pretty' });
    });

    it('should route each level to the matching console method', () => {
      logger.debug(LogCategory.MEMBERSHIP, 'Already a member');
      logger.info(LogCategory.MEMBERSHIP, 'Member added');
      logger.warn(LogCategory.MEMBERSHIP, 'Reconcile skipped');
      logger.error(LogCategory.DATABASE, 'Query failed');

      expect(consoleDebugSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });

    it('should include the message and the group id', () => {
      logger.runWithContext({ operationId: 'abcdef1234', groupId: 5 }, () => {
        logger.info(LogCategory.LIFECYCLE, 'Group created');
      });

      const line = String(consoleLogSpy.mock.calls[0][0]);
      expect(line).toContain(' [abcdef12] group:5');
      expect(line.endsWith(' Group created')).toBe(true);
    });
  });

  // ─── Errors ───────────────────────────────────────────────────────

  describe('errors', () => {
    it('should capture Error name, message and stack', () => {
      const err = new TypeError('bad input');
      logger.error(LogCategory.ENTITY, 'Construction rejected', err);

      expect(logger.getRecentLogs()[0].error).toEqual({ message: 'bad input', name: 'TypeError', stack: err.stack });
    });

    it('should strip stacks when disabled', () => {
      logger.updateConfig({ includeStackTraces: false });
      logger.error(LogCategory.ENTITY, 'Construction rejected', new Error('bad input'));

      expect(logger.getRecentLogs()[0].error).toEqual({ message: 'bad input', name: 'Error' });
    });

    it('should stringify non-Error values and skip empty ones', () => {
      logger.error(LogCategory.LIFECYCLE, 'first', 'plain failure');
      logger.error(LogCategory.LIFECYCLE, 'second', undefined, { attempt: 2 });

      const [first, second] = logger.getRecentLogs();
      expect(first.error).toEqual({ message: 'plain failure' });
      expect(second.error).toBeUndefined();
      expect(second.data).toEqual({ attempt: 2 });
    });
  });

  // ─── Sanitization ─────────────────────────────────────────────────

  describe('sanitization', () => {
    it('should redact secret-looking keys', () => {
      logger.info(LogCategory.DATABASE, 'connect', {
        connectionString: 'postgres://user:test-secret@db/groups',
        enrolmentKey: 'test-key',
        password: 'test-password',
        host: 'db',
      });

      expect(logger.getRecentLogs()[0].data).toEqual({
        connectionString: '[REDACTED]',
        enrolmentKey: '[REDACTED]',
        password: '[REDACTED]',
        host: 'db',
      });
    });

    it('should truncate long strings and objects', () => {
      logger.updateConfig({ maxPayloadSizeBytes: 10 });
      logger.info(LogCategory.EVENT, 'big', { text: 'abcdefghijklmno', list: [1, 2, 3, 4, 5, 6] });

      expect(logger.getRecentLogs()[0].data).toEqual({
        text: 'abcdefghij...[truncated 5B]',
        list: '[1,2,3,4,5...[truncated]',
      });
    });

    it('should redact secret keys nested in objects and arrays', () => {
      logger.warn(LogCategory.ENTITY, 'Rejected autogroup argument', {
        argument: { id: 1, name: '', idNumber: 'x', enrolmentKey: 'test-key' },
        rows: [{ groupId: 5, auth: { token: 'test-token' } }],
      });

      const entry = logger.getRecentLogs()[0];
      expect(entry.data).toEqual({
        argument: { id: 1, name: '', idNumber: 'x', enrolmentKey: '[REDACTED]' },
        rows: [{ groupId: 5, auth: { token: '[REDACTED]' } }],
      });
      expect(String(stderrSpy.mock.calls[0][0])).not.toContain('test-key');
    });

    it('should redact before truncating a large nested object', () => {
      logger.updateConfig({ maxPayloadSizeBytes: 40 });
      logger.info(LogCategory.ENTITY, 'big', { attributes: { enrolmentKey: 'test-key', description: 'x'.repeat(50) } });

      const truncated = logger.getRecentLogs()[0].data?.attributes;
      expect(truncated).toBe('{"enrolmentKey":"[REDACTED]","descriptio...[truncated]');
    });

    it('should redact inside Maps', () => {
      logger.trace(LogCategory.ENTITY, 'cache', { byGroup: new Map([['5', { password: 'test-password' }]]) });

      expect(logger.getRecentLogs()[0].data).toEqual({ byGroup: { 5: { password: '[REDACTED]' } } });
    });

    it('should convert Maps to plain objects', () => {
      logger.trace(LogCategory.ENTITY, 'snapshot', { members: new Map([[11, 7], [12, 9]]) });

      expect(logger.getRecentLogs()[0].data).toEqual({ members: { 11: 7, 12: 9 } });
    });
  });

  // ─── Ring buffer ──────────────────────────────────────────────────

  describe('ring buffer', () => {
    it('should not store suppressed entries', () => {
      logger.updateConfig({ globalLevel: LogLevel.INFO });
      logger.debug(LogCategory.MEMBERSHIP, 'Already a member');

      expect(logger.getRecentLogs()).toEqual([]);
    });

    it('should filter by level, category and operation id', () => {
      logger.debug(LogCategory.MEMBERSHIP, 'a');
      logger.runWithContext({ operationId: 'op-x' }, () => {
        logger.info(LogCategory.MEMBERSHIP, 'b');
        logger.warn(LogCategory.LIFECYCLE, 'c');
      });

      expect(logger.getRecentLogs({ level: LogLevel.INFO }).map((e) => e.message)).toEqual(['b', 'c']);
      expect(logger.getRecentLogs({ category: LogCategory.MEMBERSHIP }).map((e) => e.message)).toEqual(['a', 'b']);
      expect(logger.getRecentLogs({ operationId: 'op-x', category: LogCategory.LIFECYCLE }).map((e) => e.message)).toEqual(['c']);
    });

    it('should return the newest entries up to the limit', () => {
      for (let i = 0; i < 5; i++) {
        logger.info(LogCategory.EVENT, `m${i}`);
      }

      expect(logger.getRecentLogs({ limit: 2 }).map((e) => e.message)).toEqual(['m3', 'm4']);
    });

    it('should evict the oldest entries beyond 500', () => {
      for (let i = 0; i < 505; i++) {
        logger.info(LogCategory.EVENT, `m${i}`);
      }

      const all = logger.getRecentLogs({ limit: 1000 });
      expect(all).toHaveLength(500);
      expect(all[0].message).toBe('m5');
    });
  });
});
