import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { context as otelContext, trace } from '@opentelemetry/api';
import { AsyncLocalStorageContextManager } from '@opentelemetry/context-async-hooks';

import { createLoggerFromEnv } from '../from-env.js';
import { withSpan, withSpanSync } from '../otel-correlation.js';
import { createLogger, type CreateLoggerOptions } from '../schema.js';

// Unit tests don't run the OTel SDK bootstrap; a real context manager is
// enough for active-span lookups.
otelContext.setGlobalContextManager(new AsyncLocalStorageContextManager().enable());

const TRACE_ID = '0af7651916cd43dd8448eb211c80319c';
const SPAN_ID = 'b7ad6b7169203331';

function memorySink(): { lines: string[]; write: (chunk: string) => void } {
  const lines: string[] = [];
  return {
    lines,
    write: (chunk) => {
      lines.push(chunk);
    },
  };
}

function jsonLogger(overrides: Partial<CreateLoggerOptions> = {}) {
  const sink = memorySink();
  const logger = createLogger({
    service: 'svc',
    env: 'test',
    level: 'info',
    format: 'json',
    sink,
    ...overrides,
  });
  return { logger, sink };
}

function parseOnly(lines: readonly string[]): Record<string, unknown> {
  assert.equal(lines.length, 1);
  const parsed: unknown = JSON.parse(lines[0] ?? '');
  assert.ok(typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed));
  return Object.fromEntries(Object.entries(parsed));
}

void describe('createLogger', () => {
  void it('writes allow-listed JSON records', () => {
    const { logger, sink } = jsonLogger();

    logger.info({ tenantId: 's1' }, 'hello');

    const parsed = parseOnly(sink.lines);
    assert.deepEqual(Object.keys(parsed), [
      'created',
      'levelname',
      'msg',
      'name',
      'process',
      'processName',
      'thread',
      'threadName',
    ]);
    assert.equal(parsed['levelname'], 'INFO');
    assert.equal(parsed['msg'], 'hello');
    assert.equal(parsed['name'], 'svc');
    assert.equal(parsed['process'], process.pid);
    assert.equal(parsed['thread'], 0);
    assert.equal(parsed['threadName'], 'MainThread');
    assert.equal(typeof parsed['created'], 'number');
    assert.ok(sink.lines[0]?.endsWith('}\n'));
  });

  void it('filters by level', () => {
    const { logger, sink } = jsonLogger({ level: 'warn' });

    logger.info({}, 'dropped');
    logger.warn({}, 'kept');

    assert.equal(parseOnly(sink.lines)['msg'], 'kept');
  });

  void it('colors success lines green', () => {
    const { logger, sink } = jsonLogger({ format: 'color', template: '{levelname} {message}' });

    logger.success({}, 'done');

    assert.deepEqual(sink.lines, ['\u001b[32mSUCCESS done\u001b[39m\n']);
  });

  void it('profiles structured messages and skips text ones', () => {
    const { logger, sink } = jsonLogger({ format: 'profile', memoryProbe: () => 1024 });

    logger.info({}, 'not for the profiler');
    logger.info({}, { event: 'cache-hit', ms: 12 });

    const parsed = parseOnly(sink.lines);
    assert.deepEqual(Object.keys(parsed), [
      'created',
      'event',
      'memory',
      'module',
      'ms',
      'process',
      'thread',
    ]);
    assert.equal(parsed['event'], 'cache-hit');
    assert.equal(parsed['memory'], 1024);
    assert.equal(parsed['module'], 'logger.test');
    assert.equal(parsed['ms'], 12);
  });

  void it('leaves module out of profile lines when callsite is turned off', () => {
    const { logger, sink } = jsonLogger({
      format: 'profile',
      callsite: false,
      memoryProbe: () => 1024,
    });

    logger.info({}, { event: 'cache-miss' });

    assert.equal(parseOnly(sink.lines)['module'], undefined);
  });

  void it('keeps structured profile payloads as logged', () => {
    const { logger, sink } = jsonLogger({ format: 'profile', memoryProbe: () => 1024 });

    logger.info(
      {},
      {
        event: 'llm',
        prompt_tokens: 512,
        started: '2024-01-01T10:00:00Z',
        request_id: 'abcdefghijklmnopqrst',
      }
    );

    const parsed = parseOnly(sink.lines);
    assert.equal(parsed['prompt_tokens'], 512);
    assert.equal(parsed['started'], '2024-01-01T10:00:00Z');
    assert.equal(parsed['request_id'], 'abcdefghijklmnopqrst');
  });

  void it('appends error stacks to plain lines', () => {
    const { logger, sink } = jsonLogger({ format: 'plain', template: '{message}' });

    logger.error({ error: new Error('kaput') }, 'failed');

    assert.equal(sink.lines.length, 1);
    assert.ok(sink.lines[0]?.startsWith('failed\nError: kaput\n'));
  });

  void it('takes log_id from the context', () => {
    const { logger, sink } = jsonLogger();

    logger.child({ logId: 'req-42' }).info({}, 'correlated');

    assert.equal(parseOnly(sink.lines)['log_id'], 'req-42');
  });

  void it('falls back to the active trace id for log_id', () => {
    const { logger, sink } = jsonLogger();
    const span = trace.wrapSpanContext({ traceId: TRACE_ID, spanId: SPAN_ID, traceFlags: 1 });

    otelContext.with(trace.setSpan(otelContext.active(), span), () => {
      withSpanSync('inner', {}, () => logger.info({}, 'traced'));
    });

    assert.equal(parseOnly(sink.lines)['log_id'], TRACE_ID);
  });

  void it('leaves log_id out without a valid span', async () => {
    const { logger, sink } = jsonLogger();

    await withSpan('detached', {}, () => {
      logger.info({}, 'untraced');
      return Promise.resolve();
    });

    assert.equal(parseOnly(sink.lines)['log_id'], undefined);
  });

  void it('records the calling file when asked to', () => {
    const { logger, sink } = jsonLogger({ callsite: true });

    logger.info({}, 'where');

    const parsed = parseOnly(sink.lines);
    assert.equal(parsed['filename'], 'logger.test.ts');
    assert.equal(parsed['module'], 'logger.test');
    assert.equal(typeof parsed['lineno'], 'number');
    assert.ok(String(parsed['pathname']).endsWith('logger.test.ts'));
  });

  void it('redacts sensitive context before formatting', () => {
    const { logger, sink } = jsonLogger({ format: 'plain', template: '{api_key}|{message}' });

    logger.info({ apiKey: 'test-secret' }, 'call');

    assert.deepEqual(sink.lines, ['[REDACTED_TOKEN]|call\n']);
  });
});

void describe('createLoggerFromEnv', () => {
  void it('builds the logger from environment settings', () => {
    const sink = memorySink();
    const logger = createLoggerFromEnv(
      {
        NODE_ENV: 'test',
        LOG_LEVEL: 'debug',
        LOG_FORMAT: 'plain',
        LOG_TEMPLATE: '{name}:{levelname}|{message}',
        LOG_SERVICE_NAME: 'worker',
      },
      { sink }
    );

    logger.debug({}, '\u001b[1mbold\u001b[22m');

    assert.deepEqual(sink.lines, ['worker:DEBUG|bold\n']);
  });

  void it('adds module to profile lines without LOG_CALLSITE', () => {
    const sink = memorySink();
    const logger = createLoggerFromEnv(
      { NODE_ENV: 'test', LOG_FORMAT: 'profile' },
      { sink, memoryProbe: () => 1 }
    );

    logger.info({}, { event: 'boot' });

    assert.equal(parseOnly(sink.lines)['module'], 'logger.test');
  });
});
