import test from 'node:test';
import assert from 'node:assert';
import { formatMessage, logger } from './logger.js';

test('Logger', async t => {
  const stdout: string[] = [];
  const stderr: string[] = [];

  t.beforeEach(() => {
    stdout.length = 0;
    stderr.length = 0;
    logger.setSink({ stdout: line => stdout.push(line), stderr: line => stderr.push(line) });
    logger.configure({ level: 'info', colors: false, stderrOnly: false });
  });
  t.after(() => {
    logger.setSink();
    logger.configure({ level: 'info', colors: null, stderrOnly: false });
  });

  await t.test('line format', () => {
    logger.setColors(false);
    const now = new Date(2026, 0, 15, 9, 5, 3);
    assert.strictEqual(formatMessage('warn', 'Interface wg0 inactive', [], now), '[2026-01-15 09:05:03] [WARN ] Interface wg0 inactive');
    assert.strictEqual(
      formatMessage('info', 'diff', [{ added: 1 }, 'ok'], now),
      '[2026-01-15 09:05:03] [INFO ] diff {"added":1} ok'
    );
  });

  await t.test('levels and streams', () => {
    logger.debug('hidden');
    logger.info('to stdout');
    logger.warn('to stderr');
    assert.strictEqual(stdout.length, 1);
    assert.ok(stdout[0].endsWith('[INFO ] to stdout'));
    assert.strictEqual(stderr.length, 1);
    assert.ok(stderr[0].endsWith('[WARN ] to stderr'));

    logger.setLevel('debug');
    logger.createSimpleLogger('debug')('wg set wg0');
    assert.ok(stdout[1].endsWith('[DEBUG] wg set wg0'));
  });

  await t.test('everything on stderr when stdout carries data', () => {
    logger.setStderrOnly(true);
    logger.info('Peer "phone" ajouté');
    assert.deepStrictEqual(stdout, []);
    assert.strictEqual(stderr.length, 1);
  });
});
