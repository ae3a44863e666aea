import test from 'node:test';
import assert from 'node:assert';
import { existsSync, readFileSync, readdirSync, writeFileSync } from 'fs';
import { LockTimeoutError } from './errors.js';
import { acquireLock, lockPathFor, takeOverStaleLock } from './lock.js';
import { tempConfig } from './testing.js';

test('File lock', async t => {
  const tmp = tempConfig('');
  const lockPath = lockPathFor(tmp.path);
  t.after(() => tmp.cleanup());

  await t.test('holds the owner PID until released', async () => {
    const release = await acquireLock(tmp.path);
    assert.strictEqual(readFileSync(lockPath, 'utf-8'), `${process.pid}\n`);
    release();
    assert.ok(!existsSync(lockPath));
    // Deuxième appel sans effet
    release();
  });

  await t.test('times out while held', async () => {
    const release = await acquireLock(tmp.path);
    try {
      await assert.rejects(
        acquireLock(tmp.path, { timeoutMs: 150, pollMs: 20 }),
        (error: unknown) => error instanceof LockTimeoutError && error.timeoutMs === 150
      );
    } finally {
      release();
    }
  });

  await t.test('waits for the holder to release', async () => {
    const first = await acquireLock(tmp.path);
    setTimeout(first, 100);
    const second = await acquireLock(tmp.path, { timeoutMs: 2000, pollMs: 20 });
    assert.strictEqual(readFileSync(lockPath, 'utf-8'), `${process.pid}\n`);
    second();
  });

  await t.test('removes a lock left by a dead process', async () => {
    writeFileSync(lockPath, '2147483647\n');
    const messages: string[] = [];
    const release = await acquireLock(tmp.path, { timeoutMs: 500, log: msg => messages.push(msg) });
    assert.strictEqual(readFileSync(lockPath, 'utf-8'), `${process.pid}\n`);
    assert.strictEqual(messages.length, 1);
    release();
  });

  await t.test('a lock taken over by another process in the meantime is put back', () => {
    // Le PID mort a été lu, mais un autre processus a déjà recréé le verrou
    writeFileSync(lockPath, `${process.pid}\n`);
    takeOverStaleLock(lockPath, 2147483647);
    assert.strictEqual(readFileSync(lockPath, 'utf-8'), `${process.pid}\n`);
    assert.deepStrictEqual(readdirSync(tmp.dir).filter(name => name.endsWith('.stale')), []);

    takeOverStaleLock(lockPath, process.pid);
    assert.ok(!existsSync(lockPath));
    // Verrou déjà retiré par un concurrent : rien à faire
    takeOverStaleLock(lockPath, 2147483647);
    assert.deepStrictEqual(readdirSync(tmp.dir), ['wg0.conf']);
  });
});
