import test from 'node:test';
import assert from 'node:assert';
import { ReconcileError } from './errors.js';
import { PeerManager } from './manager.js';
import { ReconciliationController } from './reconcile.js';
import { PeerRegistry } from './registry.js';
import { ConfigStore } from './store.js';
import { FakeEngine, TempConfig, fakeKeys, serverConfigText, tempConfig } from './testing.js';

const NOW = new Date('2026-01-15T12:00:00Z');

function setup(): { tmp: TempConfig; engine: FakeEngine; manager: PeerManager } {
  const tmp = tempConfig(serverConfigText());
  const engine = new FakeEngine();
  const registry = new PeerRegistry(new ConfigStore(tmp.path), { keys: fakeKeys() });
  const manager = new PeerManager(registry, new ReconciliationController(engine), { now: () => NOW });
  return { tmp, engine, manager };
}

test('PeerManager', async t => {
  await t.test('add applies the new peer to the interface', async () => {
    const { tmp, engine, manager } = setup();
    try {
      const result = await manager.addPeer('phone', 'vpn.example.com');
      assert.deepStrictEqual(result.applied?.added, ['client-public-1']);
      assert.strictEqual(result.liveError, undefined);
      assert.ok(engine.peers.has('client-public-1'));
    } finally {
      tmp.cleanup();
    }
  });

  await t.test('add with the interface down still writes the peer', async () => {
    const { tmp, engine, manager } = setup();
    try {
      engine.up = false;
      const result = await manager.addPeer('phone', 'vpn.example.com');
      assert.strictEqual(result.applied, undefined);
      assert.strictEqual(result.liveError?.kind, 'interface-down');
      assert.strictEqual(result.peer.publicKey, 'client-public-1');

      engine.up = true;
      assert.deepStrictEqual((await manager.reconcile()).added, ['client-public-1']);
      assert.deepStrictEqual((await manager.reconcile()).unchanged, ['client-public-1']);
    } finally {
      tmp.cleanup();
    }
  });

  await t.test('an unreadable interface does not lose the written peer', async () => {
    const { tmp, engine, manager } = setup();
    try {
      engine.failListing = true;
      const result = await manager.addPeer('phone', 'vpn.example.com');

      assert.strictEqual(result.applied, undefined);
      assert.strictEqual(result.liveError?.kind, 'engine-failure');
      assert.strictEqual(result.liveError?.message, 'lecture de wg0 impossible: wg show: permission denied');
      assert.strictEqual(result.bundle.privateKey, 'client-private-1');
      assert.deepStrictEqual((await manager.status()).map(p => p.label), ['phone']);

      const removed = await manager.removePeer('phone');
      assert.strictEqual(removed.liveError?.kind, 'engine-failure');

      await assert.rejects(
        manager.reconcile(),
        (error: unknown) => error instanceof ReconcileError && error.kind === 'engine-failure' && error.exitCode === 9
      );
    } finally {
      tmp.cleanup();
    }
  });

  await t.test('remove takes the peer off the interface', async () => {
    const { tmp, engine, manager } = setup();
    try {
      await manager.addPeer('phone', 'vpn.example.com');
      const result = await manager.removePeer('phone');
      assert.deepStrictEqual(result.applied?.removed, ['client-public-1']);
      assert.strictEqual(engine.peers.size, 0);
    } finally {
      tmp.cleanup();
    }
  });

  await t.test('status merges handshakes and transfer counters', async () => {
    const { tmp, engine, manager } = setup();
    try {
      await manager.addPeer('phone', 'vpn.example.com');
      await manager.addPeer('laptop', 'vpn.example.com');
      await manager.addPeer('tablet', 'vpn.example.com');

      engine.peers.set('client-public-1', {
        publicKey: 'client-public-1',
        endpoint: '203.0.113.5:40000',
        allowedIPs: ['10.50.0.2/32'],
        latestHandshake: new Date(NOW.getTime() - 60_000),
        transferRx: 1024,
        transferTx: 2048,
      });
      engine.peers.set('client-public-2', {
        publicKey: 'client-public-2',
        allowedIPs: ['10.50.0.3/32'],
        latestHandshake: new Date(NOW.getTime() - 300_000),
        transferRx: 10,
        transferTx: 20,
      });

      const status = await manager.status();
      assert.deepStrictEqual(status.map(s => [s.label, s.online]), [
        ['phone', true],
        ['laptop', false],
        ['tablet', false],
      ]);
      assert.strictEqual(status[0].endpoint, '203.0.113.5:40000');
      assert.strictEqual(status[0].transferRx, 1024);
      assert.strictEqual(status[1].latestHandshake?.getTime(), NOW.getTime() - 300_000);
      assert.strictEqual(status[2].latestHandshake, undefined);
      assert.strictEqual(status[2].transferTx, 0);
    } finally {
      tmp.cleanup();
    }
  });

  await t.test('status without a live interface', async () => {
    const { tmp, engine, manager } = setup();
    try {
      await manager.addPeer('phone', 'vpn.example.com');
      engine.up = false;
      const [phone] = await manager.status();
      assert.strictEqual(phone.online, false);
      assert.strictEqual(phone.ipv4, '10.50.0.2');
    } finally {
      tmp.cleanup();
    }
  });
});
