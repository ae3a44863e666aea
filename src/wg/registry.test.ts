import test from 'node:test';
import assert from 'node:assert';
import { readFileSync } from 'fs';
import { renderClientConfig } from './conf.js';
import {
  InvalidArgumentError,
  NoCapacityError,
  PeerExistsError,
  PeerNotFoundError,
} from './errors.js';
import { KeyGenerator } from './keys.js';
import { PeerRegistry, PeerRegistryOptions, formatEndpoint } from './registry.js';
import { ConfigStore } from './store.js';
import { SERVER_PUBLIC_KEY, TempConfig, fakeKeys, serverConfigText, tempConfig } from './testing.js';

function setup(text: string, options: PeerRegistryOptions = {}): { tmp: TempConfig; registry: PeerRegistry } {
  const tmp = tempConfig(text);
  const registry = new PeerRegistry(new ConfigStore(tmp.path), { keys: fakeKeys(), ...options });
  return { tmp, registry };
}

test('Endpoint formatting', () => {
  assert.strictEqual(formatEndpoint('vpn.example.com', 51820), 'vpn.example.com:51820');
  assert.strictEqual(formatEndpoint('vpn.example.com:443', 51820), 'vpn.example.com:443');
  assert.strictEqual(formatEndpoint('2001:db8::10', 51820), '[2001:db8::10]:51820');
  assert.strictEqual(formatEndpoint('[2001:db8::10]:443'), '[2001:db8::10]:443');
  assert.throws(() => formatEndpoint('vpn.example.com:99999', 51820), InvalidArgumentError);
  assert.throws(() => formatEndpoint('vpn.example.com'), InvalidArgumentError);
  assert.throws(() => formatEndpoint(':51820'), InvalidArgumentError);
});

test('Add peers', async t => {
  await t.test('allocates, stores and builds the client bundle', async () => {
    const { tmp, registry } = setup(serverConfigText());
    try {
      const { bundle, peer } = await registry.addPeer('phone', 'vpn.example.com');

      assert.deepStrictEqual(peer, {
        label: 'phone',
        publicKey: 'client-public-1',
        allowedIPs: [{ address: '10.50.0.2', prefix: 32, family: 'ipv4' }],
        extra: [],
      });
      assert.deepStrictEqual((await registry.store.load()).peers, [peer]);

      assert.strictEqual(renderClientConfig(bundle), `[Interface]
PrivateKey = client-private-1
Address = 10.50.0.2/24
DNS = 1.1.1.1, 8.8.8.8
MTU = 1420

[Peer]
PublicKey = ${SERVER_PUBLIC_KEY}
Endpoint = vpn.example.com:51820
AllowedIPs = 0.0.0.0/0
PersistentKeepalive = 25
`);
    } finally {
      tmp.cleanup();
    }
  });

  await t.test('freed addresses are reused', async () => {
    const { tmp, registry } = setup(serverConfigText());
    try {
      assert.strictEqual((await registry.addPeer('phone', 'vpn.example.com')).bundle.addresses[0].address, '10.50.0.2');
      assert.strictEqual((await registry.addPeer('laptop', 'vpn.example.com')).bundle.addresses[0].address, '10.50.0.3');
      await registry.removePeer('phone');
      assert.strictEqual((await registry.addPeer('tablet', 'vpn.example.com')).bundle.addresses[0].address, '10.50.0.2');

      const names = (await registry.listPeers()).map(p => `${p.label}=${p.ipv4}`);
      assert.deepStrictEqual(names, ['laptop=10.50.0.3', 'tablet=10.50.0.2']);
    } finally {
      tmp.cleanup();
    }
  });

  await t.test('dual stack', async () => {
    const { tmp, registry } = setup(serverConfigText({ addresses: '10.50.0.1/24, fd00:50::1/64' }));
    try {
      const { bundle, peer } = await registry.addPeer('phone', '2001:db8::10');
      assert.deepStrictEqual(peer.allowedIPs, [
        { address: '10.50.0.2', prefix: 32, family: 'ipv4' },
        { address: 'fd00:50::2', prefix: 128, family: 'ipv6' },
      ]);
      assert.deepStrictEqual(bundle.addresses, [
        { address: '10.50.0.2', prefix: 24, family: 'ipv4' },
        { address: 'fd00:50::2', prefix: 64, family: 'ipv6' },
      ]);
      assert.deepStrictEqual(bundle.allowedIPs, ['0.0.0.0/0', '::/0']);
      assert.deepStrictEqual(bundle.dns, ['1.1.1.1', '8.8.8.8', '2606:4700:4700::1111', '2001:4860:4860::8888']);
      assert.strictEqual(bundle.endpoint, '[2001:db8::10]:51820');
    } finally {
      tmp.cleanup();
    }
  });

  await t.test('preshared key and client overrides', async () => {
    const { tmp, registry } = setup(serverConfigText(), {
      client: { presharedKey: true, allowedIPs: ['10.50.0.0/24'], dns: [], keepalive: 0 },
    });
    try {
      const { bundle, peer } = await registry.addPeer('phone', 'vpn.example.com:443');
      assert.strictEqual(peer.presharedKey, 'client-psk-1');
      assert.strictEqual(bundle.presharedKey, 'client-psk-1');
      assert.deepStrictEqual(bundle.allowedIPs, ['10.50.0.0/24']);
      assert.strictEqual(renderClientConfig(bundle), `[Interface]
PrivateKey = client-private-1
Address = 10.50.0.2/24
MTU = 1420

[Peer]
PublicKey = ${SERVER_PUBLIC_KEY}
PresharedKey = client-psk-1
Endpoint = vpn.example.com:443
AllowedIPs = 10.50.0.0/24
`);
    } finally {
      tmp.cleanup();
    }
  });

  await t.test('rejects duplicate and invalid names without writing', async () => {
    const { tmp, registry } = setup(serverConfigText());
    try {
      await registry.addPeer('phone', 'vpn.example.com');
      const before = readFileSync(tmp.path, 'utf-8');

      await assert.rejects(registry.addPeer(' phone ', 'vpn.example.com'), PeerExistsError);
      await assert.rejects(registry.addPeer('   ', 'vpn.example.com'), InvalidArgumentError);
      await assert.rejects(registry.addPeer('bad\nname', 'vpn.example.com'), InvalidArgumentError);
      assert.strictEqual(readFileSync(tmp.path, 'utf-8'), before);
    } finally {
      tmp.cleanup();
    }
  });

  await t.test('a colliding public key is refused', async () => {
    const sameKeys: KeyGenerator = {
      generateKeyPair: () => ({ privateKey: 'client-private', publicKey: 'client-public' }),
      generatePresharedKey: () => 'client-psk',
    };
    const { tmp, registry } = setup(serverConfigText(), { keys: sameKeys });
    try {
      await registry.addPeer('phone', 'vpn.example.com');
      await assert.rejects(
        registry.addPeer('laptop', 'vpn.example.com'),
        (error: unknown) => error instanceof PeerExistsError && error.identifier === 'client-public'
      );
    } finally {
      tmp.cleanup();
    }
  });

  await t.test('full subnet leaves the file untouched', async () => {
    const peers: string[] = [];
    for (let host = 2; host <= 254; host++) {
      peers.push(`# peer-${host}`, '[Peer]', `PublicKey = client-public-${host}`, `AllowedIPs = 10.50.0.${host}/32`, '');
    }
    const text = serverConfigText() + '\n' + peers.join('\n');
    const { tmp, registry } = setup(text);
    try {
      await assert.rejects(
        registry.addPeer('one-too-many', 'vpn.example.com'),
        (error: unknown) => error instanceof NoCapacityError && error.subnet === '10.50.0.0/24'
      );
      assert.strictEqual(readFileSync(tmp.path, 'utf-8'), text);
      assert.deepStrictEqual(registry.store.listBackups(), []);
    } finally {
      tmp.cleanup();
    }
  });

  await t.test('every address of a /24 is handed out once', async () => {
    const { tmp, registry } = setup(serverConfigText());
    try {
      const addresses: string[] = [];
      for (let i = 1; i <= 253; i++) {
        addresses.push((await registry.addPeer(`peer-${i}`, 'vpn.example.com')).bundle.addresses[0].address);
      }

      assert.strictEqual(new Set(addresses).size, 253);
      for (const forbidden of ['10.50.0.0', '10.50.0.1', '10.50.0.255']) {
        assert.ok(!addresses.includes(forbidden), forbidden);
      }
      assert.strictEqual(addresses[0], '10.50.0.2');
      assert.strictEqual(addresses[252], '10.50.0.254');
      await assert.rejects(registry.addPeer('peer-254', 'vpn.example.com'), NoCapacityError);
    } finally {
      tmp.cleanup();
    }
  });

  await t.test('the key of a removed peer can be given to a new one', async () => {
    const pairs = [
      { privateKey: 'alice-private', publicKey: 'alice-public' },
      { privateKey: 'bob-private', publicKey: 'alice-public' },
    ];
    const scripted: KeyGenerator = {
      generateKeyPair: () => {
        const pair = pairs.shift();
        if (!pair) throw new Error('no more key pairs');
        return pair;
      },
      generatePresharedKey: () => 'client-psk',
    };
    const { tmp, registry } = setup(serverConfigText(), { keys: scripted });
    try {
      await registry.addPeer('alice', 'vpn.example.com');
      await registry.removePeer('alice');
      const { peer } = await registry.addPeer('bob', 'vpn.example.com');

      assert.strictEqual(peer.publicKey, 'alice-public');
      assert.deepStrictEqual((await registry.listPeers()).map(p => p.label), ['bob']);
    } finally {
      tmp.cleanup();
    }
  });
});

test('Remove and inspect peers', async t => {
  await t.test('by label, then by public key', async () => {
    const { tmp, registry } = setup(serverConfigText());
    try {
      await registry.addPeer('phone', 'vpn.example.com');
      await registry.addPeer('laptop', 'vpn.example.com');

      assert.strictEqual((await registry.removePeer('phone')).peer.publicKey, 'client-public-1');
      assert.strictEqual((await registry.removePeer('client-public-2')).peer.label, 'laptop');
      assert.deepStrictEqual(await registry.listPeers(), []);
    } finally {
      tmp.cleanup();
    }
  });

  await t.test('unknown peer lists the available ones', async () => {
    const { tmp, registry } = setup(serverConfigText());
    try {
      await registry.addPeer('laptop', 'vpn.example.com');
      await assert.rejects(
        registry.removePeer('phone'),
        (error: unknown) => error instanceof PeerNotFoundError &&
          error.message === 'peer "phone" introuvable (peers connus: laptop)'
      );
    } finally {
      tmp.cleanup();
    }
  });

  await t.test('summaries and lookup', async () => {
    const { tmp, registry } = setup(serverConfigText({ addresses: '10.50.0.1/24, fd00:50::1/64' }));
    try {
      await registry.addPeer('phone', 'vpn.example.com');
      assert.deepStrictEqual(await registry.listPeers(), [{
        label: 'phone',
        publicKey: 'client-public-1',
        ipv4: '10.50.0.2',
        ipv6: 'fd00:50::2',
        allowedIPs: ['10.50.0.2/32', 'fd00:50::2/128'],
      }]);
      assert.strictEqual((await registry.findPeer('phone'))?.publicKey, 'client-public-1');
      assert.strictEqual(await registry.findPeer('tablet'), undefined);
    } finally {
      tmp.cleanup();
    }
  });

  await t.test('listen port', async () => {
    const { tmp, registry } = setup(serverConfigText());
    try {
      const same = await registry.setListenPort(51820);
      assert.strictEqual(same.changed, false);
      assert.deepStrictEqual(registry.store.listBackups(), []);

      const changed = await registry.setListenPort(51821);
      assert.strictEqual(changed.changed, true);
      assert.strictEqual(changed.previous, 51820);
      assert.strictEqual((await registry.store.load()).listenPort, 51821);

      await assert.rejects(registry.setListenPort(0), InvalidArgumentError);
      await assert.rejects(registry.setListenPort(65536), InvalidArgumentError);
    } finally {
      tmp.cleanup();
    }
  });
});
