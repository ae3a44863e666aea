/**
 * @file wg/testing.ts
 * @description Doublures partagées par les tests (moteur en mémoire, clés déterministes)
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { formatPrefix } from './address.js';
import { TunnelEngine } from './engine.js';
import { KeyGenerator } from './keys.js';
import { LivePeerStatus, PeerConfig } from './types.js';

/** Clé privée serveur de test (octets 1..32) et sa clé publique */
export const SERVER_PRIVATE_KEY = 'AQIDBAUGBwgJCgsMDQ4PEBESExQVFhcYGRobHB0eHyA=';
export const SERVER_PUBLIC_KEY = 'B6N8vBQgk8i3VdwbEOhstCY3StFqqFPtC9/AsrhtHHw=';

/**
 * Clés client-private-N / client-public-N / client-psk-N
 */
export function fakeKeys(): KeyGenerator {
  let pairs = 0;
  let psks = 0;
  return {
    generateKeyPair() {
      pairs++;
      return { privateKey: `client-private-${pairs}`, publicKey: `client-public-${pairs}` };
    },
    generatePresharedKey() {
      psks++;
      return `client-psk-${psks}`;
    },
  };
}

/**
 * Interface WireGuard simulée
 */
export class FakeEngine implements TunnelEngine {
  readonly interfaceName = 'wg0';
  up = true;
  peers = new Map<string, LivePeerStatus>();
  /** Clés dont l'ajout ou le retrait échoue */
  failing = new Set<string>();
  failListing = false;
  calls: string[] = [];

  isUp(): boolean {
    return this.up;
  }

  listPeers(): LivePeerStatus[] {
    if (this.failListing) throw new Error('wg show: permission denied');
    return [...this.peers.values()];
  }

  addPeer(peer: PeerConfig): void {
    this.calls.push(`add ${peer.publicKey}`);
    if (this.failing.has(peer.publicKey)) throw new Error('wg set: invalid peer');
    this.peers.set(peer.publicKey, {
      publicKey: peer.publicKey,
      allowedIPs: peer.allowedIPs.map(formatPrefix),
      transferRx: 0,
      transferTx: 0,
    });
  }

  removePeer(publicKey: string): void {
    this.calls.push(`remove ${publicKey}`);
    if (this.failing.has(publicKey)) throw new Error('wg set: invalid peer');
    this.peers.delete(publicKey);
  }
}

export interface TempConfig {
  dir: string;
  path: string;
  cleanup(): void;
}

/**
 * Répertoire temporaire contenant wg0.conf
 */
export function tempConfig(text?: string): TempConfig {
  const dir = mkdtempSync(join(tmpdir(), 'wgkeep-test-'));
  const path = join(dir, 'wg0.conf');
  if (text !== undefined) {
    writeFileSync(path, text, { mode: 0o600 });
  }
  return {
    dir,
    path,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

/**
 * Configuration serveur minimale
 */
export function serverConfigText(options: { addresses?: string; listenPort?: number } = {}): string {
  return [
    '[Interface]',
    `PrivateKey = ${SERVER_PRIVATE_KEY}`,
    `Address = ${options.addresses ?? '10.50.0.1/24'}`,
    `ListenPort = ${options.listenPort ?? 51820}`,
    '',
  ].join('\n');
}
