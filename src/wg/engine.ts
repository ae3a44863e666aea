/**
 * @file wg/engine.ts
 * @description Accès à l'interface WireGuard active
 */

import { execFileSync } from 'child_process';
import { unlinkSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { errnoCode, errorMessage } from './errors.js';
import { formatPrefix } from './address.js';
import { LivePeerStatus, PeerConfig } from './types.js';

/**
 * Opérations sur une interface, liée à un nom (wg0...)
 */
export interface TunnelEngine {
  readonly interfaceName: string;
  isUp(): boolean;
  listPeers(): LivePeerStatus[];
  addPeer(peer: PeerConfig): void;
  removePeer(publicKey: string): void;
}

export interface WgCliEngineOptions {
  /** Timeout par commande (défaut: 5000 ms) */
  timeoutMs?: number;
  wgBinary?: string;
  ipBinary?: string;
  log?: (msg: string) => void;
}

const DEFAULT_TIMEOUT_MS = 5000;

/**
 * Parse la sortie de `wg show <if> dump`.
 * Première ligne : l'interface ; suivantes : un peer par ligne, champs
 * séparés par des tabulations.
 */
export function parseWgDump(output: string): LivePeerStatus[] {
  const lines = output.trim().split('\n').filter(Boolean);
  const peers: LivePeerStatus[] = [];

  for (const line of lines.slice(1)) {
    const parts = line.split('\t');
    if (parts.length < 8) continue;

    const [publicKey, , endpoint, allowedIps, latestHandshake, rxBytes, txBytes, keepalive] = parts;
    const handshake = parseInt(latestHandshake, 10);

    const peer: LivePeerStatus = {
      publicKey,
      allowedIPs: allowedIps === '(none)' ? [] : allowedIps.split(','),
      transferRx: parseInt(rxBytes, 10) || 0,
      transferTx: parseInt(txBytes, 10) || 0,
    };
    if (endpoint !== '(none)') peer.endpoint = endpoint;
    if (handshake > 0) peer.latestHandshake = new Date(handshake * 1000);
    if (keepalive !== 'off' && parseInt(keepalive, 10) > 0) peer.persistentKeepalive = parseInt(keepalive, 10);

    peers.push(peer);
  }

  return peers;
}

/**
 * Implémentation par les outils `ip` et `wg`
 */
export class WgCliEngine implements TunnelEngine {
  readonly interfaceName: string;
  private readonly timeoutMs: number;
  private readonly wg: string;
  private readonly ip: string;
  private readonly log: (msg: string) => void;

  constructor(interfaceName: string, options: WgCliEngineOptions = {}) {
    this.interfaceName = interfaceName;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.wg = options.wgBinary ?? 'wg';
    this.ip = options.ipBinary ?? 'ip';
    this.log = options.log ?? (() => {});
  }

  private run(command: string, args: string[]): string {
    this.log(`$ ${command} ${args.join(' ')}`);
    try {
      return execFileSync(command, args, {
        encoding: 'utf-8',
        timeout: this.timeoutMs,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (error) {
      const stderr = error instanceof Error && 'stderr' in error ? String(error.stderr).trim() : '';
      throw new Error(`${command} ${args[0]}: ${stderr || errorMessage(error)}`, { cause: error });
    }
  }

  isUp(): boolean {
    try {
      const output = this.run(this.ip, ['link', 'show', this.interfaceName]);
      return output.includes('state UP') || output.includes(',UP');
    } catch (error) {
      this.log(`Interface ${this.interfaceName} absente: ${errorMessage(error)}`);
      return false;
    }
  }

  listPeers(): LivePeerStatus[] {
    return parseWgDump(this.run(this.wg, ['show', this.interfaceName, 'dump']));
  }

  addPeer(peer: PeerConfig): void {
    const args = ['set', this.interfaceName, 'peer', peer.publicKey];
    let pskFile: string | undefined;

    try {
      // La clé partagée passe par un fichier temporaire, jamais en argument
      if (peer.presharedKey) {
        pskFile = join(tmpdir(), `wgkeep-${process.pid}-${Date.now()}.psk`);
        writeFileSync(pskFile, `${peer.presharedKey}\n`, { mode: 0o600, flag: 'wx' });
        args.push('preshared-key', pskFile);
      }
      if (peer.endpoint) {
        args.push('endpoint', peer.endpoint);
      }
      args.push('allowed-ips', peer.allowedIPs.map(formatPrefix).join(','));
      if (peer.persistentKeepalive) {
        args.push('persistent-keepalive', String(peer.persistentKeepalive));
      }

      this.run(this.wg, args);
    } finally {
      if (pskFile) this.removeFile(pskFile);
    }
  }

  removePeer(publicKey: string): void {
    this.run(this.wg, ['set', this.interfaceName, 'peer', publicKey, 'remove']);
  }

  private removeFile(path: string): void {
    try {
      unlinkSync(path);
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        this.log(`Impossible de supprimer ${path}: ${errorMessage(error)}`);
      }
    }
  }
}
