/**
 * @file wg/registry.ts
 * @description Ajout, retrait et inventaire des peers de la configuration serveur
 *
 * Chaque opération est une transaction du ConfigStore : l'allocation se fait
 * sur la configuration relue sous verrou, jamais sur une copie en cache.
 */

import { isIP } from 'net';
import {
  AllocateOptions,
  allocatePeerAddresses,
  formatPrefix,
  peerAddresses,
} from './address.js';
import { InvalidArgumentError, PeerExistsError, PeerNotFoundError } from './errors.js';
import { KeyGenerator, naclKeyGenerator, publicKeyFromPrivate } from './keys.js';
import { ConfigStore } from './store.js';
import { ClientBundle, InterfaceConfig, IpPrefix, PeerConfig, PeerSummary } from './types.js';

/**
 * Paramètres de la configuration client générée
 */
export interface ClientDefaults {
  dns: string[];
  /** Ajoutés à `dns` quand le client reçoit une adresse IPv6 */
  dns6: string[];
  mtu?: number;
  keepalive: number;
  /** Remplace 0.0.0.0/0 (et ::/0) */
  allowedIPs?: string[];
  presharedKey: boolean;
}

export const DEFAULT_CLIENT: ClientDefaults = {
  dns: ['1.1.1.1', '8.8.8.8'],
  dns6: ['2606:4700:4700::1111', '2001:4860:4860::8888'],
  mtu: 1420,
  keepalive: 25,
  presharedKey: false,
};

export interface PeerRegistryOptions {
  keys?: KeyGenerator;
  client?: Partial<ClientDefaults>;
  allocation?: AllocateOptions;
  log?: (msg: string) => void;
}

export interface AddPeerResult {
  bundle: ClientBundle;
  peer: PeerConfig;
  config: InterfaceConfig;
}

export interface RemovePeerResult {
  peer: PeerConfig;
  config: InterfaceConfig;
}

export interface SetListenPortResult {
  previous?: number;
  changed: boolean;
  config: InterfaceConfig;
}

// ============================================
// Helpers
// ============================================

/**
 * Nom lisible : non vide, sans caractère de contrôle (il finit en commentaire)
 */
export function normalizePeerName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new InvalidArgumentError('le nom du peer est vide');
  }
  if (/[\u0000-\u001f\u007f]/.test(trimmed)) {
    throw new InvalidArgumentError(`le nom du peer contient des caractères de contrôle: ${JSON.stringify(trimmed)}`);
  }
  return trimmed;
}

/**
 * "hôte", "hôte:port", "[ipv6]:port" ou IPv6 nue -> "hôte:port"
 */
export function formatEndpoint(endpoint: string, defaultPort?: number): string {
  const value = endpoint.trim();
  let host: string;
  let port: string | undefined;

  const bracketed = value.match(/^\[([^\]]+)\](?::(\d+))?$/);
  if (bracketed) {
    [, host, port] = bracketed;
  } else if (isIP(value) === 6) {
    host = value;
  } else {
    const parts = value.split(':');
    if (parts.length > 2) {
      throw new InvalidArgumentError(`endpoint invalide "${endpoint}"`);
    }
    [host, port] = parts;
  }

  if (!host) {
    throw new InvalidArgumentError(`endpoint invalide "${endpoint}"`);
  }
  if (port !== undefined && (!/^\d+$/.test(port) || Number(port) < 1 || Number(port) > 65535)) {
    throw new InvalidArgumentError(`port invalide dans l'endpoint "${endpoint}"`);
  }

  const finalPort = port ?? (defaultPort !== undefined ? String(defaultPort) : undefined);
  if (finalPort === undefined) {
    throw new InvalidArgumentError(`endpoint "${endpoint}" sans port et ListenPort absent`);
  }

  return isIP(host) === 6 ? `[${host}]:${finalPort}` : `${host}:${finalPort}`;
}

function findIndex(config: InterfaceConfig, identifier: string): number {
  const byLabel = config.peers.findIndex(p => p.label === identifier);
  return byLabel !== -1 ? byLabel : config.peers.findIndex(p => p.publicKey === identifier);
}

function knownNames(config: InterfaceConfig): string[] {
  return config.peers.map(p => p.label ?? p.publicKey);
}

// ============================================
// Registry
// ============================================

export class PeerRegistry {
  readonly store: ConfigStore;
  private readonly keys: KeyGenerator;
  private readonly client: ClientDefaults;
  private readonly allocation: AllocateOptions;
  private readonly log: (msg: string) => void;

  constructor(store: ConfigStore, options: PeerRegistryOptions = {}) {
    this.store = store;
    this.keys = options.keys ?? naclKeyGenerator;
    this.client = { ...DEFAULT_CLIENT, ...options.client };
    this.allocation = options.allocation ?? {};
    this.log = options.log ?? (() => {});
  }

  /**
   * Crée un peer et retourne la configuration client associée
   */
  async addPeer(name: string, serverEndpoint: string): Promise<AddPeerResult> {
    const label = normalizePeerName(name);

    return this.store.withTransaction(config => {
      if (config.peers.some(p => p.label === label)) {
        throw new PeerExistsError(label);
      }

      const endpoint = formatEndpoint(serverEndpoint, config.listenPort);
      const serverPublicKey = publicKeyFromPrivate(config.privateKey);
      const allocated = allocatePeerAddresses(config, this.allocation);
      const pair = this.keys.generateKeyPair();
      if (config.peers.some(p => p.publicKey === pair.publicKey)) {
        throw new PeerExistsError(pair.publicKey);
      }

      const hosts = [allocated.ipv4, allocated.ipv6].filter((p): p is IpPrefix => p !== undefined);
      const peer: PeerConfig = {
        label,
        publicKey: pair.publicKey,
        allowedIPs: hosts,
        extra: [],
      };
      const presharedKey = this.client.presharedKey ? this.keys.generatePresharedKey() : undefined;
      if (presharedKey) peer.presharedKey = presharedKey;

      // Côté client : l'adresse garde la longueur de préfixe du subnet
      const addresses = hosts.map(host => {
        const own = config.addresses.find(a => a.family === host.family);
        return { ...host, prefix: own ? own.prefix : host.prefix };
      });

      const bundle: ClientBundle = {
        name: label,
        privateKey: pair.privateKey,
        publicKey: pair.publicKey,
        addresses,
        dns: allocated.ipv6 ? [...this.client.dns, ...this.client.dns6] : this.client.dns,
        serverPublicKey,
        endpoint,
        allowedIPs: this.client.allowedIPs ?? [
          ...(allocated.ipv4 ? ['0.0.0.0/0'] : []),
          ...(allocated.ipv6 ? ['::/0'] : []),
        ],
        persistentKeepalive: this.client.keepalive,
      };
      if (this.client.mtu !== undefined) bundle.mtu = this.client.mtu;
      if (presharedKey) bundle.presharedKey = presharedKey;

      config.peers.push(peer);
      this.log(`Peer "${label}" ajouté (${hosts.map(formatPrefix).join(', ')})`);

      return { config, result: { bundle, peer, config } };
    });
  }

  /**
   * Retire un peer, désigné par son nom puis par sa clé publique
   */
  async removePeer(identifier: string): Promise<RemovePeerResult> {
    const wanted = identifier.trim();

    return this.store.withTransaction(config => {
      const index = findIndex(config, wanted);
      if (index === -1) {
        throw new PeerNotFoundError(wanted, knownNames(config));
      }

      const [peer] = config.peers.splice(index, 1);
      this.log(`Peer "${peer.label ?? peer.publicKey}" retiré`);

      return { config, result: { peer, config } };
    });
  }

  async listPeers(): Promise<PeerSummary[]> {
    return this.store.withTransaction(config => ({
      result: config.peers.map(peer => {
        const addresses = peerAddresses(peer, config);
        const summary: PeerSummary = {
          publicKey: peer.publicKey,
          allowedIPs: peer.allowedIPs.map(formatPrefix),
        };
        if (peer.label) summary.label = peer.label;
        if (addresses.ipv4) summary.ipv4 = addresses.ipv4.address;
        if (addresses.ipv6) summary.ipv6 = addresses.ipv6.address;
        return summary;
      }),
    }));
  }

  async findPeer(identifier: string): Promise<PeerConfig | undefined> {
    const wanted = identifier.trim();
    return this.store.withTransaction(config => {
      const index = findIndex(config, wanted);
      return { result: index === -1 ? undefined : config.peers[index] };
    });
  }

  /**
   * Change le ListenPort ; aucune écriture si la valeur est identique
   */
  async setListenPort(port: number): Promise<SetListenPortResult> {
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new InvalidArgumentError(`port invalide "${port}" (attendu 1-65535)`);
    }

    return this.store.withTransaction<SetListenPortResult>(config => {
      const previous = config.listenPort;
      if (previous === port) {
        return { result: { previous, changed: false, config } };
      }

      config.listenPort = port;
      this.log(`ListenPort: ${previous ?? '(aucun)'} -> ${port}`);
      return { config, result: { previous, changed: true, config } };
    });
  }
}
