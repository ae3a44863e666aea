/**
 * @file wg/types.ts
 * @description Modèle de la configuration serveur WireGuard et des vues dérivées
 */

import { PeerFailure } from './errors.js';

export type AddressFamily = 'ipv4' | 'ipv6';

/**
 * Adresse avec longueur de préfixe, telle qu'écrite dans la configuration
 * (ex: "10.50.0.1/24")
 */
export interface IpPrefix {
  address: string;
  prefix: number;
  family: AddressFamily;
}

/**
 * Subnet normalisé, bornes numériques incluses
 */
export interface Subnet {
  family: AddressFamily;
  prefix: number;
  network: bigint;
  last: bigint;
}

/**
 * Clé inconnue conservée telle quelle (SaveConfig, FwMark, Table...)
 */
export type ExtraField = [key: string, value: string];

export interface InterfaceHooks {
  preUp: string[];
  postUp: string[];
  preDown: string[];
  postDown: string[];
}

/**
 * Section [Interface] et peers ordonnés
 */
export interface InterfaceConfig {
  privateKey: string;
  addresses: IpPrefix[];
  listenPort?: number;
  mtu?: number;
  dns: string[];
  hooks: InterfaceHooks;
  extra: ExtraField[];
  peers: PeerConfig[];
}

/**
 * Section [Peer]
 */
export interface PeerConfig {
  /** Nom lisible, stocké en commentaire au-dessus du bloc */
  label?: string;
  publicKey: string;
  presharedKey?: string;
  allowedIPs: IpPrefix[];
  endpoint?: string;
  persistentKeepalive?: number;
  extra: ExtraField[];
}

/**
 * Adresses attribuées à un peer, une au plus par famille
 */
export interface PeerAddresses {
  ipv4?: IpPrefix;
  ipv6?: IpPrefix;
}

export interface PeerSummary {
  label?: string;
  publicKey: string;
  ipv4?: string;
  ipv6?: string;
  allowedIPs: string[];
}

/**
 * Configuration client remise à l'utilisateur final, jamais stockée côté serveur
 */
export interface ClientBundle {
  name: string;
  privateKey: string;
  publicKey: string;
  addresses: IpPrefix[];
  dns: string[];
  mtu?: number;
  serverPublicKey: string;
  presharedKey?: string;
  endpoint: string;
  allowedIPs: string[];
  persistentKeepalive?: number;
}

/**
 * État d'un peer lu sur l'interface active
 */
export interface LivePeerStatus {
  publicKey: string;
  endpoint?: string;
  allowedIPs: string[];
  /** Dernier handshake, absent si jamais */
  latestHandshake?: Date;
  transferRx: number;
  transferTx: number;
  persistentKeepalive?: number;
}

export interface AppliedDiff {
  added: string[];
  removed: string[];
  unchanged: string[];
  failures: PeerFailure[];
}
