/**
 * @file wg/address.ts
 * @description Calcul d'adresses IPv4/IPv6 et allocation de la prochaine adresse libre
 */

import { isIP } from 'net';
import { AddressFamily, InterfaceConfig, IpPrefix, PeerAddresses, PeerConfig, Subnet } from './types.js';
import { InvalidArgumentError, NoCapacityError } from './errors.js';

const FAMILY_BITS: Record<AddressFamily, number> = {
  ipv4: 32,
  ipv6: 128,
};

// ============================================
// Conversions
// ============================================

function ipv4ToBigInt(address: string): bigint {
  return address
    .split('.')
    .reduce((acc, octet) => (acc << 8n) | BigInt(parseInt(octet, 10)), 0n);
}

function ipv6ToBigInt(address: string): bigint {
  let text = address;

  // IPv4 embarquée en fin d'adresse (ex: ::ffff:192.0.2.1)
  const lastColon = text.lastIndexOf(':');
  const tail = text.slice(lastColon + 1);
  if (tail.includes('.')) {
    const v4 = ipv4ToBigInt(tail);
    text = `${text.slice(0, lastColon + 1)}${(v4 >> 16n).toString(16)}:${(v4 & 0xffffn).toString(16)}`;
  }

  const halves = text.split('::');
  const head = halves[0] ? halves[0].split(':') : [];
  const rest = halves.length > 1 && halves[1] ? halves[1].split(':') : [];
  const groups = halves.length > 1
    ? [...head, ...new Array<string>(8 - head.length - rest.length).fill('0'), ...rest]
    : head;

  return groups.reduce((acc, group) => (acc << 16n) | BigInt(parseInt(group, 16)), 0n);
}

/**
 * Parse une IP (sans préfixe) en nombre
 */
export function parseIp(address: string): { family: AddressFamily; value: bigint } {
  const version = isIP(address);
  if (version === 4) return { family: 'ipv4', value: ipv4ToBigInt(address) };
  if (version === 6) return { family: 'ipv6', value: ipv6ToBigInt(address) };
  throw new InvalidArgumentError(`adresse IP invalide "${address}"`);
}

/**
 * Convertit un nombre en IP, forme compressée RFC 5952 pour l'IPv6
 */
export function formatIp(value: bigint, family: AddressFamily): string {
  if (family === 'ipv4') {
    return [24n, 16n, 8n, 0n].map(shift => Number((value >> shift) & 255n)).join('.');
  }

  const groups: number[] = [];
  for (let i = 0; i < 8; i++) {
    groups.push(Number((value >> BigInt((7 - i) * 16)) & 0xffffn));
  }

  // Plus longue suite de groupes nuls (la première en cas d'égalité)
  let bestStart = -1;
  let bestLength = 0;
  for (let i = 0; i < 8; i++) {
    if (groups[i] !== 0) continue;
    let j = i;
    while (j < 8 && groups[j] === 0) j++;
    if (j - i > bestLength) {
      bestStart = i;
      bestLength = j - i;
    }
    i = j;
  }

  const hex = (list: number[]) => list.map(g => g.toString(16)).join(':');
  if (bestLength < 2) return hex(groups);
  return `${hex(groups.slice(0, bestStart))}::${hex(groups.slice(bestStart + bestLength))}`;
}

/**
 * Parse un jeton "adresse[/préfixe]" ; sans préfixe, l'adresse est un hôte (/32, /128)
 */
export function parsePrefix(token: string): IpPrefix {
  const trimmed = token.trim();
  const slash = trimmed.indexOf('/');
  const address = slash === -1 ? trimmed : trimmed.slice(0, slash);

  const version = isIP(address);
  if (version === 0) {
    throw new InvalidArgumentError(`adresse invalide "${trimmed}"`);
  }
  const family: AddressFamily = version === 4 ? 'ipv4' : 'ipv6';
  const bits = FAMILY_BITS[family];

  let prefix = bits;
  if (slash !== -1) {
    const raw = trimmed.slice(slash + 1);
    if (!/^\d{1,3}$/.test(raw) || Number(raw) > bits) {
      throw new InvalidArgumentError(`préfixe invalide "${trimmed}"`);
    }
    prefix = Number(raw);
  }

  return { address, prefix, family };
}

export function formatPrefix(prefix: IpPrefix): string {
  return `${prefix.address}/${prefix.prefix}`;
}

// ============================================
// Subnets
// ============================================

/**
 * Réseau contenant une adresse (ex: 10.50.0.1/24 -> 10.50.0.0 .. 10.50.0.255)
 */
export function toSubnet(prefix: IpPrefix): Subnet {
  const { value } = parseIp(prefix.address);
  const hostBits = BigInt(FAMILY_BITS[prefix.family] - prefix.prefix);
  const size = 1n << hostBits;
  const network = value & ~(size - 1n);

  return {
    family: prefix.family,
    prefix: prefix.prefix,
    network,
    last: network + size - 1n,
  };
}

export function formatSubnet(subnet: Subnet): string {
  return `${formatIp(subnet.network, subnet.family)}/${subnet.prefix}`;
}

export function subnetContains(subnet: Subnet, value: bigint): boolean {
  return value >= subnet.network && value <= subnet.last;
}

/**
 * Vérifie si deux subnets se chevauchent
 */
export function subnetsOverlap(a: Subnet, b: Subnet): boolean {
  return a.family === b.family && a.network <= b.last && b.network <= a.last;
}

/**
 * Un préfixe hôte (/32 ou /128) désigne une seule adresse
 */
export function isSingleton(prefix: IpPrefix): boolean {
  return prefix.prefix === FAMILY_BITS[prefix.family];
}

/**
 * Plage d'hôtes utilisables : réseau exclu, broadcast IPv4 exclu.
 * Les liens point à point (/31, /32, /127, /128) utilisent toute la plage.
 */
export function hostRange(subnet: Subnet, excludeNetworkAddress = true): [first: bigint, last: bigint] {
  const bits = FAMILY_BITS[subnet.family];
  if (subnet.prefix >= bits - 1) {
    return [subnet.network, subnet.last];
  }

  const first = excludeNetworkAddress ? subnet.network + 1n : subnet.network;
  const last = subnet.family === 'ipv4' ? subnet.last - 1n : subnet.last;
  return [first, last];
}

// ============================================
// Allocation
// ============================================

/**
 * Adresses d'une famille déjà prises, recalculées à chaque demande
 */
export interface AddressPool {
  subnet: Subnet;
  /** Interface + singletons des peers */
  claimed: Set<bigint>;
  /** AllowedIPs plus larges qu'un hôte mais contenus dans le subnet */
  claimedRanges: Array<[start: bigint, end: bigint]>;
}

export interface AllocateOptions {
  /** Ne jamais attribuer l'adresse réseau (défaut: true) */
  excludeNetworkAddress?: boolean;
}

/**
 * Construit le pool d'une famille à partir de la configuration courante.
 * Retourne undefined si l'interface n'a pas d'adresse dans cette famille.
 */
export function buildPool(config: InterfaceConfig, family: AddressFamily): AddressPool | undefined {
  const own = config.addresses.filter(a => a.family === family);
  if (own.length === 0) return undefined;

  const subnet = toSubnet(own[0]);
  const claimed = new Set<bigint>(own.map(a => parseIp(a.address).value));
  const claimedRanges: Array<[bigint, bigint]> = [];

  for (const peer of config.peers) {
    for (const allowed of peer.allowedIPs) {
      if (allowed.family !== family) continue;

      if (isSingleton(allowed)) {
        claimed.add(parseIp(allowed.address).value);
        continue;
      }

      // Route vers un réseau derrière le peer : réserve la plage si elle est
      // strictement incluse dans notre subnet
      const routed = toSubnet(allowed);
      if (routed.prefix > subnet.prefix && subnetsOverlap(subnet, routed)) {
        claimedRanges.push([routed.network, routed.last]);
      }
    }
  }

  return { subnet, claimed, claimedRanges };
}

/**
 * Trouve la première adresse libre, par ordre croissant.
 * Pure : n'effectue aucune réservation.
 */
export function allocate(pool: AddressPool, options: AllocateOptions = {}): string {
  const [first, last] = hostRange(pool.subnet, options.excludeNetworkAddress ?? true);

  let candidate = first;
  while (candidate <= last) {
    const range = pool.claimedRanges.find(([start, end]) => candidate >= start && candidate <= end);
    if (range) {
      candidate = range[1] + 1n;
      continue;
    }
    if (!pool.claimed.has(candidate)) {
      return formatIp(candidate, pool.subnet.family);
    }
    candidate++;
  }

  throw new NoCapacityError(formatSubnet(pool.subnet));
}

/**
 * Alloue une adresse hôte par famille configurée sur l'interface
 */
export function allocatePeerAddresses(config: InterfaceConfig, options: AllocateOptions = {}): PeerAddresses {
  const result: PeerAddresses = {};

  for (const family of ['ipv4', 'ipv6'] as const) {
    const pool = buildPool(config, family);
    if (!pool) continue;
    result[family] = {
      address: allocate(pool, options),
      prefix: FAMILY_BITS[family],
      family,
    };
  }

  if (!result.ipv4 && !result.ipv6) {
    throw new InvalidArgumentError("l'interface n'a aucune adresse (clé Address)");
  }

  return result;
}

/**
 * Retrouve les adresses attribuées à un peer : premier singleton de chaque
 * famille, de préférence dans le subnet de l'interface
 */
export function peerAddresses(peer: PeerConfig, config: InterfaceConfig): PeerAddresses {
  const result: PeerAddresses = {};

  for (const family of ['ipv4', 'ipv6'] as const) {
    const singletons = peer.allowedIPs.filter(a => a.family === family && isSingleton(a));
    const own = config.addresses.find(a => a.family === family);
    const subnet = own ? toSubnet(own) : undefined;
    const inSubnet = subnet
      ? singletons.find(a => subnetContains(subnet, parseIp(a.address).value))
      : undefined;
    const chosen = inSubnet ?? singletons[0];
    if (chosen) result[family] = chosen;
  }

  return result;
}
