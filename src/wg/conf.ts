/**
 * @file wg/conf.ts
 * @description Parsing et génération du format wg-quick ([Interface] + [Peer])
 *
 * Le parseur produit un modèle typé ; la génération est déterministe
 * (ordre des champs fixe, peers dans l'ordre d'insertion) de sorte que
 * parseConfig(stringifyConfig(c)) redonne c.
 */

import { formatPrefix, parsePrefix } from './address.js';
import { ParseError, errorMessage } from './errors.js';
import { ClientBundle, ExtraField, InterfaceConfig, IpPrefix, PeerConfig } from './types.js';

interface RawField {
  key: string;
  value: string;
  line: number;
}

interface RawSection {
  kind: 'interface' | 'peer';
  line: number;
  label?: string;
  /** Commentaire en première ligne du bloc (format des anciens scripts) */
  innerComment?: string;
  fields: RawField[];
}

const SECTION_RE = /^\[([^\]]+)\]$/;
const LEGACY_LABEL_SUFFIX_RE = /\s*\((?:IPv4|IPv6):[^)]*\)\s*$/;

const HOOK_KEYS = {
  preup: 'preUp',
  postup: 'postUp',
  predown: 'preDown',
  postdown: 'postDown',
} as const;

// ============================================
// Tokenisation
// ============================================

function splitSections(text: string): RawSection[] {
  const sections: RawSection[] = [];
  let current: RawSection | undefined;
  let pendingComment: string | undefined;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const line = lines[i].trim();

    if (line === '') {
      pendingComment = undefined;
      continue;
    }

    if (line.startsWith('#')) {
      const comment = line.replace(/^#+/, '').trim();
      if (current?.kind === 'peer' && current.fields.length === 0 && !current.label && current.innerComment === undefined) {
        current.innerComment = comment;
      }
      pendingComment = comment;
      continue;
    }

    const section = line.match(SECTION_RE);
    if (section) {
      const name = section[1].trim().toLowerCase();
      if (name === 'interface') {
        if (sections.some(s => s.kind === 'interface')) {
          throw new ParseError(lineNo, 'section [Interface] en double');
        }
        current = { kind: 'interface', line: lineNo, fields: [] };
      } else if (name === 'peer') {
        current = { kind: 'peer', line: lineNo, label: pendingComment || undefined, fields: [] };
      } else {
        throw new ParseError(lineNo, `section inconnue [${section[1]}]`);
      }
      sections.push(current);
      pendingComment = undefined;
      continue;
    }

    const eq = line.indexOf('=');
    if (eq <= 0) {
      throw new ParseError(lineNo, `ligne illisible "${line}"`);
    }
    if (!current) {
      throw new ParseError(lineNo, 'clé en dehors de toute section');
    }

    current.fields.push({
      key: line.slice(0, eq).trim(),
      value: line.slice(eq + 1).trim(),
      line: lineNo,
    });
    pendingComment = undefined;
  }

  return sections;
}

function splitList(value: string): string[] {
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

function parsePrefixList(field: RawField): IpPrefix[] {
  return splitList(field.value).map(token => {
    try {
      return parsePrefix(token);
    } catch (error) {
      throw new ParseError(field.line, `${field.key}: ${errorMessage(error)}`);
    }
  });
}

function parseInteger(field: RawField, min: number, max: number): number {
  if (!/^\d+$/.test(field.value) || Number(field.value) < min || Number(field.value) > max) {
    throw new ParseError(field.line, `${field.key} invalide "${field.value}" (attendu ${min}-${max})`);
  }
  return Number(field.value);
}

/**
 * Refuse une clé scalaire répétée dans une même section
 */
function once(seen: Set<string>, field: RawField): void {
  const key = field.key.toLowerCase();
  if (seen.has(key)) {
    throw new ParseError(field.line, `${field.key} en double dans la section`);
  }
  seen.add(key);
}

// ============================================
// Sections
// ============================================

function buildInterface(section: RawSection): Omit<InterfaceConfig, 'peers'> {
  const result: Omit<InterfaceConfig, 'peers'> = {
    privateKey: '',
    addresses: [],
    dns: [],
    hooks: { preUp: [], postUp: [], preDown: [], postDown: [] },
    extra: [],
  };
  const seen = new Set<string>();

  for (const field of section.fields) {
    const key = field.key.toLowerCase();
    switch (key) {
      case 'privatekey':
        once(seen, field);
        result.privateKey = field.value;
        break;
      case 'address':
        result.addresses.push(...parsePrefixList(field));
        break;
      case 'listenport':
        once(seen, field);
        result.listenPort = parseInteger(field, 0, 65535);
        break;
      case 'mtu':
        once(seen, field);
        result.mtu = parseInteger(field, 576, 65535);
        break;
      case 'dns':
        result.dns.push(...splitList(field.value));
        break;
      case 'preup':
      case 'postup':
      case 'predown':
      case 'postdown':
        result.hooks[HOOK_KEYS[key]].push(field.value);
        break;
      default:
        result.extra.push([field.key, field.value]);
    }
  }

  if (!result.privateKey) {
    throw new ParseError(section.line, '[Interface] sans PrivateKey');
  }

  return result;
}

function buildPeer(section: RawSection): PeerConfig {
  let publicKey: string | undefined;
  const peer: Omit<PeerConfig, 'publicKey'> = {
    allowedIPs: [],
    extra: [],
  };
  const seen = new Set<string>();

  const label = section.label ?? section.innerComment?.replace(LEGACY_LABEL_SUFFIX_RE, '');
  if (label) peer.label = label;

  for (const field of section.fields) {
    switch (field.key.toLowerCase()) {
      case 'publickey':
        once(seen, field);
        publicKey = field.value;
        break;
      case 'presharedkey':
        once(seen, field);
        peer.presharedKey = field.value;
        break;
      case 'allowedips':
        peer.allowedIPs.push(...parsePrefixList(field));
        break;
      case 'endpoint':
        once(seen, field);
        peer.endpoint = field.value;
        break;
      case 'persistentkeepalive':
        once(seen, field);
        peer.persistentKeepalive = field.value.toLowerCase() === 'off' ? 0 : parseInteger(field, 0, 65535);
        break;
      default:
        peer.extra.push([field.key, field.value]);
    }
  }

  if (!publicKey) {
    throw new ParseError(section.line, `[Peer]${peer.label ? ` "${peer.label}"` : ''} sans PublicKey`);
  }

  return { label: peer.label, publicKey, ...peer };
}

// ============================================
// API
// ============================================

/**
 * Parse une configuration serveur wg-quick
 */
export function parseConfig(text: string | Buffer): InterfaceConfig {
  const sections = splitSections(Buffer.isBuffer(text) ? text.toString('utf-8') : text);

  const ifaceSection = sections.find(s => s.kind === 'interface');
  if (!ifaceSection) {
    throw new ParseError(1, 'section [Interface] manquante');
  }

  const peers: PeerConfig[] = [];
  const keys = new Map<string, number>();
  for (const section of sections.filter(s => s.kind === 'peer')) {
    const peer = buildPeer(section);
    if (keys.has(peer.publicKey)) {
      const field = section.fields.find(f => f.key.toLowerCase() === 'publickey');
      throw new ParseError(
        field?.line ?? section.line,
        `PublicKey ${peer.publicKey} déjà utilisée (ligne ${keys.get(peer.publicKey)})`
      );
    }
    keys.set(peer.publicKey, section.line);
    if (peer.label === undefined) delete peer.label;
    peers.push(peer);
  }

  return { ...buildInterface(ifaceSection), peers };
}

function pushExtra(lines: string[], extra: ExtraField[]): void {
  for (const [key, value] of extra) {
    lines.push(`${key} = ${value}`);
  }
}

/**
 * Génère le texte de configuration serveur
 */
export function stringifyConfig(config: InterfaceConfig): string {
  const sections: string[][] = [];

  const iface = ['[Interface]', `PrivateKey = ${config.privateKey}`];
  if (config.addresses.length > 0) iface.push(`Address = ${config.addresses.map(formatPrefix).join(', ')}`);
  if (config.listenPort !== undefined) iface.push(`ListenPort = ${config.listenPort}`);
  if (config.mtu !== undefined) iface.push(`MTU = ${config.mtu}`);
  if (config.dns.length > 0) iface.push(`DNS = ${config.dns.join(', ')}`);
  for (const command of config.hooks.preUp) iface.push(`PreUp = ${command}`);
  for (const command of config.hooks.postUp) iface.push(`PostUp = ${command}`);
  for (const command of config.hooks.preDown) iface.push(`PreDown = ${command}`);
  for (const command of config.hooks.postDown) iface.push(`PostDown = ${command}`);
  pushExtra(iface, config.extra);
  sections.push(iface);

  for (const peer of config.peers) {
    const lines: string[] = [];
    if (peer.label) lines.push(`# ${peer.label}`);
    lines.push('[Peer]', `PublicKey = ${peer.publicKey}`);
    if (peer.presharedKey) lines.push(`PresharedKey = ${peer.presharedKey}`);
    if (peer.allowedIPs.length > 0) lines.push(`AllowedIPs = ${peer.allowedIPs.map(formatPrefix).join(', ')}`);
    if (peer.endpoint) lines.push(`Endpoint = ${peer.endpoint}`);
    if (peer.persistentKeepalive !== undefined) lines.push(`PersistentKeepalive = ${peer.persistentKeepalive}`);
    pushExtra(lines, peer.extra);
    sections.push(lines);
  }

  return sections.map(lines => lines.join('\n')).join('\n\n') + '\n';
}

/**
 * Génère la configuration à remettre au client
 */
export function renderClientConfig(bundle: ClientBundle): string {
  const iface = [
    '[Interface]',
    `PrivateKey = ${bundle.privateKey}`,
    `Address = ${bundle.addresses.map(formatPrefix).join(', ')}`,
  ];
  if (bundle.dns.length > 0) iface.push(`DNS = ${bundle.dns.join(', ')}`);
  if (bundle.mtu !== undefined) iface.push(`MTU = ${bundle.mtu}`);

  const peer = ['[Peer]', `PublicKey = ${bundle.serverPublicKey}`];
  if (bundle.presharedKey) peer.push(`PresharedKey = ${bundle.presharedKey}`);
  peer.push(`Endpoint = ${bundle.endpoint}`);
  peer.push(`AllowedIPs = ${bundle.allowedIPs.join(', ')}`);
  if (bundle.persistentKeepalive) peer.push(`PersistentKeepalive = ${bundle.persistentKeepalive}`);

  return `${iface.join('\n')}\n\n${peer.join('\n')}\n`;
}
