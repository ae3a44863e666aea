/**
 * @file config.ts
 * @description Parsing de la configuration YAML de wgkeep
 */

import { readFileSync, existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { t } from './i18n.js';
import { LogLevel } from './utils/logger.js';

// ============================================
// Types
// ============================================

export interface WgKeepConfig {
  interface: {
    name: string;
    /** Fichier wg-quick géré (défaut: /etc/wireguard/<name>.conf) */
    configPath: string;
  };
  server: {
    /** Hôte ou hôte:port annoncé aux clients */
    endpoint?: string;
  };
  client: {
    dns: string[];
    /** Résolveurs ajoutés pour les clients double pile */
    dns6: string[];
    mtu?: number;
    keepalive: number;
    allowedIPs?: string[];
    presharedKey: boolean;
  };
  store: {
    lockTimeoutMs: number;
    backupsKeep: number;
  };
  engine: {
    timeoutMs: number;
  };
  status: {
    onlineWindowSeconds: number;
  };
  logging: {
    level: LogLevel;
  };
}

export const DEFAULT_CONFIG_PATH = '/etc/wgkeep/config.yml';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

// ============================================
// Lecture typée du YAML
// ============================================

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawSection, key: string): RawSection {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new Error(t('error.configInvalid', { error: `${key} doit être une section` }));
  }
  return value;
}

function str(raw: RawSection, key: string, path: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new Error(t('error.configInvalid', { error: `${path} doit être une chaîne` }));
  }
  return String(value);
}

function num(raw: RawSection, key: string, path: string): number | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(t('error.configInvalid', { error: `${path} doit être un nombre` }));
  }
  return value;
}

function bool(raw: RawSection, key: string, path: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new Error(t('error.configInvalid', { error: `${path} doit être true ou false` }));
  }
  return value;
}

/**
 * Liste YAML ou chaîne "a, b"
 */
function list(raw: RawSection, key: string, path: string): string[] | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') {
    return value.split(',').map(s => s.trim()).filter(Boolean);
  }
  if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
    return value.map(v => v.trim());
  }
  throw new Error(t('error.configInvalid', { error: `${path} doit être une liste` }));
}

// ============================================
// Parsing
// ============================================

/**
 * Charge la configuration ; un fichier absent donne les valeurs par défaut
 */
export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): WgKeepConfig {
  if (!existsSync(configPath)) {
    return normalizeConfig({});
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new Error(t('error.configInvalid', { error: error instanceof Error ? error.message : String(error) }), {
      cause: error,
    });
  }

  return normalizeConfig(raw ?? {});
}

/**
 * Normalise (snake_case -> camelCase, défauts) puis valide
 */
export function normalizeConfig(raw: unknown): WgKeepConfig {
  if (!isRecord(raw)) {
    throw new Error(t('error.configInvalid', { error: 'la racine doit être une section' }));
  }

  const iface = section(raw, 'interface');
  const server = section(raw, 'server');
  const client = section(raw, 'client');
  const store = section(raw, 'store');
  const engine = section(raw, 'engine');
  const status = section(raw, 'status');
  const logging = section(raw, 'logging');

  const name = str(iface, 'name', 'interface.name') ?? 'wg0';
  const level = str(logging, 'level', 'logging.level') ?? 'info';

  const config: WgKeepConfig = {
    interface: {
      name,
      configPath: str(iface, 'config_path', 'interface.config_path') ?? `/etc/wireguard/${name}.conf`,
    },
    server: {
      endpoint: str(server, 'endpoint', 'server.endpoint'),
    },
    client: {
      dns: list(client, 'dns', 'client.dns') ?? ['1.1.1.1', '8.8.8.8'],
      dns6: list(client, 'dns6', 'client.dns6') ?? ['2606:4700:4700::1111', '2001:4860:4860::8888'],
      mtu: num(client, 'mtu', 'client.mtu') ?? 1420,
      keepalive: num(client, 'keepalive', 'client.keepalive') ?? 25,
      allowedIPs: list(client, 'allowed_ips', 'client.allowed_ips'),
      presharedKey: bool(client, 'preshared_key', 'client.preshared_key') ?? false,
    },
    store: {
      lockTimeoutMs: num(store, 'lock_timeout_ms', 'store.lock_timeout_ms') ?? 10000,
      backupsKeep: num(store, 'backups_keep', 'store.backups_keep') ?? 10,
    },
    engine: {
      timeoutMs: num(engine, 'timeout_ms', 'engine.timeout_ms') ?? 5000,
    },
    status: {
      onlineWindowSeconds: num(status, 'online_window_seconds', 'status.online_window_seconds') ?? 180,
    },
    logging: {
      level: LOG_LEVELS.find(l => l === level) ?? 'info',
    },
  };

  if (!LOG_LEVELS.some(l => l === level)) {
    throw new Error(t('error.configInvalid', { error: `logging.level inconnu "${level}"` }));
  }

  validateConfig(config);
  return config;
}

/**
 * Valide la configuration
 */
function validateConfig(config: WgKeepConfig): void {
  if (!/^[a-zA-Z0-9_=+.-]{1,15}$/.test(config.interface.name)) {
    throw new Error(t('error.configInvalid', { error: `interface.name invalide "${config.interface.name}"` }));
  }

  const positive: Array<[string, number]> = [
    ['client.keepalive', config.client.keepalive],
    ['store.lock_timeout_ms', config.store.lockTimeoutMs],
    ['store.backups_keep', config.store.backupsKeep],
    ['engine.timeout_ms', config.engine.timeoutMs],
    ['status.online_window_seconds', config.status.onlineWindowSeconds],
  ];
  for (const [path, value] of positive) {
    if (!Number.isInteger(value) || value < 0) {
      throw new Error(t('error.configInvalid', { error: `${path} doit être un entier positif` }));
    }
  }

  if (config.client.mtu !== undefined && (config.client.mtu < 576 || config.client.mtu > 65535)) {
    throw new Error(t('error.configInvalid', { error: `client.mtu hors limites (576-65535)` }));
  }
}

/**
 * Crée un exemple de configuration
 */
export function getExampleConfig(): string {
  return `# Configuration wgkeep
# Gestion des peers d'un serveur WireGuard

interface:
  name: wg0
  # Fichier wg-quick géré (défaut: /etc/wireguard/<name>.conf)
  config_path: /etc/wireguard/wg0.conf

server:
  # Adresse annoncée aux clients (détectée si absente)
  # Le port par défaut est le ListenPort de l'interface
  endpoint: vpn.example.com:51820

# Configuration générée pour les clients
client:
  dns:
    - 1.1.1.1
    - 8.8.8.8
  # Ajoutés si l'interface a une adresse IPv6
  dns6:
    - 2606:4700:4700::1111
    - 2001:4860:4860::8888
  mtu: 1420
  keepalive: 25
  # Split tunnel: remplace 0.0.0.0/0, ::/0
  # allowed_ips:
  #   - 10.50.0.0/24
  preshared_key: false

store:
  lock_timeout_ms: 10000
  # Sauvegardes <fichier>.bak.<horodatage> conservées
  backups_keep: 10

engine:
  timeout_ms: 5000

status:
  # Un peer est "en ligne" si son dernier handshake date de moins de N secondes
  online_window_seconds: 180

logging:
  level: info
`;
}
