/**
 * @file wg/endpoint.ts
 * @description Détection de l'adresse publique du serveur
 */

import { execFileSync } from 'child_process';
import { isIP } from 'net';
import { errorMessage } from './errors.js';

export interface DiscoverOptions {
  /** Timeout de connexion par service (secondes) */
  connectTimeout?: number;
  services?: string[];
  log?: (msg: string) => void;
}

export const ECHO_SERVICES = [
  'https://ifconfig.co',
  'https://icanhazip.com',
  'https://ipinfo.io/ip',
];

/**
 * Adresse source de la route par défaut (`ip -4 route get`)
 */
export function parseRouteSource(output: string): string | null {
  const match = output.match(/\bsrc\s+(\S+)/);
  return match && isIP(match[1]) === 4 ? match[1] : null;
}

/**
 * Services d'écho HTTP d'abord, puis adresse de la route par défaut.
 * Retourne null si rien n'a répondu.
 */
export function discoverPublicAddress(options: DiscoverOptions = {}): string | null {
  const log = options.log ?? (() => {});
  const timeout = options.connectTimeout ?? 3;

  for (const service of options.services ?? ECHO_SERVICES) {
    try {
      const ip = execFileSync('curl', ['-4', '-s', '--connect-timeout', String(timeout), service], {
        encoding: 'utf-8',
        stdio: ['ignore', 'pipe', 'pipe'],
        timeout: (timeout + 2) * 1000,
      }).trim();
      if (isIP(ip) === 4) return ip;
    } catch (error) {
      log(`${service}: ${errorMessage(error)}`);
    }
  }

  try {
    const output = execFileSync('ip', ['-4', 'route', 'get', '1.1.1.1'], {
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    return parseRouteSource(output);
  } catch (error) {
    log(`Route par défaut introuvable: ${errorMessage(error)}`);
    return null;
  }
}
