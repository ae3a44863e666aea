/**
 * @file i18n.ts
 * @description Internationalisation FR/EN pour wgkeep
 */

import { readFileSync, existsSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const moduleDir = dirname(fileURLToPath(import.meta.url));

type Messages = Record<string, string>;

let currentLang = 'fr';
let messages: Messages = {};

// Messages par défaut (français)
const defaultMessages: Messages = {
  // CLI
  'cli.description': 'Gestion des peers d\'un serveur WireGuard',
  'cli.version': 'Afficher la version',
  'cli.lang': 'Langue (fr/en)',
  'cli.verbose': 'Activer les logs de debug',
  'cli.config': 'Chemin de la configuration wgkeep',
  'cli.json': 'Sortie JSON',
  'cli.error': 'Erreur:',
  'cli.warning': 'Attention:',

  // Peers
  'peer.added': 'Peer "{name}" ajouté ({addresses})',
  'peer.removed': 'Peer "{name}" retiré',
  'peer.written': 'Configuration client écrite dans {path}',
  'peer.none': 'Aucun peer configuré',
  'peer.title': 'Peers de {iface}',
  'peer.online': 'en ligne',
  'peer.offline': 'hors ligne',
  'peer.never': 'jamais',
  'peer.ago': 'il y a {value}',

  // Endpoint
  'endpoint.placeholder': 'Adresse publique introuvable, "{placeholder}" est utilisé : éditez la configuration client',
  'endpoint.detected': 'Adresse publique détectée: {ip}',

  // Réconciliation
  'reconcile.interfaceDown': 'Interface {iface} inactive : configuration écrite, appliquée au prochain démarrage',
  'reconcile.summary': '{iface}: {added} ajouté(s), {removed} retiré(s), {unchanged} inchangé(s)',
  'reconcile.notApplied': 'Configuration écrite mais non appliquée sur {iface}: {error}',
  'reconcile.failure': 'Échec {action} {key}: {error}',

  // Port
  'port.changed': 'ListenPort: {previous} -> {port}',
  'port.unchanged': 'ListenPort déjà à {port}',
  'port.restart': 'Redémarrez l\'interface pour appliquer: systemctl restart wg-quick@{iface}',

  // Errors
  'error.configInvalid': 'Configuration invalide: {error}',
  'error.invalidPort': 'Port invalide: {port}',
  'error.unexpected': 'Erreur inattendue: {error}',
};

/**
 * Initialise l'i18n avec la langue spécifiée
 */
export function initI18n(lang?: string): void {
  // Priorité: paramètre > env > défaut (fr)
  currentLang = lang || process.env.WGKEEP_LANG || 'fr';

  if (currentLang === 'fr') {
    messages = defaultMessages;
    return;
  }

  const possiblePaths = [
    process.env.WGKEEP_LOCALES_DIR,
    // Installation système
    '/usr/lib/wgkeep/locales',
    // Développement et paquet npm (src/ ou dist/ à côté de locales/)
    join(moduleDir, '..', 'locales'),
    join(process.cwd(), 'locales'),
  ].filter((dir): dir is string => Boolean(dir));

  for (const dir of possiblePaths) {
    const localePath = join(dir, `${currentLang}.json`);
    if (existsSync(localePath)) {
      messages = loadLocale(localePath);
      return;
    }
  }

  // Langue inconnue : messages par défaut
  messages = defaultMessages;
}

function loadLocale(path: string): Messages {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const result: Messages = {};
  if (typeof parsed === 'object' && parsed !== null) {
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') result[key] = value;
    }
  }
  return result;
}

/**
 * Langue passée en ligne de commande (--lang en, --lang=en), lue avant
 * commander pour que l'aide soit déjà traduite
 */
export function langFromArgv(argv: string[]): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--lang') return argv[i + 1];
    if (argv[i].startsWith('--lang=')) return argv[i].slice('--lang='.length);
  }
  return undefined;
}

/**
 * Récupère un message traduit
 */
export function t(key: string, params?: Record<string, string | number>): string {
  let message = messages[key] || defaultMessages[key] || key;

  // Remplacer les paramètres {param}
  if (params) {
    for (const [k, v] of Object.entries(params)) {
      message = message.replace(new RegExp(`\\{${k}\\}`, 'g'), String(v));
    }
  }

  return message;
}

/**
 * Récupère la langue courante
 */
export function getLang(): string {
  return currentLang;
}

// Initialiser avec les valeurs par défaut
initI18n();
