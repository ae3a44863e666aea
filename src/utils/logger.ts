/**
 * @file utils/logger.ts
 * @description Logger centralisé de wgkeep - compatible journald
 *
 * Par défaut debug/info vont sur stdout, warn/error sur stderr. Le CLI
 * redirige tout sur stderr quand stdout porte une configuration client.
 *
 * Utilisation :
 *   import { logger } from './utils/logger.js';
 *   logger.info('Peer ajouté');
 *   const log = logger.createSimpleLogger('debug'); // pour le module wg
 */

// ============================================
// Types
// ============================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  /** Niveau de log minimum (défaut: 'info') */
  level?: LogLevel;
  /** Activer les couleurs (défaut: auto-détecté) */
  colors?: boolean | null;
  /** Tout écrire sur stderr */
  stderrOnly?: boolean;
}

/**
 * Destination des lignes formatées, remplaçable dans les tests
 */
export interface LogSink {
  stdout(line: string): void;
  stderr(line: string): void;
}

// ============================================
// Constants
// ============================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',   // Gris
  info: '\x1b[36m',    // Cyan
  warn: '\x1b[33m',    // Jaune
  error: '\x1b[31m',   // Rouge
};

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';

const processSink: LogSink = {
  stdout: line => process.stdout.write(line + '\n'),
  stderr: line => process.stderr.write(line + '\n'),
};

// ============================================
// Logger State
// ============================================

let currentLevel: LogLevel = 'info';
let useColors: boolean | null = null; // null = auto-detect
let stderrOnly = false;
let sink: LogSink = processSink;

// ============================================
// Helpers
// ============================================

/**
 * [YYYY-MM-DD HH:mm:ss] en heure locale
 */
function formatTimestamp(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())} ` +
    `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
}

/**
 * Couleurs si le flux utilisé est un TTY et NO_COLOR absent (journald: pas de couleurs)
 */
function shouldUseColors(): boolean {
  if (useColors !== null) return useColors;
  if (process.env.NO_COLOR) return false;
  if (process.env.FORCE_COLOR) return true;

  const stream = stderrOnly ? process.stderr : process.stdout;
  return stream.isTTY === true;
}

function formatArg(arg: unknown): string {
  if (typeof arg !== 'object' || arg === null) return String(arg);
  try {
    return JSON.stringify(arg);
  } catch (err) {
    // Structure circulaire
    return `${String(arg)} (${err instanceof Error ? err.message : String(err)})`;
  }
}

/**
 * Formate une ligne de log
 */
export function formatMessage(level: LogLevel, message: string, args: unknown[] = [], now = new Date()): string {
  const timestamp = formatTimestamp(now);
  const label = level.toUpperCase().padEnd(5);
  const text = args.length > 0 ? `${message} ${args.map(formatArg).join(' ')}` : message;

  if (shouldUseColors()) {
    return `${DIM}[${timestamp}]${RESET} ${LEVEL_COLORS[level]}${BOLD}[${label}]${RESET} ${text}`;
  }
  return `[${timestamp}] [${label}] ${text}`;
}

function log(level: LogLevel, message: string, args: unknown[]): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) return;

  const line = formatMessage(level, message, args);
  if (stderrOnly || level === 'warn' || level === 'error') {
    sink.stderr(line);
  } else {
    sink.stdout(line);
  }
}

// ============================================
// Logger Functions
// ============================================

/** Détails techniques (commandes wg, verrou...), masqués par défaut */
function debug(message: string, ...args: unknown[]): void {
  log('debug', message, args);
}

function info(message: string, ...args: unknown[]): void {
  log('info', message, args);
}

/** Situation anormale mais non bloquante (interface inactive...) */
function warn(message: string, ...args: unknown[]): void {
  log('warn', message, args);
}

function error(message: string, ...args: unknown[]): void {
  log('error', message, args);
}

/**
 * Fonction de log simple, injectée dans les classes du module wg
 */
function createSimpleLogger(level: LogLevel = 'info'): (msg: string) => void {
  return (msg: string) => log(level, msg, []);
}

// ============================================
// Configuration Functions
// ============================================

function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * @param enabled true/false ou null pour auto-detect
 */
function setColors(enabled: boolean | null): void {
  useColors = enabled;
}

function setStderrOnly(enabled: boolean): void {
  stderrOnly = enabled;
}

/**
 * Remplace la destination des lignes ; sans argument, revient à stdout/stderr
 */
function setSink(next?: LogSink): void {
  sink = next ?? processSink;
}

function configure(options: LoggerOptions): void {
  if (options.level !== undefined) setLogLevel(options.level);
  if (options.colors !== undefined) setColors(options.colors);
  if (options.stderrOnly !== undefined) setStderrOnly(options.stderrOnly);
}

// ============================================
// Exports
// ============================================

/**
 * Logger principal avec méthodes de log
 */
export const logger = {
  debug,
  info,
  warn,
  error,
  setLevel: setLogLevel,
  getLevel: getLogLevel,
  setColors,
  setStderrOnly,
  setSink,
  configure,
  createSimpleLogger,
};

// Exports nommés pour utilisation directe
export {
  debug,
  info,
  warn,
  error,
  setLogLevel,
  getLogLevel,
  setColors,
  setStderrOnly,
  setSink,
  configure,
  createSimpleLogger,
};

export default logger;
