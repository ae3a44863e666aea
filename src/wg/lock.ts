/**
 * @file wg/lock.ts
 * @description Verrou exclusif par fichier (<chemin>.lock contenant le PID)
 */

import { closeSync, linkSync, openSync, readFileSync, renameSync, unlinkSync, writeSync } from 'fs';
import { setTimeout as sleep } from 'timers/promises';
import { IOError, LockTimeoutError, errnoCode } from './errors.js';

export interface LockOptions {
  /** Délai maximal d'attente (défaut: 10000 ms) */
  timeoutMs?: number;
  /** Intervalle entre deux tentatives (défaut: 100 ms) */
  pollMs?: number;
  log?: (msg: string) => void;
}

export type ReleaseLock = () => void;

export const DEFAULT_LOCK_TIMEOUT_MS = 10_000;
const DEFAULT_POLL_MS = 100;

export function lockPathFor(path: string): string {
  return `${path}.lock`;
}

/**
 * Vérifie si un processus existe encore (EPERM = existe mais pas à nous)
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errnoCode(error) === 'EPERM';
  }
}

function readOwner(lockPath: string): number | undefined {
  try {
    const pid = parseInt(readFileSync(lockPath, 'utf-8').trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : undefined;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return undefined;
    throw new IOError(lockPath, error);
  }
}

function removeIfPresent(lockPath: string): void {
  try {
    unlinkSync(lockPath);
  } catch (error) {
    if (errnoCode(error) !== 'ENOENT') throw new IOError(lockPath, error);
  }
}

/**
 * Retire un verrou orphelin sans jamais supprimer celui d'un autre :
 * le fichier est d'abord renommé (atomique), puis relu. S'il ne porte plus
 * le PID mort attendu, un autre processus l'a repris entre-temps et il est
 * remis en place.
 */
export function takeOverStaleLock(lockPath: string, staleOwner: number, log?: (msg: string) => void): void {
  const aside = `${lockPath}.${process.pid}.${Date.now()}.stale`;
  try {
    renameSync(lockPath, aside);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return;
    throw new IOError(lockPath, error);
  }

  if (readOwner(aside) === staleOwner) {
    log?.(`Verrou orphelin ${lockPath} (PID ${staleOwner}) supprimé`);
    removeIfPresent(aside);
    return;
  }

  try {
    linkSync(aside, lockPath);
  } catch (error) {
    if (errnoCode(error) !== 'EEXIST') throw new IOError(lockPath, error);
  }
  removeIfPresent(aside);
}

/**
 * Une tentative de création exclusive. Un verrou dont le propriétaire
 * n'existe plus est supprimé puis retenté immédiatement.
 */
function tryAcquire(lockPath: string, log?: (msg: string) => void): boolean {
  try {
    const fd = openSync(lockPath, 'wx', 0o600);
    try {
      writeSync(fd, `${process.pid}\n`);
    } finally {
      closeSync(fd);
    }
    return true;
  } catch (error) {
    if (errnoCode(error) !== 'EEXIST') throw new IOError(lockPath, error);
  }

  const owner = readOwner(lockPath);
  if (owner !== undefined && !isProcessAlive(owner)) {
    takeOverStaleLock(lockPath, owner, log);
    return tryAcquire(lockPath, log);
  }

  return false;
}

/**
 * Acquiert le verrou associé à `path` et retourne la fonction de libération
 */
export async function acquireLock(path: string, options: LockOptions = {}): Promise<ReleaseLock> {
  const lockPath = lockPathFor(path);
  const timeoutMs = options.timeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
  const pollMs = options.pollMs ?? DEFAULT_POLL_MS;
  const deadline = Date.now() + timeoutMs;

  while (!tryAcquire(lockPath, options.log)) {
    if (Date.now() >= deadline) {
      throw new LockTimeoutError(lockPath, timeoutMs);
    }
    await sleep(Math.min(pollMs, Math.max(deadline - Date.now(), 1)));
  }

  let released = false;
  return () => {
    if (released) return;
    released = true;
    // Ne jamais supprimer le verrou d'un autre processus
    if (readOwner(lockPath) === process.pid) {
      removeIfPresent(lockPath);
    }
  };
}
