/**
 * @file wg/store.ts
 * @description Lecture et écriture atomique de la configuration serveur
 *
 * Toute modification passe par withTransaction() : verrou, relecture,
 * mutation, fichier temporaire synchronisé, copie de sauvegarde, rename.
 * Le fichier cible contient toujours soit l'ancienne version complète,
 * soit la nouvelle.
 */

import {
  closeSync,
  copyFileSync,
  existsSync,
  fsyncSync,
  openSync,
  readFileSync,
  readdirSync,
  renameSync,
  unlinkSync,
  writeSync,
} from 'fs';
import { basename, dirname, join } from 'path';
import { parseConfig, stringifyConfig } from './conf.js';
import { IOError, WgKeepError, errnoCode, errorMessage } from './errors.js';
import { acquireLock, DEFAULT_LOCK_TIMEOUT_MS, isProcessAlive } from './lock.js';
import { InterfaceConfig } from './types.js';

export interface ConfigStoreOptions {
  lockTimeoutMs?: number;
  lockPollMs?: number;
  /** Nombre de sauvegardes conservées (défaut: 10) */
  backupsKeep?: number;
  log?: (msg: string) => void;
}

/**
 * Résultat d'une transaction ; sans `config`, rien n'est écrit
 */
export interface TransactionOutcome<T> {
  config?: InterfaceConfig;
  result: T;
}

export type TransactionFn<T> = (
  config: InterfaceConfig
) => TransactionOutcome<T> | Promise<TransactionOutcome<T>>;

const DEFAULT_BACKUPS_KEEP = 10;

export class ConfigStore {
  readonly path: string;
  private readonly lockTimeoutMs: number;
  private readonly lockPollMs?: number;
  private readonly backupsKeep: number;
  private readonly log: (msg: string) => void;

  constructor(path: string, options: ConfigStoreOptions = {}) {
    this.path = path;
    this.lockTimeoutMs = options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
    this.lockPollMs = options.lockPollMs;
    this.backupsKeep = options.backupsKeep ?? DEFAULT_BACKUPS_KEEP;
    this.log = options.log ?? (() => {});
  }

  // ============================================
  // API
  // ============================================

  /**
   * Lit la configuration sous verrou
   */
  async load(): Promise<InterfaceConfig> {
    return this.withTransaction(config => ({ result: config }));
  }

  /**
   * Remplace la configuration (le fichier peut ne pas exister encore)
   */
  async save(config: InterfaceConfig): Promise<void> {
    const release = await this.lock();
    try {
      this.persist(config);
    } finally {
      release();
    }
  }

  /**
   * Exécute `fn` sur la configuration fraîchement relue, sous verrou.
   * Une erreur levée par `fn` annule la transaction avant toute écriture.
   */
  async withTransaction<T>(fn: TransactionFn<T>): Promise<T> {
    const release = await this.lock();
    try {
      const current = this.read();
      const outcome = await fn(structuredClone(current));
      if (outcome.config) {
        this.persist(outcome.config);
      }
      return outcome.result;
    } finally {
      release();
    }
  }

  /**
   * Sauvegardes existantes, de la plus récente à la plus ancienne
   */
  listBackups(): string[] {
    const dir = dirname(this.path);
    const prefix = `${basename(this.path)}.bak.`;
    let entries: string[];
    try {
      entries = readdirSync(dir);
    } catch (error) {
      throw new IOError(dir, error);
    }

    return entries
      .filter(name => name.startsWith(prefix) && /^\d+$/.test(name.slice(prefix.length)))
      .sort((a, b) => Number(b.slice(prefix.length)) - Number(a.slice(prefix.length)))
      .map(name => join(dir, name));
  }

  // ============================================
  // Étapes d'écriture
  // ============================================

  private lock() {
    return acquireLock(this.path, {
      timeoutMs: this.lockTimeoutMs,
      pollMs: this.lockPollMs,
      log: this.log,
    });
  }

  private read(): InterfaceConfig {
    let text: string;
    try {
      text = readFileSync(this.path, 'utf-8');
    } catch (error) {
      throw new IOError(this.path, error);
    }
    return parseConfig(text);
  }

  private persist(config: InterfaceConfig): void {
    const text = stringifyConfig(config);
    const tmp = join(dirname(this.path), `.${basename(this.path)}.${process.pid}.${Date.now()}.tmp`);

    try {
      this.sweepTemps();
      this.writeTemp(tmp, text);
      if (existsSync(this.path)) {
        this.backup();
      }
      this.commit(tmp, this.path);
      this.syncDirectory();
    } catch (error) {
      this.removeTemp(tmp);
      throw error instanceof WgKeepError ? error : new IOError(this.path, error);
    }

    this.log(`Configuration écrite: ${this.path}`);
    this.pruneBackups();
  }

  private writeTemp(tmp: string, text: string): void {
    const fd = openSync(tmp, 'wx', 0o600);
    try {
      writeSync(fd, text);
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }

  private backup(): void {
    // Horodatage strictement croissant, même pour deux commits dans la même ms
    const newest = this.listBackups()[0];
    const last = newest ? Number(newest.slice(newest.lastIndexOf('.') + 1)) : 0;
    const stamp = Math.max(Date.now(), last + 1);
    copyFileSync(this.path, `${this.path}.bak.${stamp}`);
  }

  /**
   * Remplacement atomique du fichier cible
   */
  protected commit(tmp: string, target: string): void {
    renameSync(tmp, target);
  }

  private syncDirectory(): void {
    const fd = openSync(dirname(this.path), 'r');
    try {
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }

  /**
   * Fichiers temporaires laissés par un processus interrompu (SIGINT, SIGKILL)
   */
  private sweepTemps(): void {
    const dir = dirname(this.path);
    const prefix = `.${basename(this.path)}.`;
    for (const name of readdirSync(dir)) {
      if (!name.startsWith(prefix)) continue;
      const match = name.slice(prefix.length).match(/^(\d+)\.\d+\.tmp$/);
      if (!match) continue;
      const pid = Number(match[1]);
      if (pid !== process.pid && !isProcessAlive(pid)) {
        this.log(`Fichier temporaire orphelin supprimé: ${name}`);
        this.removeTemp(join(dir, name));
      }
    }
  }

  private removeTemp(tmp: string): void {
    try {
      unlinkSync(tmp);
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        this.log(`Impossible de supprimer ${tmp}: ${errorMessage(error)}`);
      }
    }
  }

  /**
   * Après un commit réussi, un échec de nettoyage est seulement signalé
   */
  private pruneBackups(): void {
    for (const old of this.listBackups().slice(this.backupsKeep)) {
      try {
        unlinkSync(old);
      } catch (error) {
        this.log(`Impossible de supprimer la sauvegarde ${old}: ${errorMessage(error)}`);
      }
    }
  }
}
