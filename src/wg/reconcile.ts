/**
 * @file wg/reconcile.ts
 * @description Alignement de l'interface active sur la configuration écrite
 *
 * Le diff se fait par clé publique : ajout des peers absents de
 * l'interface, puis retrait des peers inconnus de la configuration.
 * Les peers présents des deux côtés ne sont pas touchés.
 */

import { PeerFailure, ReconcileError, errorMessage } from './errors.js';
import { TunnelEngine } from './engine.js';
import { AppliedDiff, InterfaceConfig, LivePeerStatus } from './types.js';

export interface ReconcileOptions {
  log?: (msg: string) => void;
}

export class ReconciliationController {
  private readonly engine: TunnelEngine;
  private readonly log: (msg: string) => void;

  constructor(engine: TunnelEngine, options: ReconcileOptions = {}) {
    this.engine = engine;
    this.log = options.log ?? (() => {});
  }

  get interfaceName(): string {
    return this.engine.interfaceName;
  }

  /**
   * Applique la configuration sur l'interface. Les échecs par peer sont
   * collectés dans `failures`, le traitement continue. Interface inactive
   * ou illisible : ReconcileError, rien n'est modifié.
   */
  applyToLiveInterface(config: InterfaceConfig): AppliedDiff {
    if (!this.engine.isUp()) {
      throw new ReconcileError('interface-down', this.interfaceName);
    }

    let live: Set<string>;
    try {
      live = new Set(this.engine.listPeers().map(p => p.publicKey));
    } catch (error) {
      throw new ReconcileError('engine-failure', this.interfaceName, [], { cause: error });
    }
    const desired = new Set(config.peers.map(p => p.publicKey));
    const diff: AppliedDiff = { added: [], removed: [], unchanged: [], failures: [] };

    for (const peer of config.peers) {
      if (live.has(peer.publicKey)) {
        diff.unchanged.push(peer.publicKey);
        continue;
      }
      try {
        this.engine.addPeer(peer);
        diff.added.push(peer.publicKey);
        this.log(`Peer ajouté à ${this.interfaceName}: ${peer.label ?? peer.publicKey}`);
      } catch (error) {
        diff.failures.push(this.failure(peer.publicKey, 'add', error));
      }
    }

    for (const publicKey of live) {
      if (desired.has(publicKey)) continue;
      try {
        this.engine.removePeer(publicKey);
        diff.removed.push(publicKey);
        this.log(`Peer retiré de ${this.interfaceName}: ${publicKey}`);
      } catch (error) {
        diff.failures.push(this.failure(publicKey, 'remove', error));
      }
    }

    return diff;
  }

  /**
   * État des peers sur l'interface, vide si elle est inactive ou illisible
   */
  queryLiveStatus(): Map<string, LivePeerStatus> {
    const status = new Map<string, LivePeerStatus>();
    if (!this.engine.isUp()) return status;

    try {
      for (const peer of this.engine.listPeers()) {
        status.set(peer.publicKey, peer);
      }
    } catch (error) {
      this.log(`Lecture de ${this.interfaceName} impossible: ${errorMessage(error)}`);
      status.clear();
    }
    return status;
  }

  private failure(publicKey: string, action: PeerFailure['action'], error: unknown): PeerFailure {
    const message = errorMessage(error);
    this.log(`Échec ${action} ${publicKey} sur ${this.interfaceName}: ${message}`);
    return { publicKey, action, error: message };
  }
}

/**
 * Lève ReconcileError('per-peer-failure') si un peer n'a pas pu être appliqué
 */
export function assertFullyApplied(diff: AppliedDiff, interfaceName: string): void {
  if (diff.failures.length > 0) {
    throw new ReconcileError('per-peer-failure', interfaceName, diff.failures);
  }
}
