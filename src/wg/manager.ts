/**
 * @file wg/manager.ts
 * @description Orchestration : modification de la configuration puis
 * application sur l'interface active
 */

import { ReconcileError } from './errors.js';
import { ReconciliationController } from './reconcile.js';
import { AddPeerResult, PeerRegistry, RemovePeerResult } from './registry.js';
import { AppliedDiff, PeerSummary } from './types.js';

export interface PeerManagerOptions {
  /** Fenêtre pendant laquelle un handshake vaut "en ligne" (défaut: 180 s) */
  onlineWindowSeconds?: number;
  now?: () => Date;
  log?: (msg: string) => void;
}

export interface PeerStatus extends PeerSummary {
  online: boolean;
  endpoint?: string;
  latestHandshake?: Date;
  transferRx: number;
  transferTx: number;
}

/**
 * Résultat de l'application sur l'interface, une fois la configuration
 * écrite : soit le diff, soit l'erreur qui a empêché l'application
 * (interface inactive ou illisible). Dans les deux cas l'écriture est
 * acquise et le bundle client reste disponible.
 */
export type LiveOutcome =
  | { applied: AppliedDiff; liveError?: undefined }
  | { applied?: undefined; liveError: ReconcileError };

export type ManagedAddResult = AddPeerResult & LiveOutcome;
export type ManagedRemoveResult = RemovePeerResult & LiveOutcome;

export const DEFAULT_ONLINE_WINDOW_SECONDS = 180;

export class PeerManager {
  private readonly registry: PeerRegistry;
  private readonly controller: ReconciliationController;
  private readonly onlineWindowMs: number;
  private readonly now: () => Date;
  private readonly log: (msg: string) => void;

  constructor(registry: PeerRegistry, controller: ReconciliationController, options: PeerManagerOptions = {}) {
    this.registry = registry;
    this.controller = controller;
    this.onlineWindowMs = (options.onlineWindowSeconds ?? DEFAULT_ONLINE_WINDOW_SECONDS) * 1000;
    this.now = options.now ?? (() => new Date());
    this.log = options.log ?? (() => {});
  }

  async addPeer(name: string, serverEndpoint: string): Promise<ManagedAddResult> {
    const result = await this.registry.addPeer(name, serverEndpoint);
    return { ...result, ...this.applyQuietly(result.config) };
  }

  async removePeer(identifier: string): Promise<ManagedRemoveResult> {
    const result = await this.registry.removePeer(identifier);
    return { ...result, ...this.applyQuietly(result.config) };
  }

  /**
   * Applique la configuration écrite sur l'interface ; lève
   * ReconcileError si l'interface est inactive ou illisible
   */
  async reconcile(): Promise<AppliedDiff> {
    const config = await this.registry.store.load();
    return this.controller.applyToLiveInterface(config);
  }

  /**
   * Peers de la configuration enrichis de l'état de l'interface
   */
  async status(): Promise<PeerStatus[]> {
    const peers = await this.registry.listPeers();
    const live = this.controller.queryLiveStatus();
    const now = this.now().getTime();

    return peers.map(peer => {
      const state = live.get(peer.publicKey);
      const status: PeerStatus = {
        ...peer,
        online: state?.latestHandshake !== undefined &&
          now - state.latestHandshake.getTime() <= this.onlineWindowMs,
        transferRx: state?.transferRx ?? 0,
        transferTx: state?.transferTx ?? 0,
      };
      if (state?.endpoint) status.endpoint = state.endpoint;
      if (state?.latestHandshake) status.latestHandshake = state.latestHandshake;
      return status;
    });
  }

  /**
   * La configuration est déjà écrite : aucune erreur ne remonte d'ici,
   * l'application sera refaite par `reconcile`
   */
  private applyQuietly(config: AddPeerResult['config']): LiveOutcome {
    try {
      return { applied: this.controller.applyToLiveInterface(config) };
    } catch (error) {
      const liveError = error instanceof ReconcileError
        ? error
        : new ReconcileError('engine-failure', this.controller.interfaceName, [], { cause: error });
      this.log(`Configuration écrite, non appliquée: ${liveError.message}`);
      return { liveError };
    }
  }
}
