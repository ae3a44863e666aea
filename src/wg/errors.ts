/**
 * @file wg/errors.ts
 * @description Taxonomie des erreurs wgkeep
 *
 * Chaque erreur porte un code stable et le code de sortie du CLI associé.
 */

export type WgKeepErrorCode =
  | 'INVALID_ARGUMENT'
  | 'PARSE_ERROR'
  | 'NO_CAPACITY'
  | 'PEER_EXISTS'
  | 'PEER_NOT_FOUND'
  | 'IO_ERROR'
  | 'LOCK_TIMEOUT'
  | 'RECONCILE_ERROR';

export const EXIT_CODES: Record<WgKeepErrorCode, number> = {
  INVALID_ARGUMENT: 2,
  PARSE_ERROR: 3,
  NO_CAPACITY: 4,
  PEER_EXISTS: 5,
  PEER_NOT_FOUND: 6,
  IO_ERROR: 7,
  LOCK_TIMEOUT: 8,
  RECONCILE_ERROR: 9,
};

/**
 * Classe de base de toutes les erreurs métier
 */
export class WgKeepError extends Error {
  readonly code: WgKeepErrorCode;

  constructor(code: WgKeepErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

export class InvalidArgumentError extends WgKeepError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

/**
 * Configuration WireGuard illisible (ligne 1-based)
 */
export class ParseError extends WgKeepError {
  readonly line: number;

  constructor(line: number, reason: string) {
    super('PARSE_ERROR', `ligne ${line}: ${reason}`);
    this.line = line;
  }
}

/**
 * Plus aucune adresse libre dans le subnet
 */
export class NoCapacityError extends WgKeepError {
  readonly subnet: string;

  constructor(subnet: string) {
    super('NO_CAPACITY', `plus d'adresse disponible dans ${subnet}`);
    this.subnet = subnet;
  }
}

export class PeerExistsError extends WgKeepError {
  readonly identifier: string;

  constructor(identifier: string) {
    super('PEER_EXISTS', `le peer "${identifier}" existe déjà`);
    this.identifier = identifier;
  }
}

export class PeerNotFoundError extends WgKeepError {
  readonly identifier: string;
  readonly available: string[];

  constructor(identifier: string, available: string[]) {
    const known = available.length > 0 ? available.join(', ') : '(aucun)';
    super('PEER_NOT_FOUND', `peer "${identifier}" introuvable (peers connus: ${known})`);
    this.identifier = identifier;
    this.available = available;
  }
}

export class IOError extends WgKeepError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('IO_ERROR', `${path}: ${reason}`, { cause });
    this.path = path;
  }
}

export class LockTimeoutError extends WgKeepError {
  readonly path: string;
  readonly timeoutMs: number;

  constructor(path: string, timeoutMs: number) {
    super('LOCK_TIMEOUT', `verrou ${path} non obtenu après ${timeoutMs} ms`);
    this.path = path;
    this.timeoutMs = timeoutMs;
  }
}

export interface PeerFailure {
  publicKey: string;
  action: 'add' | 'remove';
  error: string;
}

export type ReconcileErrorKind = 'interface-down' | 'engine-failure' | 'per-peer-failure';

/**
 * Échec de réconciliation : interface absente, interface illisible, ou
 * échecs par peer agrégés
 */
export class ReconcileError extends WgKeepError {
  readonly kind: ReconcileErrorKind;
  readonly interfaceName: string;
  readonly failures: PeerFailure[];

  constructor(
    kind: ReconcileErrorKind,
    interfaceName: string,
    failures: PeerFailure[] = [],
    options?: { cause?: unknown }
  ) {
    super('RECONCILE_ERROR', reconcileMessage(kind, interfaceName, failures, options?.cause), options);
    this.kind = kind;
    this.interfaceName = interfaceName;
    this.failures = failures;
  }
}

function reconcileMessage(
  kind: ReconcileErrorKind,
  interfaceName: string,
  failures: PeerFailure[],
  cause: unknown
): string {
  switch (kind) {
    case 'interface-down':
      return `interface ${interfaceName} inactive`;
    case 'engine-failure':
      return `lecture de ${interfaceName} impossible: ${errorMessage(cause)}`;
    case 'per-peer-failure':
      return `${failures.length} peer(s) en échec sur ${interfaceName}: ` +
        failures.map(f => `${f.action} ${f.publicKey} (${f.error})`).join('; ');
  }
}

/**
 * Message lisible d'une valeur levée quelconque
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Code errno d'une erreur système (ENOENT, EEXIST...)
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
