#!/usr/bin/env node
/**
 * @file cli.ts
 * @description CLI wgkeep avec Commander.js
 */

import { Command, CommanderError } from 'commander';
import { writeFileSync } from 'fs';
import { loadConfig, getExampleConfig, DEFAULT_CONFIG_PATH, WgKeepConfig } from './config.js';
import { initI18n, langFromArgv, t } from './i18n.js';
import { logger } from './utils/logger.js';
import {
  AppliedDiff,
  ConfigStore,
  IOError,
  InvalidArgumentError,
  LiveOutcome,
  PeerManager,
  PeerRegistry,
  PeerStatus,
  ReconciliationController,
  WgCliEngine,
  WgKeepError,
  assertFullyApplied,
  discoverPublicAddress,
  errorMessage,
  formatPrefix,
  renderClientConfig,
} from './wg/index.js';

// ============================================
// Version
// ============================================

const VERSION = '1.0.0';

const ENDPOINT_PLACEHOLDER = 'YOUR_SERVER_IP';

// ============================================
// Helpers
// ============================================

function colorize(text: string, color: 'green' | 'red' | 'yellow' | 'blue' | 'gray' | 'cyan' | 'bold'): string {
  if (process.env.NO_COLOR || !process.stdout.isTTY) return text;
  const colors: Record<typeof color, string> = {
    green: '\x1b[32m',
    red: '\x1b[31m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    gray: '\x1b[90m',
    cyan: '\x1b[36m',
    bold: '\x1b[1m',
  };
  return `${colors[color]}${text}\x1b[0m`;
}

function formatRelativeTime(date: Date): string {
  const diffSeconds = Math.max(0, Math.floor((Date.now() - date.getTime()) / 1000));

  if (diffSeconds < 60) return t('peer.ago', { value: `${diffSeconds}s` });
  if (diffSeconds < 3600) return t('peer.ago', { value: `${Math.floor(diffSeconds / 60)}min` });
  if (diffSeconds < 86400) return t('peer.ago', { value: `${Math.floor(diffSeconds / 3600)}h` });
  return t('peer.ago', { value: `${Math.floor(diffSeconds / 86400)}j` });
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}K`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)}M`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)}G`;
}

function warn(message: string): void {
  console.error(colorize(t('cli.warning'), 'yellow'), message);
}

function printFailures(diff: AppliedDiff): void {
  for (const failure of diff.failures) {
    warn(t('reconcile.failure', { action: failure.action, key: failure.publicKey, error: failure.error }));
  }
}

/**
 * Après une écriture réussie : avertit si l'interface n'a pas suivi
 */
function reportLiveOutcome(outcome: LiveOutcome): void {
  if (outcome.liveError) {
    const key = outcome.liveError.kind === 'interface-down' ? 'reconcile.interfaceDown' : 'reconcile.notApplied';
    warn(t(key, { iface: outcome.liveError.interfaceName, error: outcome.liveError.message }));
    return;
  }
  if (outcome.applied.failures.length > 0) {
    printFailures(outcome.applied);
    process.exitCode = 9;
  }
}

// ============================================
// Contexte
// ============================================

interface GlobalOptions {
  config: string;
  lang?: string;
  verbose?: boolean;
  json?: boolean;
}

interface Context {
  config: WgKeepConfig;
  store: ConfigStore;
  registry: PeerRegistry;
  controller: ReconciliationController;
  manager: PeerManager;
}

/**
 * Charge la configuration wgkeep et assemble les composants
 */
function createContext(options: GlobalOptions): Context {
  initI18n(options.lang);
  const config = loadConfig(options.config);
  logger.setLevel(options.verbose ? 'debug' : config.logging.level);
  const log = logger.createSimpleLogger('debug');

  const store = new ConfigStore(config.interface.configPath, {
    lockTimeoutMs: config.store.lockTimeoutMs,
    backupsKeep: config.store.backupsKeep,
    log,
  });
  const registry = new PeerRegistry(store, {
    client: {
      dns: config.client.dns,
      dns6: config.client.dns6,
      mtu: config.client.mtu,
      keepalive: config.client.keepalive,
      allowedIPs: config.client.allowedIPs,
      presharedKey: config.client.presharedKey,
    },
    log,
  });
  const engine = new WgCliEngine(config.interface.name, { timeoutMs: config.engine.timeoutMs, log });
  const controller = new ReconciliationController(engine, { log });
  const manager = new PeerManager(registry, controller, {
    onlineWindowSeconds: config.status.onlineWindowSeconds,
    log,
  });

  return { config, store, registry, controller, manager };
}

/**
 * Endpoint annoncé : option, configuration, détection, sinon substitut
 */
function resolveEndpoint(explicit: string | undefined, config: WgKeepConfig): string {
  const configured = explicit ?? config.server.endpoint;
  if (configured) return configured;

  const detected = discoverPublicAddress({ log: logger.createSimpleLogger('debug') });
  if (detected) {
    logger.debug(t('endpoint.detected', { ip: detected }));
    return detected;
  }

  warn(t('endpoint.placeholder', { placeholder: ENDPOINT_PLACEHOLDER }));
  return ENDPOINT_PLACEHOLDER;
}

/**
 * Exécute une commande et traduit les erreurs en code de sortie
 */
async function run(action: () => Promise<void> | void): Promise<void> {
  try {
    await action();
  } catch (error) {
    console.error(colorize(t('cli.error'), 'red'), errorMessage(error));
    if (error instanceof WgKeepError) {
      logger.debug(`${error.name} (${error.code})`);
      process.exit(error.exitCode);
    }
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    process.exit(1);
  }
}

// ============================================
// Commands
// ============================================

async function addPeerCommand(
  name: string,
  options: GlobalOptions & { output?: string; endpoint?: string }
): Promise<void> {
  // stdout porte la configuration client
  logger.setStderrOnly(true);
  const ctx = createContext(options);
  const endpoint = resolveEndpoint(options.endpoint, ctx.config);

  const result = await ctx.manager.addPeer(name, endpoint);
  const text = renderClientConfig(result.bundle);
  const addresses = result.peer.allowedIPs.map(formatPrefix).join(', ');

  reportLiveOutcome(result);

  if (options.output) {
    try {
      writeFileSync(options.output, text, { mode: 0o600 });
    } catch (error) {
      // Le peer est déjà écrit : la clé privée ne doit pas être perdue
      process.stdout.write(text);
      throw new IOError(options.output, error);
    }
  }

  if (options.json) {
    console.log(JSON.stringify({
      name: result.bundle.name,
      publicKey: result.bundle.publicKey,
      addresses: result.bundle.addresses.map(formatPrefix),
      endpoint: result.bundle.endpoint,
      output: options.output,
      applied: result.applied,
      liveError: result.liveError?.message,
      clientConfig: options.output ? undefined : text,
    }, null, 2));
    return;
  }

  console.error(colorize(t('peer.added', { name: result.bundle.name, addresses }), 'green'));
  if (options.output) {
    console.error(t('peer.written', { path: options.output }));
  } else {
    process.stdout.write(text);
  }
}

async function removePeerCommand(identifier: string, options: GlobalOptions): Promise<void> {
  const ctx = createContext(options);
  const result = await ctx.manager.removePeer(identifier);

  reportLiveOutcome(result);

  if (options.json) {
    console.log(JSON.stringify({
      name: result.peer.label,
      publicKey: result.peer.publicKey,
      applied: result.applied,
      liveError: result.liveError?.message,
    }, null, 2));
    return;
  }

  console.log(colorize(t('peer.removed', { name: result.peer.label ?? result.peer.publicKey }), 'green'));
}

async function listPeersCommand(options: GlobalOptions): Promise<void> {
  const ctx = createContext(options);
  const peers = await ctx.manager.status();

  if (options.json) {
    console.log(JSON.stringify(peers, null, 2));
    return;
  }

  if (peers.length === 0) {
    console.log(colorize(t('peer.none'), 'gray'));
    return;
  }

  console.log(colorize(t('peer.title', { iface: ctx.config.interface.name }), 'blue'));
  for (const peer of peers) {
    console.log(formatPeerLine(peer));
  }
}

function formatPeerLine(peer: PeerStatus): string {
  const state = peer.online
    ? colorize('●', 'green') + ' ' + t('peer.online')
    : colorize('○', 'red') + ' ' + t('peer.offline');
  const addresses = [peer.ipv4, peer.ipv6].filter(Boolean).join(', ');
  const handshake = peer.latestHandshake ? formatRelativeTime(peer.latestHandshake) : t('peer.never');
  const transfer = `↓${formatBytes(peer.transferRx)} ↑${formatBytes(peer.transferTx)}`;

  return `  ${state}  ${(peer.label ?? peer.publicKey.slice(0, 12) + '…').padEnd(20)} ${addresses.padEnd(30)} ` +
    colorize(`${handshake}  ${transfer}`, 'gray');
}

async function reconcileCommand(options: GlobalOptions): Promise<void> {
  const ctx = createContext(options);
  const diff = await ctx.manager.reconcile();

  if (options.json) {
    console.log(JSON.stringify(diff, null, 2));
  } else {
    console.log(t('reconcile.summary', {
      iface: ctx.config.interface.name,
      added: diff.added.length,
      removed: diff.removed.length,
      unchanged: diff.unchanged.length,
    }));
  }

  assertFullyApplied(diff, ctx.config.interface.name);
}

async function setPortCommand(port: string, options: GlobalOptions): Promise<void> {
  const ctx = createContext(options);
  if (!/^\d+$/.test(port)) {
    throw new InvalidArgumentError(t('error.invalidPort', { port }));
  }

  const result = await ctx.registry.setListenPort(Number(port));
  if (!result.changed) {
    console.log(t('port.unchanged', { port }));
    return;
  }

  console.log(colorize(t('port.changed', { previous: result.previous ?? '-', port }), 'green'));
  console.log(t('port.restart', { iface: ctx.config.interface.name }));
}

function configExampleCommand(): void {
  console.log(getExampleConfig());
}

// ============================================
// Main
// ============================================

initI18n(langFromArgv(process.argv.slice(2)));

const program = new Command();

program
  .name('wgkeep')
  .description(t('cli.description'))
  .version(VERSION, '-v, --version', t('cli.version'))
  .option('--lang <lang>', t('cli.lang'))
  .option('--verbose', t('cli.verbose'))
  .exitOverride((error: CommanderError) => {
    // Aide et version : succès ; arguments invalides : code 2
    const ok = error.code === 'commander.helpDisplayed' || error.code === 'commander.version' || error.exitCode === 0;
    process.exit(ok ? 0 : 2);
  })
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
      logger.setLevel('debug');
    }
  });

program
  .command('add-peer <name>')
  .description('Ajouter un peer et afficher sa configuration client')
  .option('-c, --config <path>', t('cli.config'), DEFAULT_CONFIG_PATH)
  .option('-o, --output <file>', 'Écrire la configuration client dans un fichier (mode 0600)')
  .option('--endpoint <host[:port]>', 'Endpoint annoncé au client')
  .option('-j, --json', t('cli.json'))
  .action((name: string, _options: unknown, command: Command) =>
    run(() => addPeerCommand(name, command.optsWithGlobals<GlobalOptions & { output?: string; endpoint?: string }>())));

program
  .command('remove-peer <name-or-key>')
  .description('Retirer un peer (nom ou clé publique)')
  .option('-c, --config <path>', t('cli.config'), DEFAULT_CONFIG_PATH)
  .option('-j, --json', t('cli.json'))
  .action((identifier: string, _options: unknown, command: Command) =>
    run(() => removePeerCommand(identifier, command.optsWithGlobals<GlobalOptions>())));

program
  .command('list-peers')
  .description('Lister les peers et leur état')
  .option('-c, --config <path>', t('cli.config'), DEFAULT_CONFIG_PATH)
  .option('-j, --json', t('cli.json'))
  .action((_options: unknown, command: Command) =>
    run(() => listPeersCommand(command.optsWithGlobals<GlobalOptions>())));

program
  .command('reconcile')
  .description('Appliquer la configuration écrite sur l\'interface active')
  .option('-c, --config <path>', t('cli.config'), DEFAULT_CONFIG_PATH)
  .option('-j, --json', t('cli.json'))
  .action((_options: unknown, command: Command) =>
    run(() => reconcileCommand(command.optsWithGlobals<GlobalOptions>())));

program
  .command('set-port <port>')
  .description('Changer le ListenPort de l\'interface')
  .option('-c, --config <path>', t('cli.config'), DEFAULT_CONFIG_PATH)
  .action((port: string, _options: unknown, command: Command) =>
    run(() => setPortCommand(port, command.optsWithGlobals<GlobalOptions>())));

program
  .command('config-example')
  .description('Afficher un exemple de configuration')
  .action(() => run(configExampleCommand));

program.parseAsync().catch((error: unknown) => {
  console.error(colorize(t('cli.error'), 'red'), t('error.unexpected', { error: errorMessage(error) }));
  process.exit(1);
});
