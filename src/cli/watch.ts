import { Command } from 'commander';
import { createUnitBus } from '../lib/bus/client';
import { getConfig, type AppConfig } from '../lib/config';
import { getDefaultIgnoreFile } from '../lib/dirs';
import { errorMessage } from '../lib/errors';
import type { UnitBus } from '../lib/interfaces';
import { logger } from '../lib/logger';
import { createNotifier } from '../lib/notify';
import type { Notifier } from '../lib/notify/types';
import { VERSION } from '../lib/version';
import { loadIgnoreList } from '../lib/watcher/ignore';
import { buildFailureRules } from '../lib/watcher/state';
import { FailureWatcher } from '../lib/watcher/watcher';
import { EXIT_FAILURE, EXIT_OK, processIO, reportError, type CliIO } from './io';

export const STOP_SIGNALS: readonly NodeJS.Signals[] = ['SIGHUP', 'SIGINT', 'SIGQUIT', 'SIGTERM'];
export const RELOAD_SIGNAL: NodeJS.Signals = 'SIGUSR1';

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface WatchDeps extends CliIO {
  openBus?: (config: AppConfig) => UnitBus;
  loadConfig?: () => Promise<AppConfig>;
  makeNotifier?: (config: AppConfig) => Notifier;
  signals?: SignalSource;
  /** Called once the subscription is live and signal handlers are installed. */
  onReady?: () => void;
}

function buildProgram(io: CliIO): Command {
  return new Command('unitscope-watch')
    .description(
      'Watch systemd units and send a notification when one enters a failed state.\n' +
        'The bus scope comes from the config file or UNITSCOPE_SCOPE; SIGUSR1 reloads the ignore file.',
    )
    .version(VERSION, '-V, --version')
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: text => io.stdout.write(text),
      writeErr: text => io.stderr.write(text),
    });
}

/** Runs the watcher until a stop signal arrives or the bus connection is lost. */
export async function runWatch(argv: readonly string[], deps: WatchDeps = processIO()): Promise<number> {
  const {
    openBus = createUnitBus,
    loadConfig = getConfig,
    makeNotifier = (config: AppConfig) => createNotifier(config),
    signals = process,
  } = deps;

  let config: AppConfig;
  let notifier: Notifier;
  try {
    buildProgram(deps).parse([...argv], { from: 'user' });
    config = await loadConfig();
    if (config.logLevel && !process.env.LOG_LEVEL) logger.setLogLevel(config.logLevel);
    notifier = makeNotifier(config);
  } catch (error) {
    return reportError(error, deps);
  }

  const ignoreFile = config.watcher.ignoreFile ?? getDefaultIgnoreFile();
  let bus: UnitBus | null = null;
  let stopping = false;
  const handlers = new Map<NodeJS.Signals, (signal: NodeJS.Signals) => void>();

  try {
    const ignore = await loadIgnoreList(config.watcher.ignore, ignoreFile);
    const openedBus = openBus(config);
    bus = openedBus;
    const watcher = new FailureWatcher(openedBus, notifier, {
      rules: buildFailureRules(config.watcher.failureRules),
      ignore,
      notifyTimeoutMs: config.watcher.notifyTimeoutMs,
      urgency: config.notifications.desktop.urgency,
    });

    const subscription = await openedBus.subscribeUnitChanges();

    const stop = (signal: NodeJS.Signals) => {
      if (stopping) return;
      stopping = true;
      logger.info('Watcher', `${signal}, exiting...`);
      subscription.close().catch(error => {
        logger.error('Watcher', `Failed to close the subscription: ${errorMessage(error)}`);
      });
    };
    const reload = () => {
      loadIgnoreList(config.watcher.ignore, ignoreFile)
        .then(list => watcher.setIgnoreList(list))
        .catch(error => logger.error('Watcher', `Keeping the previous ignore list: ${errorMessage(error)}`));
    };

    for (const signal of STOP_SIGNALS) handlers.set(signal, stop);
    handlers.set(RELOAD_SIGNAL, reload);
    handlers.forEach((handler, signal) => signals.on(signal, handler));

    logger.info('Watcher', `Watching ${config.scope} units for failures`);
    deps.onReady?.();

    await watcher.run(subscription);
    if (!stopping) {
      deps.stderr.write('The unit change subscription ended unexpectedly\n');
      return EXIT_FAILURE;
    }
    return EXIT_OK;
  } catch (error) {
    if (stopping) return EXIT_OK;
    return reportError(error, deps);
  } finally {
    handlers.forEach((handler, signal) => signals.off(signal, handler));
    if (bus) {
      await bus.close().catch(error => logger.debug('Watcher', `Closing the bus failed: ${errorMessage(error)}`));
    }
  }
}
