#!/usr/bin/env tsx
// Initialize environment FIRST (before any other imports that might read process.env)
import { envResult } from './load-env.js';
import { loadIngestSettings, type IngestSettings } from '@objledger/config';
import pino, { type Logger } from 'pino';
import { resolve } from 'path';
import { isIngestError, safeErrorMessage } from '@objledger/core';
import { DocumentWatcher, createIngestContext, prepareRoot, scanOnce, type IngestContext } from '@objledger/ingest';
import { missingMandatoryTools, probeTools } from '@objledger/tools';
import { USAGE, parseCliArgs, type CliOptions } from './cli-args.js';

function createLogger(settings: Pick<IngestSettings, 'logLevel' | 'logPretty'>): Logger {
  if (!settings.logPretty) {
    return pino({ level: settings.logLevel, name: 'objledger' });
  }
  return pino({
    level: settings.logLevel,
    name: 'objledger',
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  });
}

/**
 * CLI flags take precedence over the environment
 */
function applyOptions(settings: IngestSettings, options: CliOptions): IngestSettings {
  return {
    ...settings,
    rootDir: options.rootDir ? resolve(options.rootDir) : settings.rootDir,
    pollSeconds: options.pollSeconds ?? settings.pollSeconds,
    watchPolling: options.pollSeconds !== undefined ? true : settings.watchPolling,
  };
}

/**
 * Watch until SIGINT/SIGTERM (exit code 0) or a fatal error (1)
 */
function monitor(context: IngestContext, settings: IngestSettings, logger: Logger): Promise<number> {
  return new Promise((resolveExit) => {
    let stopping = false;

    const watcher = new DocumentWatcher(
      context.layout.inputDir,
      (path) => context.coordinator.processDocument(path),
      (error) => {
        logger.fatal({ event: 'ingest.watch.fatal', error: safeErrorMessage(error) }, 'Stopping after a fatal error');
        stop(1);
      },
      {
        debounceMs: settings.watchDebounceMs,
        usePolling: settings.watchPolling,
        pollIntervalMs: settings.pollSeconds * 1000,
      }
    );

    function stop(code: number): void {
      if (stopping) return;
      stopping = true;
      watcher.dispose().then(
        () => resolveExit(code),
        (err: unknown) => {
          logger.error({ event: 'ingest.watch.close_failed', error: safeErrorMessage(err) }, 'Error during shutdown');
          resolveExit(1);
        }
      );
    }

    const shutdown = (signal: NodeJS.Signals) => {
      logger.info({ event: 'ingest.shutdown', signal }, 'Shutting down; finishing the current document...');
      stop(0);
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    watcher.start().catch((err: unknown) => {
      logger.fatal({ event: 'ingest.watch.start_failed', error: safeErrorMessage(err) }, 'Failed to start watcher');
      stop(1);
    });
  });
}

async function main(): Promise<number> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    process.stderr.write(`${parsed.error}\n\n${USAGE}`);
    return 1;
  }
  if (parsed.options.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  const settings = applyOptions(loadIngestSettings(), parsed.options);
  const logger = createLogger(settings);

  const { envFilePath, loaded, keysLoaded } = envResult;
  logger.debug(
    { event: 'env.loaded', envFilePath, loaded, keysLoaded: keysLoaded.length },
    loaded ? `.env loaded from ${envFilePath}` : 'No .env file; using environment and defaults'
  );

  const availability = await probeTools(settings.tools);
  const missing = missingMandatoryTools(availability);
  if (missing.length > 0) {
    logger.fatal(
      { event: 'tools.mandatory_missing', tools: missing.map((name) => settings.tools[name]) },
      `Required tool not found: ${missing.map((name) => settings.tools[name]).join(', ')} (install mupdf-tools)`
    );
    return 1;
  }

  const context = createIngestContext(settings);
  await prepareRoot(context);

  logger.info(
    { event: 'ingest.started', rootDir: context.layout.rootDir, monitor: parsed.options.monitor, tools: availability },
    `Ingesting ${context.layout.inputDir}`
  );
  await scanOnce(context.coordinator, context.layout.inputDir);

  if (!parsed.options.monitor) {
    return 0;
  }
  return monitor(context, settings, logger);
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    const logger = pino({ level: process.env.LOG_LEVEL || 'info', name: 'objledger' });
    logger.fatal(
      { event: 'ingest.fatal', kind: isIngestError(err) ? err.kind : undefined, error: safeErrorMessage(err) },
      'Fatal error; stopping'
    );
    process.exit(1);
  }
);
