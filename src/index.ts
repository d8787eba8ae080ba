#!/usr/bin/env node

/**
 * Caption Server CLI
 *
 * Serves image captions from a finetuned vision-language model over HTTP.
 */

import fs from 'fs/promises';
import path from 'path';
import { Command } from 'commander';
import { config as dotenvConfig } from 'dotenv';
import { loadConfig, validateConfig, type Environment } from './config.js';
import { createLogger } from './logger.js';
import { StartupOrchestrator } from './startup.js';
import { Captioner } from './captioning/index.js';
import { ModelSourceResolver, createRemoteStore } from './resolver/index.js';
import { createApp, startServer } from './server/index.js';
import { errorMessage } from './errors.js';
import type { AppConfig, Logger } from './types.js';

// Load environment variables
dotenvConfig();

const VERSION = '0.3.0';

interface CommonOptions {
  verbose?: boolean;
}

/**
 * Load and validate configuration; exits on invalid settings
 */
function prepare(options: CommonOptions, overrides: Environment = {}): { config: AppConfig; logger: Logger } {
  const env: Environment = { ...process.env };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }

  const config = loadConfig(env);
  const logger = createLogger(options.verbose ? 'debug' : config.logging.level, config.logging.format);

  const errors = validateConfig(config, env);
  if (errors.length > 0) {
    logger.error('Invalid configuration', { errors });
    process.exit(1);
  }

  logger.debug('Configuration loaded', {
    modelFamily: config.model.modelFamily,
    localDir: config.model.localDir,
    remoteUri: config.model.remoteUri ?? '<unset>',
    allowFallback: config.model.allowFallback,
    port: config.server.port,
  });

  return { config, logger };
}

const program = new Command();

program
  .name('caption-server')
  .description('Image captioning API for a finetuned vision-language model')
  .version(VERSION);

// Serve command
program
  .command('serve', { isDefault: true })
  .description('Resolve and load the model, then serve POST /predict and /predict_batch')
  .option('-p, --port <port>', 'Listen port (overrides PORT)')
  .option('-H, --host <host>', 'Listen address (overrides HOST)')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (options: CommonOptions & { port?: string; host?: string }) => {
    const { config, logger } = prepare(options, { PORT: options.port, HOST: options.host });

    logger.info('Caption server starting...', {
      modelFamily: config.model.modelFamily,
      localDir: config.model.localDir,
    });

    const orchestrator = new StartupOrchestrator(config.model, logger);

    try {
      await orchestrator.run();
    } catch (error) {
      logger.error('Refusing to serve without a loaded captioner', {
        error: errorMessage(error),
      });
      process.exit(1);
    }

    try {
      const app = createApp({
        readiness: orchestrator,
        logger,
        maxUploadBytes: config.server.maxUploadBytes,
      });
      const server = await startServer(app, config.server, logger);

      // Handle graceful shutdown
      const shutdown = (): void => {
        logger.info('Shutting down...');
        server
          .close()
          .then(() => orchestrator.getCaptioner()?.dispose())
          .then(
            () => process.exit(0),
            (error: unknown) => {
              logger.error('Shutdown failed', { error: errorMessage(error) });
              process.exit(1);
            }
          );
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
    } catch (error) {
      logger.error('Server failed to start', { error: errorMessage(error) });
      process.exit(1);
    }
  });

// Resolve command
program
  .command('resolve')
  .description('Download (if GCS_MODEL_URI is set) and verify the model folder without loading it')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (options: CommonOptions) => {
    const { config, logger } = prepare(options);

    try {
      const store = config.model.remoteUri
        ? createRemoteStore(config.model.remoteUri, logger, config.model.downloadConcurrency)
        : null;
      const resolver = new ModelSourceResolver(config.model, store, logger);
      const source = await resolver.resolve();

      console.log(JSON.stringify(source, null, 2));
    } catch (error) {
      logger.error('Model resolution failed', { error: errorMessage(error) });
      process.exit(1);
    }
  });

// Caption command
program
  .command('caption <images...>')
  .description('Caption image files from disk, one JSON line per image')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (images: string[], options: CommonOptions) => {
    const { config, logger } = prepare(options);
    const orchestrator = new StartupOrchestrator(config.model, logger);

    try {
      const captioner = await orchestrator.run();
      const buffers = await Promise.all(images.map(image => fs.readFile(image)));
      const results = await captioner.captionBatch(buffers);

      for (const result of results) {
        const file = path.resolve(images[result.index] ?? '');
        console.log(JSON.stringify(
          result.ok
            ? { file, caption: result.caption }
            : { file, error: result.error }
        ));
      }

      await captioner.dispose();
      if (results.some(result => !result.ok)) {
        process.exitCode = 2;
      }
    } catch (error) {
      logger.error('Captioning failed', { error: errorMessage(error) });
      process.exit(1);
    }
  });

// List families command
program
  .command('families')
  .description('List available model families')
  .action(() => {
    console.log('\nAvailable model families:');
    for (const family of Captioner.listFamilies()) {
      console.log(`   ${family}`);
    }
  });

await program.parseAsync();
