/**
 * Model source resolution: decide where the weights come from
 */

import { ResolutionError, ValidationError, errorMessage } from '../errors.js';
import type { Logger, ModelSource, ModelSourceConfig } from '../types.js';
import { findModelDirectory, readManifest } from './manifest.js';
import type { RemoteModelStore } from './remote-store.js';

/**
 * Result of the download step
 */
export interface FetchOutcome {
  /** Whether a remote source was configured and copied */
  downloaded: boolean;
  /** Local files written by the download */
  files: string[];
}

/**
 * Resolves a ModelSourceConfig into a loadable ModelSource.
 *
 * The two steps run strictly in order: `fetchRemote` populates the local
 * directory when a remote URI is configured, then `validate` checks the
 * folder and applies the hosted fallback if, and only if, it is allowed.
 */
export class ModelSourceResolver {
  private config: ModelSourceConfig;
  private store: RemoteModelStore | null;
  private logger: Logger;

  constructor(config: ModelSourceConfig, store: RemoteModelStore | null, logger: Logger) {
    this.config = config;
    this.store = store;
    this.logger = logger;
  }

  /**
   * Download the remote source into the local directory, if one is set
   */
  async fetchRemote(): Promise<FetchOutcome> {
    const { remoteUri, localDir } = this.config;

    if (!remoteUri) {
      this.logger.info('GCS_MODEL_URI not set, skipping download (local mode)', { localDir });
      return { downloaded: false, files: [] };
    }

    if (!this.store) {
      throw new ResolutionError(`No remote store available for ${remoteUri}`);
    }

    this.logger.info(`Downloading model from ${remoteUri}`, { localDir });

    try {
      const files = await this.store.download(remoteUri, localDir);
      this.logger.info('Model download finished', { files: files.length });
      return { downloaded: true, files };
    } catch (error) {
      if (error instanceof ResolutionError) {
        throw error;
      }
      throw new ResolutionError(`Download from ${remoteUri} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Validate the local model folder, falling back to the hosted model
   * identifier only when the configuration allows it
   */
  async validate(): Promise<ModelSource> {
    const { localDir, allowFallback, fallbackId } = this.config;

    let problem: ValidationError;
    const lookup = await findModelDirectory(localDir);

    if (lookup.found) {
      try {
        const manifest = await readManifest(lookup.directory);
        this.logInventory(lookup.directory, manifest.artifacts);
        this.logger.info(`Local model OK: ${manifest.path}`, {
          modelType: manifest.modelType,
          architectures: manifest.architectures,
        });
        return { kind: 'local', directory: lookup.directory, manifest };
      } catch (error) {
        if (!(error instanceof ValidationError)) {
          throw error;
        }
        problem = error;
      }
    } else {
      problem = new ValidationError(`Not a valid model folder: ${lookup.reason}`);
    }

    if (allowFallback && fallbackId) {
      this.logger.warn(`No usable local model; using hosted fallback ${fallbackId}`, {
        reason: problem.message,
      });
      return { kind: 'hosted', id: fallbackId };
    }

    this.logger.error('Model validation failed and hosted fallback is disabled', {
      reason: problem.message,
    });
    throw problem;
  }

  /**
   * Run both steps
   */
  async resolve(): Promise<ModelSource> {
    await this.fetchRemote();
    return this.validate();
  }

  private logInventory(directory: string, artifacts: { weights: string[]; tokenizer: string[] }): void {
    if (artifacts.weights.length === 0) {
      this.logger.warn(`No weight files found in ${directory}`);
    }
    if (artifacts.tokenizer.length === 0) {
      this.logger.warn(`No tokenizer files found in ${directory}`);
    }
    this.logger.debug('Model artifacts', { directory, ...artifacts });
  }
}
