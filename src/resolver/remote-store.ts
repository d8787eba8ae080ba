/**
 * Remote model stores: copy a model folder from object storage to disk
 */

import fs from 'fs/promises';
import path from 'path';
import PQueue from 'p-queue';
import { Storage } from '@google-cloud/storage';
import { ResolutionError, errorMessage } from '../errors.js';
import type { Logger } from '../types.js';

/**
 * A source of model folders addressed by URI
 */
export interface RemoteModelStore {
  /** URI scheme handled by this store, e.g. `gs` */
  readonly scheme: string;
  /**
   * Download everything under `uri` into `localDir`, overwriting existing
   * files. Resolves with the local paths written.
   */
  download(uri: string, localDir: string): Promise<string[]>;
}

export interface GcsLocation {
  bucket: string;
  /** Object prefix, empty for the whole bucket, otherwise ending in `/` */
  prefix: string;
}

/**
 * Parse `gs://bucket/path/to/folder` into bucket and folder prefix
 */
export function parseGcsUri(uri: string): GcsLocation {
  const match = /^gs:\/\/([^/]+)\/?(.*)$/.exec(uri.trim());
  if (!match || !match[1]) {
    throw new ResolutionError(`Not a gs:// URI: ${uri}`);
  }

  const folder = (match[2] ?? '').replace(/^\/+|\/+$/g, '');
  return {
    bucket: match[1],
    prefix: folder ? `${folder}/` : '',
  };
}

/**
 * Local destination of an object, or null for folder placeholders.
 * Throws when the object key would land outside `localDir`.
 */
export function objectTargetPath(prefix: string, objectName: string, localDir: string): string | null {
  const relative = objectName.slice(prefix.length).replace(/^\/+/, '');
  if (!relative || relative.endsWith('/')) {
    return null;
  }

  const root = path.resolve(localDir);
  const target = path.resolve(root, relative);
  if (!target.startsWith(root + path.sep)) {
    throw new ResolutionError(`Object ${objectName} resolves outside ${root}`);
  }
  return target;
}

/** The parts of a storage object the store uses */
export interface StoredObject {
  name: string;
  download(options: { destination: string }): Promise<unknown>;
}

/**
 * The parts of the Cloud Storage client the store uses; `Storage` from
 * @google-cloud/storage satisfies it
 */
export interface GcsClient {
  bucket(name: string): {
    getFiles(query: { prefix: string }): Promise<[StoredObject[], ...unknown[]]>;
  };
}

/**
 * Google Cloud Storage model store.
 *
 * Credentials are whatever the client library discovers in the
 * environment (GOOGLE_APPLICATION_CREDENTIALS, metadata server); this
 * class never asks for or stores any.
 */
export class GcsModelStore implements RemoteModelStore {
  readonly scheme = 'gs';
  private storage: GcsClient;
  private concurrency: number;
  private logger: Logger;

  constructor(logger: Logger, concurrency: number = 4, storage: GcsClient = new Storage()) {
    this.logger = logger;
    this.concurrency = concurrency;
    this.storage = storage;
  }

  async download(uri: string, localDir: string): Promise<string[]> {
    const { bucket, prefix } = parseGcsUri(uri);

    const [files] = await this.storage
      .bucket(bucket)
      .getFiles({ prefix })
      .catch((error: unknown) => {
        throw new ResolutionError(`Cannot list ${uri}: ${errorMessage(error)}`, { cause: error });
      });

    const targets = files.flatMap(file => {
      const target = objectTargetPath(prefix, file.name, localDir);
      return target ? [{ file, target }] : [];
    });

    if (targets.length === 0) {
      throw new ResolutionError(`No objects found under ${uri}`);
    }

    await fs.mkdir(localDir, { recursive: true });
    this.logger.info(`Downloading ${targets.length} objects from ${uri}`, {
      localDir,
      concurrency: this.concurrency,
    });

    const queue = new PQueue({ concurrency: this.concurrency });
    const written: string[] = [];

    try {
      await Promise.all(
        targets.map(({ file, target }) =>
          queue.add(async () => {
            await fs.mkdir(path.dirname(target), { recursive: true });
            this.logger.debug(`Downloading gs://${bucket}/${file.name} -> ${target}`);
            await file.download({ destination: target });
            written.push(target);
          })
        )
      );
    } catch (error) {
      // drop what has not started, then wait out the downloads in flight
      queue.clear();
      await queue.onIdle();
      throw new ResolutionError(`Download from ${uri} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    this.logger.info(`Downloaded ${written.length} objects from ${uri}`);
    return written.sort();
  }
}

/**
 * Pick the store for a remote URI
 */
export function createRemoteStore(uri: string, logger: Logger, concurrency: number): RemoteModelStore {
  if (uri.startsWith('gs://')) {
    return new GcsModelStore(logger, concurrency);
  }
  throw new ResolutionError(`Unsupported remote model URI: ${uri}`);
}
