import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { ResolutionError } from '../errors.js';
import { createSilentLogger } from '../logger.js';
import { makeTempDir, removeDir } from '../test-support/fixtures.js';
import {
  GcsModelStore,
  createRemoteStore,
  objectTargetPath,
  parseGcsUri,
  type GcsClient,
  type StoredObject,
} from './remote-store.js';

interface FakeObject {
  name: string;
  content?: string;
  error?: Error;
  delayMs?: number;
}

function storedObject(spec: FakeObject): StoredObject {
  return {
    name: spec.name,
    download: async ({ destination }) => {
      if (spec.delayMs) {
        await new Promise<void>(resolve => setTimeout(resolve, spec.delayMs));
      }
      if (spec.error) {
        throw spec.error;
      }
      await fs.writeFile(destination, spec.content ?? '');
    },
  };
}

/**
 * In-memory bucket listing
 */
class FakeGcsClient implements GcsClient {
  buckets: string[] = [];
  prefixes: string[] = [];
  private objects: FakeObject[];
  private listError: Error | null;

  constructor(objects: FakeObject[], listError: Error | null = null) {
    this.objects = objects;
    this.listError = listError;
  }

  bucket(name: string) {
    this.buckets.push(name);
    return {
      getFiles: async (query: { prefix: string }): Promise<[StoredObject[]]> => {
        this.prefixes.push(query.prefix);
        if (this.listError) {
          throw this.listError;
        }
        return [
          this.objects
            .filter(object => object.name.startsWith(query.prefix))
            .map(storedObject),
        ];
      },
    };
  }
}

describe('parseGcsUri', () => {
  test('splits bucket and folder prefix', () => {
    expect(parseGcsUri('gs://bucket/models/baseline')).toEqual({
      bucket: 'bucket',
      prefix: 'models/baseline/',
    });
  });

  test('normalizes trailing slashes', () => {
    expect(parseGcsUri('gs://bucket/models/baseline//')).toEqual({
      bucket: 'bucket',
      prefix: 'models/baseline/',
    });
  });

  test('allows a whole bucket', () => {
    expect(parseGcsUri('gs://bucket')).toEqual({ bucket: 'bucket', prefix: '' });
  });

  test('rejects other schemes', () => {
    expect(() => parseGcsUri('s3://bucket/model')).toThrow(ResolutionError);
    expect(() => parseGcsUri('gs://')).toThrow('Not a gs:// URI: gs://');
  });
});

describe('objectTargetPath', () => {
  const localDir = path.resolve('/tmp/models');

  test('maps objects below the prefix into the local directory', () => {
    expect(objectTargetPath('models/baseline/', 'models/baseline/onnx/encoder_model.onnx', localDir)).toBe(
      path.join(localDir, 'onnx', 'encoder_model.onnx')
    );
  });

  test('skips folder placeholders', () => {
    expect(objectTargetPath('models/baseline/', 'models/baseline/', localDir)).toBeNull();
    expect(objectTargetPath('models/baseline/', 'models/baseline/onnx/', localDir)).toBeNull();
  });

  test('refuses keys that escape the local directory', () => {
    expect(() => objectTargetPath('models/', 'models/../../etc/passwd', localDir)).toThrow(
      `Object models/../../etc/passwd resolves outside ${localDir}`
    );
  });
});

describe('createRemoteStore', () => {
  test('returns a GCS store for gs:// URIs', () => {
    const store = createRemoteStore('gs://bucket/model', createSilentLogger(), 2);
    expect(store).toBeInstanceOf(GcsModelStore);
    expect(store.scheme).toBe('gs');
  });

  test('rejects unsupported schemes', () => {
    expect(() => createRemoteStore('https://example.com/model', createSilentLogger(), 2)).toThrow(
      'Unsupported remote model URI: https://example.com/model'
    );
  });
});

describe('GcsModelStore', () => {
  const uri = 'gs://ml-bucket/models/baseline';
  const logger = createSilentLogger();
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  test('downloads every object under the prefix and skips folder placeholders', async () => {
    const client = new FakeGcsClient([
      { name: 'models/baseline/' },
      { name: 'models/baseline/tokenizer.json', content: 'tok' },
      { name: 'models/baseline/onnx/' },
      { name: 'models/baseline/onnx/encoder_model.onnx', content: 'weights' },
      { name: 'models/baseline/config.json', content: '{}' },
      { name: 'models/other/config.json', content: '{}' },
    ]);
    const localDir = path.join(root, 'model');
    const store = new GcsModelStore(logger, 2, client);

    const written = await store.download(uri, localDir);

    expect(written).toEqual([
      path.join(localDir, 'config.json'),
      path.join(localDir, 'onnx', 'encoder_model.onnx'),
      path.join(localDir, 'tokenizer.json'),
    ]);
    expect(client.buckets).toEqual(['ml-bucket']);
    expect(client.prefixes).toEqual(['models/baseline/']);
    expect(await fs.readFile(path.join(localDir, 'tokenizer.json'), 'utf-8')).toBe('tok');
    expect(await fs.readFile(path.join(localDir, 'onnx', 'encoder_model.onnx'), 'utf-8')).toBe('weights');
  });

  test('turns a listing failure into a ResolutionError', async () => {
    const store = new GcsModelStore(logger, 2, new FakeGcsClient([], new Error('forbidden')));

    const failure = store.download(uri, root);
    await expect(failure).rejects.toBeInstanceOf(ResolutionError);
    await expect(failure).rejects.toThrow(`Cannot list ${uri}: forbidden`);
  });

  test('fails when the prefix holds no objects', async () => {
    const store = new GcsModelStore(logger, 2, new FakeGcsClient([{ name: 'models/baseline/' }]));

    await expect(store.download(uri, root)).rejects.toThrow(`No objects found under ${uri}`);
  });

  test('one failed object fails the whole download after in-flight ones settle', async () => {
    const client = new FakeGcsClient([
      { name: 'models/baseline/config.json', error: new Error('disk full') },
      { name: 'models/baseline/model.onnx', content: 'weights', delayMs: 30 },
    ]);
    const store = new GcsModelStore(logger, 2, client);

    const failure = store.download(uri, root);
    await expect(failure).rejects.toBeInstanceOf(ResolutionError);
    await expect(failure).rejects.toThrow(`Download from ${uri} failed: disk full`);

    // nothing is still writing into the directory once the call has failed
    expect(await fs.readFile(path.join(root, 'model.onnx'), 'utf-8')).toBe('weights');
  });
});
