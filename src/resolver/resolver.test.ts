import path from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { ResolutionError, ValidationError } from '../errors.js';
import { createSilentLogger } from '../logger.js';
import {
  FakeRemoteStore,
  VALID_MANIFEST,
  makeTempDir,
  modelConfig,
  removeDir,
  writeModelDir,
} from '../test-support/fixtures.js';
import { ModelSourceResolver } from './resolver.js';

const logger = createSilentLogger();

describe('ModelSourceResolver', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  test('uses a valid local folder without downloading', async () => {
    await writeModelDir(root);
    const store = new FakeRemoteStore({});
    const resolver = new ModelSourceResolver(modelConfig({ localDir: root }), store, logger);

    const source = await resolver.resolve();

    expect(store.downloads).toEqual([]);
    expect(source.kind).toBe('local');
    if (source.kind === 'local') {
      expect(source.directory).toBe(root);
      expect(source.manifest.modelType).toBe('blip');
    }
  });

  test('downloads the remote folder before validating it', async () => {
    const store = new FakeRemoteStore({
      'config.json': JSON.stringify(VALID_MANIFEST),
      'onnx/encoder_model.onnx': 'weights',
      'tokenizer.json': '{}',
    });
    const config = modelConfig({ localDir: root, remoteUri: 'gs://bucket/models/baseline' });
    const resolver = new ModelSourceResolver(config, store, logger);

    expect(await resolver.fetchRemote()).toEqual({
      downloaded: true,
      files: [
        path.join(root, 'config.json'),
        path.join(root, 'onnx/encoder_model.onnx'),
        path.join(root, 'tokenizer.json'),
      ],
    });
    expect(store.downloads).toEqual([{ uri: 'gs://bucket/models/baseline', localDir: root }]);

    const source = await resolver.validate();
    expect(source).toMatchObject({ kind: 'local', directory: root });
  });

  test('skips the download step when no remote URI is set', async () => {
    const resolver = new ModelSourceResolver(modelConfig({ localDir: root }), null, logger);
    expect(await resolver.fetchRemote()).toEqual({ downloaded: false, files: [] });
  });

  test('fails when a remote URI has no store', async () => {
    const config = modelConfig({ localDir: root, remoteUri: 'gs://bucket/model' });
    const resolver = new ModelSourceResolver(config, null, logger);

    await expect(resolver.fetchRemote()).rejects.toThrow('No remote store available for gs://bucket/model');
  });

  test('a download failure is fatal even when fallback is allowed', async () => {
    const store = new FakeRemoteStore({}, new Error('permission denied'));
    const config = modelConfig({
      localDir: root,
      remoteUri: 'gs://bucket/model',
      allowFallback: true,
    });
    const resolver = new ModelSourceResolver(config, store, logger);

    const failure = resolver.resolve();
    await expect(failure).rejects.toBeInstanceOf(ResolutionError);
    await expect(failure).rejects.toThrow('Download from gs://bucket/model failed: permission denied');
  });

  test('rejects a folder without a manifest when fallback is disabled', async () => {
    await writeModelDir(root, null);
    const resolver = new ModelSourceResolver(modelConfig({ localDir: root }), null, logger);

    const failure = resolver.validate();
    await expect(failure).rejects.toBeInstanceOf(ValidationError);
    await expect(failure).rejects.toThrow(`Not a valid model folder: missing config.json in ${root}`);
  });

  test('falls back to the hosted model when allowed', async () => {
    await writeModelDir(root, '{ not json');
    const config = modelConfig({
      localDir: root,
      allowFallback: true,
      fallbackId: 'org/hosted-captioner',
    });
    const resolver = new ModelSourceResolver(config, null, logger);

    expect(await resolver.resolve()).toEqual({ kind: 'hosted', id: 'org/hosted-captioner' });
  });

  test('does not fall back without a fallback identifier', async () => {
    const config = modelConfig({
      localDir: path.join(root, 'missing'),
      allowFallback: true,
      fallbackId: undefined,
    });
    const resolver = new ModelSourceResolver(config, null, logger);

    await expect(resolver.resolve()).rejects.toBeInstanceOf(ValidationError);
  });
});
