/**
 * Model source resolution exports
 */

export { ModelSourceResolver, type FetchOutcome } from './resolver.js';
export {
  MANIFEST_FILENAME,
  findModelDirectory,
  listArtifacts,
  readManifest,
  type ModelDirectoryLookup,
} from './manifest.js';
export {
  GcsModelStore,
  createRemoteStore,
  objectTargetPath,
  parseGcsUri,
  type GcsClient,
  type GcsLocation,
  type StoredObject,
  type RemoteModelStore,
} from './remote-store.js';
