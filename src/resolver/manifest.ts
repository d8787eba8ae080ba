/**
 * Model folder discovery and manifest validation
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { ModelArtifacts, ModelManifest } from '../types.js';

/** The file that marks a directory as a loadable model folder */
export const MANIFEST_FILENAME = 'config.json';

const WEIGHT_FILE = /\.(onnx|onnx_data|safetensors|bin|pt|pth)$/;

const TOKENIZER_FILES = new Set([
  'tokenizer.json',
  'tokenizer_config.json',
  'special_tokens_map.json',
  'vocab.txt',
  'vocab.json',
  'merges.txt',
  'spiece.model',
]);

const PREPROCESSOR_FILES = new Set([
  'preprocessor_config.json',
  'processor_config.json',
]);

/**
 * Minimal schema of a pretrained model config. Unknown keys are kept;
 * the config must at least say what kind of model it describes.
 */
const manifestSchema = z
  .object({
    model_type: z.string().min(1).optional(),
    architectures: z.array(z.string()).optional(),
  })
  .passthrough()
  .refine(
    config => config.model_type !== undefined || (config.architectures?.length ?? 0) > 0,
    { message: 'must declare "model_type" or a non-empty "architectures" list' }
  );

/**
 * Outcome of looking for a model folder under a directory
 */
export type ModelDirectoryLookup =
  | { found: true; directory: string }
  | { found: false; reason: string };

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isFile();
  } catch {
    return false;
  }
}

/**
 * Locate the model folder.
 *
 * `localDir` itself wins when it holds a manifest. Otherwise exactly one
 * direct child holding a manifest is accepted; several are ambiguous.
 */
export async function findModelDirectory(localDir: string): Promise<ModelDirectoryLookup> {
  const root = path.resolve(localDir);

  if (!(await isDirectory(root))) {
    return { found: false, reason: `model directory does not exist: ${root}` };
  }

  if (await isFile(path.join(root, MANIFEST_FILENAME))) {
    return { found: true, directory: root };
  }

  const entries = await fs.readdir(root, { withFileTypes: true });
  const candidates: string[] = [];

  for (const entry of entries) {
    if (!entry.isDirectory()) {
      continue;
    }
    const child = path.join(root, entry.name);
    if (await isFile(path.join(child, MANIFEST_FILENAME))) {
      candidates.push(child);
    }
  }

  if (candidates.length === 1 && candidates[0] !== undefined) {
    return { found: true, directory: candidates[0] };
  }

  if (candidates.length > 1) {
    return {
      found: false,
      reason: `several model folders in ${root} (${candidates
        .map(candidate => path.basename(candidate))
        .sort()
        .join(', ')}); point LOCAL_MODEL_DIR at one of them`,
    };
  }

  return { found: false, reason: `missing ${MANIFEST_FILENAME} in ${root}` };
}

/**
 * Sort the files of a model folder into weights, tokenizer and
 * preprocessor artifacts. Paths are relative with forward slashes.
 */
export async function listArtifacts(directory: string): Promise<ModelArtifacts> {
  const files = await fs.readdir(directory, { recursive: true, withFileTypes: true });
  const artifacts: ModelArtifacts = { weights: [], tokenizer: [], preprocessor: [] };

  for (const file of files) {
    if (!file.isFile()) {
      continue;
    }
    const relative = path
      .relative(directory, path.join(file.parentPath ?? file.path, file.name))
      .split(path.sep)
      .join('/');

    if (WEIGHT_FILE.test(file.name)) {
      artifacts.weights.push(relative);
    } else if (TOKENIZER_FILES.has(file.name)) {
      artifacts.tokenizer.push(relative);
    } else if (PREPROCESSOR_FILES.has(file.name)) {
      artifacts.preprocessor.push(relative);
    }
  }

  artifacts.weights.sort();
  artifacts.tokenizer.sort();
  artifacts.preprocessor.sort();
  return artifacts;
}

/**
 * Read and validate the manifest of a model folder
 */
export async function readManifest(directory: string): Promise<ModelManifest> {
  const manifestPath = path.join(directory, MANIFEST_FILENAME);

  let raw: string;
  try {
    raw = await fs.readFile(manifestPath, 'utf-8');
  } catch (error) {
    throw new ValidationError(`Cannot read ${manifestPath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`Malformed ${MANIFEST_FILENAME} in ${directory}: not valid JSON`, {
      cause: error,
    });
  }

  const result = manifestSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`Malformed ${MANIFEST_FILENAME} in ${directory}: ${issues}`);
  }

  return {
    path: manifestPath,
    modelType: result.data.model_type,
    architectures: result.data.architectures ?? [],
    artifacts: await listArtifacts(directory),
  };
}
