/**
 * Core type definitions for the caption server
 */

/** Startup state machine states, in the order they are entered */
export const STARTUP_STATES = [
  'INITIALIZING',
  'RESOLVING_MODEL',
  'VALIDATING',
  'LOADING_CAPTIONER',
  'READY',
  'FAILED',
] as const;

export type StartupState = typeof STARTUP_STATES[number];

/** Inference device passed to the model runtime */
export type InferenceDevice = 'auto' | 'cpu' | 'cuda';

/** Console log output style */
export type LogFormat = 'pretty' | 'json';

/** Beam-search decoding parameters; sampling is always off */
export interface DecodingParams {
  /** Beam width */
  readonly beamSize: number;
  /** Maximum number of generated tokens */
  readonly maxNewTokens: number;
}

/** Where model weights come from and how they are decoded */
export interface ModelSourceConfig {
  /** Captioner family name (registry key or alias) */
  readonly modelFamily: string;
  /** Directory expected to hold or receive the model folder */
  readonly localDir: string;
  /** Optional remote source, e.g. gs://bucket/models/baseline */
  readonly remoteUri?: string;
  /** Hosted model identifier used when fallback is allowed */
  readonly fallbackId?: string;
  /** Whether the hosted fallback may replace a missing local model */
  readonly allowFallback: boolean;
  readonly decoding: DecodingParams;
  readonly device: InferenceDevice;
  /** Parallel object downloads from the remote source */
  readonly downloadConcurrency: number;
}

/** HTTP listener configuration */
export interface ServerConfig {
  readonly host: string;
  readonly port: number;
  /** Largest accepted request body in bytes */
  readonly maxUploadBytes: number;
}

export interface LoggingConfig {
  readonly level: string;
  readonly format: LogFormat;
}

/** Full application configuration */
export interface AppConfig {
  readonly model: ModelSourceConfig;
  readonly server: ServerConfig;
  readonly logging: LoggingConfig;
}

/** Artifacts found next to the manifest */
export interface ModelArtifacts {
  /** Weight files (relative paths) */
  weights: string[];
  /** Tokenizer files (relative paths) */
  tokenizer: string[];
  /** Image preprocessor configuration files (relative paths) */
  preprocessor: string[];
}

/** Parsed model manifest (config.json) */
export interface ModelManifest {
  /** Absolute path of the manifest file */
  path: string;
  /** Declared model_type, if any */
  modelType?: string;
  /** Declared architectures (possibly empty) */
  architectures: string[];
  artifacts: ModelArtifacts;
}

/** A model folder on local disk that passed manifest validation */
export interface LocalModelSource {
  kind: 'local';
  directory: string;
  manifest: ModelManifest;
}

/** A well-known hosted model identifier */
export interface HostedModelSource {
  kind: 'hosted';
  id: string;
}

/** The resolved origin of the weights the captioner loads */
export type ModelSource = LocalModelSource | HostedModelSource;

/** Decoded image pixels, interleaved per channel */
export interface DecodedImage {
  data: Uint8ClampedArray;
  width: number;
  height: number;
  channels: 1 | 2 | 3 | 4;
}

/** Caption for one input of a batch */
export interface CaptionResult {
  ok: true;
  /** Position of the input in the batch */
  index: number;
  caption: string;
}

/** An input of a batch that could not be captioned */
export interface CaptionFailure {
  ok: false;
  /** Position of the input in the batch */
  index: number;
  error: {
    code: string;
    message: string;
  };
}

export type BatchItemResult = CaptionResult | CaptionFailure;

/** Logger interface for dependency injection */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}
