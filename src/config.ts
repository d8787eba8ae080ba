/**
 * Configuration loading and defaults
 *
 * Everything comes from environment variables. The result is frozen: the
 * rest of the process treats configuration as read-only.
 */

import type {
  AppConfig,
  InferenceDevice,
  LogFormat,
  ModelSourceConfig,
  ServerConfig,
  LoggingConfig,
} from './types.js';

export type Environment = Record<string, string | undefined>;

/**
 * Default model source configuration
 */
export const DEFAULT_MODEL_CONFIG: ModelSourceConfig = {
  modelFamily: 'blip',
  localDir: 'models',
  remoteUri: undefined,
  fallbackId: 'Xenova/vit-gpt2-image-captioning',
  allowFallback: false,
  decoding: {
    beamSize: 3,
    maxNewTokens: 80,
  },
  device: 'auto',
  downloadConcurrency: 4,
};

/**
 * Default HTTP configuration
 */
export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  host: '0.0.0.0',
  port: 8080,
  maxUploadBytes: 20 * 1024 * 1024, // 20MB
};

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  level: 'info',
  format: 'pretty',
};

const DEVICES: readonly InferenceDevice[] = ['auto', 'cpu', 'cuda'];
const LOG_FORMATS: readonly LogFormat[] = ['pretty', 'json'];
const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

/**
 * Read a variable, treating blank values as unset
 */
function readVar(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Parse an integer variable. Non-numeric input yields NaN so that
 * validateConfig reports it instead of silently using the default.
 */
function readInt(env: Environment, name: string, fallback: number): number {
  const value = readVar(env, name);
  if (value === undefined) {
    return fallback;
  }
  return /^-?\d+$/.test(value) ? parseInt(value, 10) : NaN;
}

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function isDevice(value: string): value is InferenceDevice {
  return DEVICES.some(device => device === value);
}

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some(format => format === value);
}

/**
 * Load configuration from the environment.
 *
 * Loading never throws: malformed numbers become NaN and unknown
 * enumerations fall back to their defaults, and validateConfig reports both.
 */
export function loadConfig(env: Environment = process.env): AppConfig {
  const device = readVar(env, 'DEVICE')?.toLowerCase() ?? DEFAULT_MODEL_CONFIG.device;
  const logFormat = readVar(env, 'LOG_FORMAT')?.toLowerCase() ?? DEFAULT_LOGGING_CONFIG.format;

  const model: ModelSourceConfig = {
    modelFamily: readVar(env, 'MODEL_FAMILY')?.toLowerCase() ?? DEFAULT_MODEL_CONFIG.modelFamily,
    // an explicitly empty LOCAL_MODEL_DIR is reported, not defaulted
    localDir: env['LOCAL_MODEL_DIR'] !== undefined
      ? env['LOCAL_MODEL_DIR'].trim()
      : DEFAULT_MODEL_CONFIG.localDir,
    remoteUri: readVar(env, 'GCS_MODEL_URI'),
    fallbackId: env['HF_MODEL_NAME'] !== undefined
      ? env['HF_MODEL_NAME'].trim()
      : DEFAULT_MODEL_CONFIG.fallbackId,
    allowFallback: parseBoolean(readVar(env, 'ALLOW_HF_FALLBACK'), DEFAULT_MODEL_CONFIG.allowFallback),
    decoding: Object.freeze({
      beamSize: readInt(env, 'BEAM_SIZE', DEFAULT_MODEL_CONFIG.decoding.beamSize),
      maxNewTokens: readInt(env, 'MAX_NEW_TOKENS', DEFAULT_MODEL_CONFIG.decoding.maxNewTokens),
    }),
    device: isDevice(device) ? device : DEFAULT_MODEL_CONFIG.device,
    downloadConcurrency: readInt(env, 'DOWNLOAD_CONCURRENCY', DEFAULT_MODEL_CONFIG.downloadConcurrency),
  };

  const server: ServerConfig = {
    host: readVar(env, 'HOST') ?? DEFAULT_SERVER_CONFIG.host,
    port: readInt(env, 'PORT', DEFAULT_SERVER_CONFIG.port),
    maxUploadBytes: readInt(env, 'MAX_UPLOAD_BYTES', DEFAULT_SERVER_CONFIG.maxUploadBytes),
  };

  const logging: LoggingConfig = {
    level: readVar(env, 'LOG_LEVEL')?.toLowerCase() ?? DEFAULT_LOGGING_CONFIG.level,
    format: isLogFormat(logFormat) ? logFormat : DEFAULT_LOGGING_CONFIG.format,
  };

  return Object.freeze({
    model: Object.freeze(model),
    server: Object.freeze(server),
    logging: Object.freeze(logging),
  });
}

/**
 * Validate the model source section; the startup orchestrator runs this
 * on its own before resolving anything.
 */
export function validateModelConfig(model: ModelSourceConfig): string[] {
  const errors: string[] = [];

  if (!model.modelFamily) {
    errors.push('MODEL_FAMILY must not be empty');
  }
  if (!model.localDir) {
    errors.push('LOCAL_MODEL_DIR must not be empty');
  }
  if (model.remoteUri !== undefined && !/^gs:\/\/[^/]+/.test(model.remoteUri)) {
    errors.push(`GCS_MODEL_URI must look like gs://bucket/prefix (got ${model.remoteUri})`);
  }
  if (model.allowFallback && !model.fallbackId) {
    errors.push('HF_MODEL_NAME is required when ALLOW_HF_FALLBACK is enabled');
  }

  // Decoding validation
  if (!Number.isInteger(model.decoding.beamSize) || model.decoding.beamSize < 1) {
    errors.push('BEAM_SIZE must be a positive integer');
  }
  if (!Number.isInteger(model.decoding.maxNewTokens) || model.decoding.maxNewTokens < 1) {
    errors.push('MAX_NEW_TOKENS must be a positive integer');
  }
  if (!Number.isInteger(model.downloadConcurrency) || model.downloadConcurrency < 1) {
    errors.push('DOWNLOAD_CONCURRENCY must be a positive integer');
  }

  return errors;
}

/**
 * Validate configuration. `env` is consulted for enumerations that
 * loadConfig had to replace with their defaults.
 */
export function validateConfig(config: AppConfig, env: Environment = process.env): string[] {
  const errors = validateModelConfig(config.model);
  const { server, logging } = config;

  // Server validation
  if (!Number.isInteger(server.port) || server.port < 1 || server.port > 65535) {
    errors.push('PORT must be an integer between 1 and 65535');
  }
  if (!Number.isInteger(server.maxUploadBytes) || server.maxUploadBytes < 1) {
    errors.push('MAX_UPLOAD_BYTES must be a positive integer');
  }

  // Logging validation
  if (!LOG_LEVELS.includes(logging.level)) {
    errors.push(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  const device = readVar(env, 'DEVICE')?.toLowerCase();
  if (device !== undefined && !isDevice(device)) {
    errors.push(`DEVICE must be one of: ${DEVICES.join(', ')}`);
  }
  const format = readVar(env, 'LOG_FORMAT')?.toLowerCase();
  if (format !== undefined && !isLogFormat(format)) {
    errors.push(`LOG_FORMAT must be one of: ${LOG_FORMATS.join(', ')}`);
  }

  return errors;
}
