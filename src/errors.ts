/**
 * Error types shared by startup and request handling
 */

import type { StartupState } from './types.js';

/**
 * Base class for every error the service raises on purpose.
 * `code` is the machine-readable identifier sent to HTTP clients.
 */
export class CaptionServiceError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Invalid or missing configuration value */
export class ConfigurationError extends CaptionServiceError {
  readonly problems: string[];

  constructor(problems: string[], options?: { cause?: unknown }) {
    super('configuration_error', `Invalid configuration: ${problems.join('; ')}`, options);
    this.problems = problems;
  }
}

/** The configured remote source could not be downloaded */
export class ResolutionError extends CaptionServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('resolution_error', message, options);
  }
}

/** No usable model folder and no permitted fallback */
export class ValidationError extends CaptionServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('validation_error', message, options);
  }
}

/** Weights or preprocessing could not be loaded */
export class ModelLoadError extends CaptionServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('load_error', message, options);
  }
}

/** Payload is not a decodable image */
export class InvalidImageError extends CaptionServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('invalid_image', message, options);
  }
}

/** Request is missing its upload or has the wrong shape */
export class InvalidRequestError extends CaptionServiceError {
  constructor(message: string) {
    super('invalid_request', message);
  }
}

/** The captioner does not exist yet (or startup failed) */
export class NotReadyError extends CaptionServiceError {
  readonly state: StartupState;

  constructor(state: StartupState) {
    super('not_ready', `Service not ready (startup state: ${state})`);
    this.state = state;
  }
}

/** Errors that end startup */
export type StartupError =
  | ConfigurationError
  | ResolutionError
  | ValidationError
  | ModelLoadError;

export function isStartupError(error: unknown): error is StartupError {
  return (
    error instanceof ConfigurationError ||
    error instanceof ResolutionError ||
    error instanceof ValidationError ||
    error instanceof ModelLoadError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
