/**
 * HTTP API: single and batch captioning over multipart uploads
 */

import { Hono, type Context } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { logger as accessLog } from 'hono/logger';
import type { Captioner } from '../captioning/index.js';
import {
  CaptionServiceError,
  InvalidImageError,
  InvalidRequestError,
  NotReadyError,
} from '../errors.js';
import type { ReadinessSource } from '../startup.js';
import type { Logger } from '../types.js';

/** Multipart field of POST /predict */
export const SINGLE_FIELD = 'file';
/** Repeated multipart field of POST /predict_batch */
export const BATCH_FIELD = 'files';

export interface AppOptions {
  readiness: ReadinessSource;
  logger: Logger;
  /** Largest accepted request body in bytes */
  maxUploadBytes: number;
}

type ErrorStatus = 400 | 413 | 500 | 503;

/**
 * An uploaded multipart file
 */
interface UploadedFile {
  name: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

function isUpload(value: unknown): value is UploadedFile {
  return value instanceof Blob && 'name' in value && typeof value.name === 'string';
}

/**
 * Files sent under any field other than `field` are a client mistake;
 * text fields are ignored
 */
function rejectStrayUploads(form: Record<string, unknown>, field: string): void {
  for (const [name, value] of Object.entries(form)) {
    if (name === field) {
      continue;
    }
    const values: unknown[] = Array.isArray(value) ? value : [value];
    if (values.some(isUpload)) {
      throw new InvalidRequestError(`Unexpected file field "${name}"; send images in field "${field}"`);
    }
  }
}

/**
 * Collect the files of one form field
 */
function fieldUploads(form: Record<string, unknown>, field: string): UploadedFile[] {
  const value = form[field];
  if (value === undefined) {
    return [];
  }

  const values: unknown[] = Array.isArray(value) ? value : [value];
  return values.map(entry => {
    if (!isUpload(entry)) {
      throw new InvalidRequestError(`Field "${field}" must contain image files, not text`);
    }
    return entry;
  });
}

async function readBytes(upload: UploadedFile): Promise<Uint8Array> {
  return new Uint8Array(await upload.arrayBuffer());
}

async function readForm(c: Context): Promise<Record<string, unknown>> {
  const contentType = c.req.header('content-type') ?? '';
  if (!contentType.toLowerCase().startsWith('multipart/form-data')) {
    throw new InvalidRequestError('Expected a multipart/form-data upload');
  }

  try {
    return await c.req.parseBody({ all: true });
  } catch (error) {
    // bodyLimit aborts chunked uploads mid-stream; let it answer 413
    if (error instanceof Error && error.name === 'BodyLimitError') {
      throw error;
    }
    throw new InvalidRequestError('Malformed multipart body');
  }
}

function requireCaptioner(readiness: ReadinessSource): Captioner {
  const captioner = readiness.getCaptioner();
  if (!captioner) {
    throw new NotReadyError(readiness.getState());
  }
  return captioner;
}

function statusFor(error: CaptionServiceError): ErrorStatus {
  if (error instanceof InvalidImageError || error instanceof InvalidRequestError) {
    return 400;
  }
  if (error instanceof NotReadyError) {
    return 503;
  }
  return 500;
}

/**
 * Build the API application
 */
export function createApp(options: AppOptions): Hono {
  const { readiness, logger } = options;
  const app = new Hono();

  app.use('*', accessLog((message: string) => logger.info(message)));

  const uploadLimit = bodyLimit({
    maxSize: options.maxUploadBytes,
    onError: c =>
      c.json(
        {
          error: {
            code: 'payload_too_large',
            message: `Upload exceeds ${options.maxUploadBytes} bytes`,
          },
        },
        413
      ),
  });

  // Liveness / readiness probe
  app.get('/', c => {
    const state = readiness.getState();
    const status = state === 'READY' ? 'ok' : state === 'FAILED' ? 'failed' : 'starting';
    return c.json({ status, state }, state === 'READY' ? 200 : 503);
  });

  app.post('/predict', uploadLimit, async c => {
    const captioner = requireCaptioner(readiness);
    const form = await readForm(c);
    rejectStrayUploads(form, SINGLE_FIELD);
    const uploads = fieldUploads(form, SINGLE_FIELD);

    const [upload] = uploads;
    if (!upload) {
      throw new InvalidRequestError(`Missing image upload in field "${SINGLE_FIELD}"`);
    }
    if (uploads.length > 1) {
      throw new InvalidRequestError(
        `Field "${SINGLE_FIELD}" takes exactly one image; use /predict_batch for several`
      );
    }

    const caption = await captioner.caption(await readBytes(upload));
    return c.json({ caption });
  });

  app.post('/predict_batch', uploadLimit, async c => {
    const captioner = requireCaptioner(readiness);
    const form = await readForm(c);
    rejectStrayUploads(form, BATCH_FIELD);
    const uploads = fieldUploads(form, BATCH_FIELD);

    const images = await Promise.all(uploads.map(readBytes));
    const results = await captioner.captionBatch(images);

    return c.json({
      results: results.map(result => {
        const filename = uploads[result.index]?.name ?? null;
        return result.ok
          ? { index: result.index, filename, caption: result.caption }
          : { index: result.index, filename, error: result.error };
      }),
    });
  });

  app.notFound(c =>
    c.json(
      { error: { code: 'not_found', message: `No route for ${c.req.method} ${c.req.path}` } },
      404
    )
  );

  app.onError((error, c) => {
    if (error instanceof CaptionServiceError) {
      const status = statusFor(error);
      const meta = { code: error.code, error: error.message, path: c.req.path };
      if (status >= 500) {
        logger.error('Request failed', meta);
      } else {
        logger.warn('Request rejected', meta);
      }

      const body = error instanceof NotReadyError
        ? { code: error.code, message: error.message, state: error.state }
        : { code: error.code, message: error.message };
      return c.json({ error: body }, status);
    }

    logger.error('Unhandled request error', {
      error: error.message,
      stack: error.stack,
      path: c.req.path,
    });
    return c.json({ error: { code: 'internal_error', message: 'Internal server error' } }, 500);
  });

  return app;
}
