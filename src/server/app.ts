/**
 * HTTP Gateway
 *
 * Thin express layer over the Package Builder and the storage root:
 * - POST /generate_flashcards/  build a package, answer with its download URL
 * - GET  /download/:filename    send a stored file as an attachment
 * - POST /upload_media/         store an uploaded file under its own name
 * - GET  /                      greeting
 */

import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import multer from 'multer';
import type { AppConfig } from '../config';
import { PackageDefinitionSchema } from '../schemas/package';
import { PackageBuildError, buildPackage } from '../services/packageBuilder';
import { Storage, isSafeFilename } from '../services/storage';
import { HttpError, createErrorHandler, formatValidationIssues } from './errors';

export interface AppDependencies {
  storage: Storage;
  config: Pick<AppConfig, 'publicBaseUrl' | 'maxUploadBytes' | 'exposeErrorDetails'>;
  /** Log one line per request */
  logRequests?: boolean;
}

export interface FlashcardGenerationResponse {
  message: string;
  download_url: string;
}

export interface MediaUploadResponse {
  filename: string;
  status: string;
}

const FILE_NOT_FOUND = 'File not found';

function baseUrlFor(req: Request, publicBaseUrl: string | null): string {
  return publicBaseUrl ?? `${req.protocol}://${req.get('host') ?? 'localhost'}`;
}

function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const started = Date.now();
  res.on('finish', () => {
    console.log(`[Gateway] ${req.method} ${req.originalUrl} -> ${res.statusCode} (${Date.now() - started} ms)`);
  });
  next();
}

export function createApp({ storage, config, logRequests = false }: AppDependencies): Express {
  const app = express();
  const upload = multer({
    storage: multer.memoryStorage(),
    // Multipart filenames arrive as UTF-8; busboy's default would read them as latin1
    defParamCharset: 'utf8',
    limits: { fileSize: config.maxUploadBytes, files: 1 },
  });

  if (logRequests) {
    app.use(requestLogger);
  }
  app.use(express.json({ limit: '25mb' }));

  app.get('/', (_req, res) => {
    res.json({ message: 'Welcome to the Anki Flashcard Generator API' });
  });

  app.post('/generate_flashcards', async (req, res) => {
    const parsed = PackageDefinitionSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(422).json({ detail: formatValidationIssues(parsed.error) });
      return;
    }

    try {
      const result = await buildPackage(parsed.data, { storage });
      const body: FlashcardGenerationResponse = {
        message: 'Flashcards generated successfully',
        download_url: `${baseUrlFor(req, config.publicBaseUrl)}/download/${encodeURIComponent(result.filename)}`,
      };
      res.json(body);
    } catch (error) {
      if (error instanceof PackageBuildError && error.type !== 'invalid_template') {
        res.status(400).json({ detail: error.message });
        return;
      }
      console.error('[Gateway] Flashcard generation failed:', error);
      const reason = error instanceof Error ? error.message : String(error);
      res.status(500).json({
        detail: config.exposeErrorDetails
          ? `An error occurred during flashcard generation: ${reason}`
          : 'An error occurred during flashcard generation',
      });
    }
  });

  app.get('/download/:filename', async (req, res, next) => {
    try {
      const { filename } = req.params;
      if (!isSafeFilename(filename) || !(await storage.exists(filename))) {
        throw new HttpError(404, FILE_NOT_FOUND);
      }

      res.attachment(filename);
      res.type('application/octet-stream');
      res.sendFile(storage.resolve(filename), { dotfiles: 'allow' }, error => {
        if (error) {
          next(error);
        }
      });
    } catch (error) {
      next(error);
    }
  });

  app.post('/upload_media', upload.single('file'), async (req, res, next) => {
    try {
      const file = req.file;
      if (!file) {
        throw new HttpError(400, 'No file uploaded (expected multipart field "file")');
      }
      if (!isSafeFilename(file.originalname)) {
        throw new HttpError(400, `Invalid filename: ${JSON.stringify(file.originalname)}`);
      }

      await storage.write(file.originalname, new Uint8Array(file.buffer));
      console.log(`[Storage] Stored ${file.originalname} (${file.size} bytes)`);

      const body: MediaUploadResponse = {
        filename: file.originalname,
        status: 'File uploaded successfully',
      };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ detail: 'Not Found' });
  });

  app.use(createErrorHandler({ exposeErrorDetails: config.exposeErrorDetails }));

  return app;
}
