/**
 * HTTP Gateway Tests
 *
 * Drives the express app in process with supertest against a temporary
 * storage root.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../server/app';
import type { AppDependencies } from '../server/app';
import type { Storage } from '../services/storage';
import { guidFor } from '../utils/guid';
import { readApkg } from './apkgReader';
import { BASIC_MODEL, createSimplePackageInput, createTempStorage } from './fixtures';

const DOWNLOAD_URL = /^http:\/\/127\.0\.0\.1:\d+\/download\/(flashcards_[0-9a-f]{32}\.apkg)$/;

const BROKEN_TEMPLATE_INPUT = {
  model: { name: 'Broken', fields: ['Front'], templates: [{ name: 'C', qfmt: '{{#Front}}', afmt: '' }] },
  decks: [{ name: 'D', notes: [] }],
};

describe('HTTP Gateway', () => {
  let storage: Storage;
  let cleanup: () => Promise<void>;
  let app: Express;

  function appWith(config: Partial<AppDependencies['config']> = {}): Express {
    return createApp({
      storage,
      config: { publicBaseUrl: null, maxUploadBytes: 1024, exposeErrorDetails: true, ...config },
    });
  }

  beforeEach(async () => {
    ({ storage, cleanup } = await createTempStorage());
    app = appWith();
  });

  afterEach(async () => {
    await cleanup();
  });

  it('greets on the root path', async () => {
    const res = await request(app).get('/');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ message: 'Welcome to the Anki Flashcard Generator API' });
  });

  describe('POST /generate_flashcards', () => {
    it('builds a package and returns a working download URL', async () => {
      const res = await request(app)
        .post('/generate_flashcards/')
        .send(createSimplePackageInput(['Geography', 'History'], 2));

      expect(res.status).toBe(200);
      expect(res.body.message).toBe('Flashcards generated successfully');
      const match = DOWNLOAD_URL.exec(res.body.download_url);
      expect(match).not.toBeNull();
      const filename = match?.[1] ?? '';

      const download = await request(app).get(`/download/${filename}`).responseType('blob');
      expect(download.status).toBe(200);
      expect(download.headers['content-type']).toBe('application/octet-stream');
      expect(download.headers['content-disposition']).toBe(`attachment; filename="${filename}"`);

      const stored = await storage.read(filename);
      expect(new Uint8Array(download.body)).toEqual(stored);

      const parsed = await readApkg(new Uint8Array(download.body));
      expect(parsed.notes).toHaveLength(4);
      expect([...parsed.decks.values()].map(deck => deck.name).sort()).toEqual(['Default', 'Geography', 'History']);
    });

    it('uses the configured public base URL', async () => {
      const res = await request(appWith({ publicBaseUrl: 'https://cards.example.test' }))
        .post('/generate_flashcards')
        .send(createSimplePackageInput(['D'], 1));

      expect(res.status).toBe(200);
      expect(res.body.download_url).toMatch(/^https:\/\/cards\.example\.test\/download\/flashcards_[0-9a-f]{32}\.apkg$/);
    });

    it('embeds previously uploaded media', async () => {
      await request(app).post('/upload_media/').attach('file', Buffer.from('fake image'), 'cat.png');

      const res = await request(app)
        .post('/generate_flashcards')
        .send({ ...createSimplePackageInput(['D'], 1), media_files: ['cat.png'] });

      expect(res.status).toBe(200);
      const filename = DOWNLOAD_URL.exec(res.body.download_url)?.[1] ?? '';
      const bytes = await storage.read(filename);
      expect(bytes).not.toBeNull();
      const parsed = await readApkg(bytes ?? new Uint8Array());
      expect(parsed.mediaManifest).toEqual({ '0': 'cat.png' });
    });

    it('accepts null for optional values', async () => {
      const res = await request(app)
        .post('/generate_flashcards')
        .send({
          model: { ...BASIC_MODEL, css: null },
          decks: [{ name: 'D', description: null, notes: [{ fields: ['Front text', 'Back text'], tags: null, guid: null }] }],
        });

      expect(res.status).toBe(200);
      const filename = DOWNLOAD_URL.exec(res.body.download_url)?.[1] ?? '';
      const parsed = await readApkg((await storage.read(filename)) ?? new Uint8Array());
      expect(parsed.models.get([...parsed.models.keys()][0])?.css).toBe('');
      expect([...parsed.decks.values()].find(deck => deck.name === 'D')?.desc).toBe('');
      expect(parsed.notes[0].tags).toBe('');
      expect(parsed.notes[0].guid).toBe(guidFor('Front text', 'Back text'));
    });

    it('rejects a missing model with a validation error', async () => {
      const res = await request(app)
        .post('/generate_flashcards')
        .send({ decks: [{ name: 'D', notes: [] }] });

      expect(res.status).toBe(422);
      expect(res.body).toEqual({
        detail: [{ loc: ['body', 'model'], msg: 'Required', type: 'invalid_type' }],
      });
    });

    it('rejects tags containing whitespace', async () => {
      const res = await request(app)
        .post('/generate_flashcards')
        .send({
          model: BASIC_MODEL,
          decks: [{ name: 'D', notes: [{ fields: ['a', 'b'], tags: ['two words'] }] }],
        });

      expect(res.status).toBe(422);
      expect(res.body.detail).toEqual([{
        loc: ['body', 'decks', 0, 'notes', 0, 'tags', 0],
        msg: 'Tags must not contain whitespace',
        type: 'invalid_string',
      }]);
    });

    it('rejects malformed JSON', async () => {
      const res = await request(app)
        .post('/generate_flashcards')
        .set('Content-Type', 'application/json')
        .send('{"decks": [');

      expect(res.status).toBe(400);
      expect(typeof res.body.detail).toBe('string');
    });

    it('reports missing media files as a bad request', async () => {
      const res = await request(app)
        .post('/generate_flashcards')
        .send({ ...createSimplePackageInput(['D'], 1), media_files: ['nope.png'] });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: 'Media file not found: nope.png' });
    });

    it('reports build failures with their reason', async () => {
      const res = await request(app).post('/generate_flashcards').send(BROKEN_TEMPLATE_INPUT);

      expect(res.status).toBe(500);
      expect(res.body).toEqual({
        detail: 'An error occurred during flashcard generation: Invalid template: Section {{#Front}} is never closed',
      });
    });

    it('hides the failure reason when details are not exposed', async () => {
      const res = await request(appWith({ exposeErrorDetails: false }))
        .post('/generate_flashcards')
        .send(BROKEN_TEMPLATE_INPUT);

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ detail: 'An error occurred during flashcard generation' });
    });
  });

  describe('GET /download/:filename', () => {
    it('answers 404 for unknown files', async () => {
      const res = await request(app).get('/download/flashcards_missing.apkg');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ detail: 'File not found' });
    });

    it('refuses names that leave the storage root', async () => {
      const res = await request(app).get('/download/..%2Fetc%2Fpasswd');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ detail: 'File not found' });
    });
  });

  describe('POST /upload_media', () => {
    it('stores the file under its own name', async () => {
      const res = await request(app)
        .post('/upload_media/')
        .attach('file', Buffer.from('first'), 'cat.png');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ filename: 'cat.png', status: 'File uploaded successfully' });
      expect(await storage.read('cat.png')).toEqual(new Uint8Array(Buffer.from('first')));
    });

    it('keeps non-ASCII filenames as sent', async () => {
      const res = await request(app)
        .post('/upload_media/')
        .attach('file', Buffer.from('x'), 'café.png');

      expect(res.status).toBe(200);
      expect(res.body.filename).toBe('café.png');
      expect(await storage.exists('café.png')).toBe(true);

      const generated = await request(app)
        .post('/generate_flashcards')
        .send({ ...createSimplePackageInput(['D'], 1), media_files: ['café.png'] });
      expect(generated.status).toBe(200);
    });

    it('replaces an existing file with the same name', async () => {
      await request(app).post('/upload_media').attach('file', Buffer.from('first'), 'cat.png');
      await request(app).post('/upload_media').attach('file', Buffer.from('second'), 'cat.png');

      expect(await storage.read('cat.png')).toEqual(new Uint8Array(Buffer.from('second')));
    });

    it('requires a file part', async () => {
      const res = await request(app).post('/upload_media').field('note', 'no file here');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: 'No file uploaded (expected multipart field "file")' });
    });

    it('rejects files over the size limit', async () => {
      const res = await request(appWith({ maxUploadBytes: 8 }))
        .post('/upload_media')
        .attach('file', Buffer.alloc(64), 'big.bin');

      expect(res.status).toBe(413);
      expect(await storage.exists('big.bin')).toBe(false);
    });
  });

  it('answers 404 for unknown routes', async () => {
    const res = await request(app).get('/nowhere');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ detail: 'Not Found' });
  });
});
