/**
 * Package Builder
 *
 * Turns a validated PackageDefinition into one .apkg file in the storage root:
 * 1. draws the model and deck IDs for this build
 * 2. builds the model (templates, CSS, required-field rules)
 * 3. materializes every note and its cards, deck by deck, in input order
 * 4. serializes the collection and writes it under a fresh random name
 *
 * The filename is only returned once the file is completely on disk.
 */

import { randomUUID } from 'node:crypto';
import type { PackageDefinition } from '../schemas/package';
import type { AnkiModel, BuildResult } from '../types';
import { Deck, IdSequence, createModel, distinctRandomIds, randomId } from '../domain';
import type { RandomSource } from '../domain';
import { exportCollection } from '../utils/apkgWriter';
import { TemplateError } from '../utils/templateRenderer';
import { Storage, UnsafeFilenameError } from './storage';

export type PackageBuildErrorType =
  | 'invalid_template'
  | 'invalid_media_name'
  | 'media_not_found';

export class PackageBuildError extends Error {
  constructor(message: string, readonly type: PackageBuildErrorType) {
    super(message);
    this.name = 'PackageBuildError';
  }
}

export interface BuildOptions {
  storage: Storage;
  /** Source for model and deck IDs */
  random?: RandomSource;
  /** Clock (epoch milliseconds) for note/card IDs and timestamps */
  now?: number;
}

export function generateArtifactName(): string {
  return `flashcards_${randomUUID().replace(/-/g, '')}.apkg`;
}

function buildModel(definition: PackageDefinition, modelId: number): AnkiModel {
  try {
    return createModel(definition.model, modelId);
  } catch (error) {
    if (error instanceof TemplateError) {
      throw new PackageBuildError(`Invalid template: ${error.message}`, 'invalid_template');
    }
    throw error;
  }
}

async function loadMedia(storage: Storage, names: string[]): Promise<Map<string, Uint8Array>> {
  const media = new Map<string, Uint8Array>();
  for (const name of names) {
    if (media.has(name)) continue;

    let data: Uint8Array | null;
    try {
      data = await storage.read(name);
    } catch (error) {
      if (error instanceof UnsafeFilenameError) {
        throw new PackageBuildError(`Invalid media filename: ${JSON.stringify(name)}`, 'invalid_media_name');
      }
      throw error;
    }
    if (data === null) {
      throw new PackageBuildError(`Media file not found: ${name}`, 'media_not_found');
    }
    media.set(name, data);
  }
  return media;
}

export async function buildPackage(
  definition: PackageDefinition,
  options: BuildOptions
): Promise<BuildResult> {
  const { storage } = options;
  const random = options.random ?? Math.random;
  const now = options.now ?? Date.now();

  const modelId = randomId(random);
  const deckIds = distinctRandomIds(definition.decks.length, [modelId], random);

  const model = buildModel(definition, modelId);
  const collection = Deck.createEmptyCollection(model);
  const ids = new IdSequence(now);

  definition.decks.forEach((deckDefinition, index) => {
    const deck = Deck.create(deckIds[index], deckDefinition.name, collection, ids, {
      description: deckDefinition.description,
      now,
    });
    for (const note of deckDefinition.notes) {
      deck.addNote(note);
    }
  });

  collection.media = await loadMedia(storage, definition.media_files);

  const bytes = await exportCollection(collection, { now });
  const filename = generateArtifactName();
  await storage.write(filename, bytes);

  console.log(
    `[Package Builder] Wrote ${filename}: ${collection.decks.length} deck(s), ` +
    `${collection.notes.length} note(s), ${collection.cards.length} card(s), ${collection.media.size} media file(s)`
  );

  return {
    filename,
    deckCount: collection.decks.length,
    noteCount: collection.notes.length,
    cardCount: collection.cards.length,
    mediaCount: collection.media.size,
  };
}
