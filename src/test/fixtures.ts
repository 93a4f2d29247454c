/**
 * Test Utilities for building package definitions
 */

import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { PackageDefinitionSchema } from '../schemas/package';
import type { PackageDefinition, PackageDefinitionInput } from '../schemas/package';
import { Storage } from '../services/storage';

export const BASIC_MODEL = {
  name: 'Basic Model',
  fields: ['Front', 'Back'],
  templates: [
    {
      name: 'Card 1',
      qfmt: '{{Front}}',
      afmt: "{{FrontSide}}<hr id='answer'>{{Back}}",
    },
  ],
  css: '.card { font-family: arial; font-size: 20px; }',
};

/**
 * Create a package input with `noteCount` notes per deck named "Question n" / "Answer n"
 */
export function createSimplePackageInput(deckNames: string[], noteCount: number = 3): PackageDefinitionInput {
  return {
    model: BASIC_MODEL,
    decks: deckNames.map(name => ({
      name,
      description: `${name} description`,
      notes: Array.from({ length: noteCount }, (_, i) => ({
        fields: [`${name} question ${i + 1}`, `${name} answer ${i + 1}`],
        tags: ['test'],
      })),
    })),
  };
}

/** Apply schema defaults, as the gateway does before calling the builder */
export function definition(input: PackageDefinitionInput): PackageDefinition {
  return PackageDefinitionSchema.parse(input);
}

/** Sequence of values in [0, 1) for predictable model and deck IDs */
export function sequenceRandom(...values: number[]): () => number {
  let index = 0;
  return () => values[index++ % values.length];
}

export async function createTempStorage(): Promise<{ storage: Storage; cleanup: () => Promise<void> }> {
  const root = await fs.mkdtemp(path.join(tmpdir(), 'flashcard-package-api-'));
  const storage = new Storage(root);
  return {
    storage,
    cleanup: () => fs.rm(root, { recursive: true, force: true }),
  };
}
