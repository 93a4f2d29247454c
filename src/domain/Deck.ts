/**
 * Deck Domain Model
 *
 * This module provides the Deck class - the interface for adding notes to a
 * package. All note and card creation goes through a Deck instance so that
 * IDs, deck references and import order stay consistent.
 */

import type { NoteDefinition } from '../schemas/package';
import type { AnkiCard, AnkiCollection, AnkiDeck, AnkiModel, AnkiNote } from '../types';
import type { IdSequence } from './ids';
import { cardOrdinals, materializeNote } from './Note';

/** Deck options group every generated deck points at */
export const DEFAULT_CONF_ID = 1;

/** Configuration for creating a new deck */
export interface CreateDeckOptions {
  /** Deck description */
  description?: string;
  /** Clock (epoch milliseconds) for note modification times */
  now?: number;
}

/**
 * Represents one deck of a package under construction.
 *
 * @example
 * ```ts
 * const collection = Deck.createEmptyCollection(model);
 * const deck = Deck.create(deckId, 'Geography', collection, ids);
 * deck.addNote({ fields: ['Capital of France?', 'Paris'], tags: ['europe'] });
 * ```
 */
export class Deck {
  private readonly _data: AnkiDeck;
  private readonly _collection: AnkiCollection;
  private readonly _ids: IdSequence;
  private readonly _modifiedAt: number;
  private readonly _notes: AnkiNote[] = [];

  private constructor(data: AnkiDeck, collection: AnkiCollection, ids: IdSequence, now: number) {
    this._data = data;
    this._collection = collection;
    this._ids = ids;
    this._modifiedAt = Math.floor(now / 1000);
  }

  // === Static Factory Methods ===

  /**
   * Create a new deck within a collection.
   */
  static create(
    deckId: number,
    name: string,
    collection: AnkiCollection,
    ids: IdSequence,
    options: CreateDeckOptions = {}
  ): Deck {
    const deckData: AnkiDeck = {
      id: deckId,
      name,
      description: options.description || '',
      conf: DEFAULT_CONF_ID,
    };

    collection.decks.push(deckData);
    return new Deck(deckData, collection, ids, options.now ?? Date.now());
  }

  /**
   * Create an empty collection for a model
   */
  static createEmptyCollection(model: AnkiModel): AnkiCollection {
    return {
      model,
      decks: [],
      notes: [],
      cards: [],
      media: new Map(),
    };
  }

  // === Properties ===

  get id(): number {
    return this._data.id;
  }

  get name(): string {
    return this._data.name;
  }

  /** Notes of this deck, in the order they were added */
  get notes(): readonly AnkiNote[] {
    return this._notes;
  }

  // === Note Creation ===

  /**
   * Add a note to this deck and generate its cards.
   * Notes keep their insertion order; new cards are queued in the same order.
   */
  addNote(definition: NoteDefinition): { note: AnkiNote; cards: AnkiCard[] } {
    const model = this._collection.model;
    const note = materializeNote(model, definition, this._ids.next(), this._modifiedAt);
    const position = this._collection.notes.length + 1;

    const cards: AnkiCard[] = cardOrdinals(model, note).map(ordinal => ({
      id: this._ids.next(),
      noteId: note.id,
      deckId: this._data.id,
      ordinal,
      due: position,
    }));

    this._notes.push(note);
    this._collection.notes.push(note);
    this._collection.cards.push(...cards);

    return { note, cards };
  }
}
