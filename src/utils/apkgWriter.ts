import JSZip from 'jszip';
import type { Database, SqlJsStatic } from 'sql.js';
import type { AnkiCollection, AnkiDeck, AnkiModel } from '../types';
import { DEFAULT_CONF_ID } from '../domain/Deck';
import { fieldChecksum, stripHtmlPreservingMedia } from './checksum';
import { createMediaManifestEntries, serializeMediaManifest } from './mediaManifest';

// ============================================================================
// Constants from Anki database schema documentation
// ============================================================================

/** Field separator character (0x1f = 31) used in notes.flds column */
export const FIELD_SEPARATOR = '\x1f';

/** Collection schema version written to col.ver */
export const SCHEMA_VERSION = 11;

/** Name of the database entry inside the archive */
export const COLLECTION_ENTRY = 'collection.anki2';

/** Model types from col.models JSON */
const MODEL_TYPE = {
  STANDARD: 0,
  CLOZE: 1
} as const;

/** Card types from cards.type column */
const CARD_TYPE = {
  NEW: 0,
} as const;

/** Card queue states from cards.queue column */
const CARD_QUEUE = {
  NEW: 0,
} as const;

/** Deck that every collection must contain */
const DEFAULT_DECK_ID = 1;

export interface ExportOptions {
  /** Clock used for creation and modification times (epoch milliseconds) */
  now?: number;
}

let SQL: SqlJsStatic | null = null;

async function getSql(): Promise<SqlJsStatic> {
  if (!SQL) {
    const initSqlJs = (await import('sql.js')).default;
    SQL = await initSqlJs();
  }
  return SQL;
}

/**
 * Creates the legacy Anki schema (pre-2.1.28) with models/decks in col table.
 */
function createLegacySchema(db: Database): void {
  db.exec(`
    CREATE TABLE col (
      id INTEGER PRIMARY KEY,
      crt INTEGER NOT NULL,
      mod INTEGER NOT NULL,
      scm INTEGER NOT NULL,
      ver INTEGER NOT NULL,
      dty INTEGER NOT NULL,
      usn INTEGER NOT NULL,
      ls INTEGER NOT NULL,
      conf TEXT NOT NULL,
      models TEXT NOT NULL,
      decks TEXT NOT NULL,
      dconf TEXT NOT NULL,
      tags TEXT NOT NULL
    );

    CREATE TABLE notes (
      id INTEGER PRIMARY KEY,
      guid TEXT NOT NULL,
      mid INTEGER NOT NULL,
      mod INTEGER NOT NULL,
      usn INTEGER NOT NULL,
      tags TEXT NOT NULL,
      flds TEXT NOT NULL,
      sfld TEXT NOT NULL,
      csum INTEGER NOT NULL,
      flags INTEGER NOT NULL,
      data TEXT NOT NULL
    );

    CREATE TABLE cards (
      id INTEGER PRIMARY KEY,
      nid INTEGER NOT NULL,
      did INTEGER NOT NULL,
      ord INTEGER NOT NULL,
      mod INTEGER NOT NULL,
      usn INTEGER NOT NULL,
      type INTEGER NOT NULL,
      queue INTEGER NOT NULL,
      due INTEGER NOT NULL,
      ivl INTEGER NOT NULL,
      factor INTEGER NOT NULL,
      reps INTEGER NOT NULL,
      lapses INTEGER NOT NULL,
      left INTEGER NOT NULL,
      odue INTEGER NOT NULL,
      odid INTEGER NOT NULL,
      flags INTEGER NOT NULL,
      data TEXT NOT NULL
    );

    CREATE TABLE revlog (
      id INTEGER PRIMARY KEY,
      cid INTEGER NOT NULL,
      usn INTEGER NOT NULL,
      ease INTEGER NOT NULL,
      ivl INTEGER NOT NULL,
      lastIvl INTEGER NOT NULL,
      factor INTEGER NOT NULL,
      time INTEGER NOT NULL,
      type INTEGER NOT NULL
    );

    CREATE TABLE graves (
      usn INTEGER NOT NULL,
      oid INTEGER NOT NULL,
      type INTEGER NOT NULL
    );

    CREATE INDEX ix_notes_usn ON notes (usn);
    CREATE INDEX ix_notes_csum ON notes (csum);
    CREATE INDEX ix_cards_usn ON cards (usn);
    CREATE INDEX ix_cards_nid ON cards (nid);
    CREATE INDEX ix_cards_sched ON cards (did, queue, due);
    CREATE INDEX ix_revlog_usn ON revlog (usn);
    CREATE INDEX ix_revlog_cid ON revlog (cid);
  `);
}

function buildModelJson(model: AnkiModel, deckId: number, now: number): Record<string, unknown> {
  return {
    id: model.id,
    name: model.name,
    type: model.kind === 'cloze' ? MODEL_TYPE.CLOZE : MODEL_TYPE.STANDARD,
    mod: now,
    usn: -1,
    sortf: model.sortField,
    did: deckId,
    tmpls: model.templates.map(t => ({
      name: t.name,
      ord: t.ordinal,
      qfmt: t.questionFormat,
      afmt: t.answerFormat,
      bqfmt: '',
      bafmt: '',
      did: null,
      bfont: '',
      bsize: 0
    })),
    flds: model.fields.map(f => ({
      name: f.name,
      ord: f.ordinal,
      sticky: f.sticky,
      rtl: false,
      font: 'Arial',
      size: 20,
      media: []
    })),
    css: model.css,
    latexPre: model.latexPre,
    latexPost: model.latexPost,
    latexsvg: false,
    req: model.requiredFields,
    tags: [],
    vers: []
  };
}

function buildDeckJson(deck: AnkiDeck, now: number): Record<string, unknown> {
  return {
    id: deck.id,
    name: deck.name,
    desc: deck.description,
    mod: now,
    usn: -1,
    lrnToday: [0, 0],
    revToday: [0, 0],
    newToday: [0, 0],
    timeToday: [0, 0],
    collapsed: false,
    browserCollapsed: false,
    extendNew: 10,
    extendRev: 50,
    dyn: 0,
    conf: deck.conf
  };
}

const DCONF_JSON = JSON.stringify({
  [DEFAULT_CONF_ID]: {
    id: DEFAULT_CONF_ID,
    mod: 0,
    name: 'Default',
    usn: 0,
    maxTaken: 60,
    autoplay: true,
    timer: 0,
    replayq: true,
    new: { bury: false, delays: [1, 10], initialFactor: 2500, ints: [1, 4, 0], order: 1, perDay: 20 },
    rev: { bury: false, ease4: 1.3, ivlFct: 1, maxIvl: 36500, perDay: 200, hardFactor: 1.2 },
    lapse: { delays: [10], leechAction: 1, leechFails: 8, minInt: 1, mult: 0 }
  }
});

function insertCollectionMetadata(db: Database, collection: AnkiCollection, now: number, nowMs: number): void {
  const { model } = collection;
  const firstDeckId = collection.decks[0]?.id ?? DEFAULT_DECK_ID;

  const modelsObj: Record<string, unknown> = {
    [model.id.toString()]: buildModelJson(model, firstDeckId, now),
  };

  const decksObj: Record<string, unknown> = {
    [DEFAULT_DECK_ID.toString()]: buildDeckJson(
      { id: DEFAULT_DECK_ID, name: 'Default', description: '', conf: DEFAULT_CONF_ID },
      now
    ),
  };
  for (const deck of collection.decks) {
    decksObj[deck.id.toString()] = buildDeckJson(deck, now);
  }

  const confJson = JSON.stringify({
    activeDecks: [DEFAULT_DECK_ID],
    curDeck: firstDeckId,
    newSpread: 0,
    collapseTime: 1200,
    timeLim: 0,
    estTimes: true,
    dueCounts: true,
    curModel: model.id.toString(),
    nextPos: collection.notes.length + 1,
    sortType: 'noteFld',
    sortBackwards: false,
    addToCur: true
  });

  db.run(
    `INSERT INTO col (id, crt, mod, scm, ver, dty, usn, ls, conf, models, decks, dconf, tags)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    [1, now - 86400, nowMs, nowMs, SCHEMA_VERSION, 0, 0, 0, confJson, JSON.stringify(modelsObj), JSON.stringify(decksObj), DCONF_JSON, '{}']
  );
}

function insertNotes(db: Database, collection: AnkiCollection): void {
  const { model } = collection;
  const statement = db.prepare(
    `INSERT INTO notes (id, guid, mid, mod, usn, tags, flds, sfld, csum, flags, data)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
  );
  try {
    for (const note of collection.notes) {
      const flds = note.fields.join(FIELD_SEPARATOR);
      const sortValue = note.fields[model.sortField] ?? '';
      const tags = note.tags.length > 0 ? ` ${note.tags.join(' ')} ` : '';

      statement.run([
        note.id,
        note.guid,
        note.modelId,
        note.mod,
        -1,
        tags,
        flds,
        stripHtmlPreservingMedia(sortValue),
        fieldChecksum(sortValue),
        0,
        ''
      ]);
    }
  } finally {
    statement.free();
  }
}

function insertCards(db: Database, collection: AnkiCollection, now: number): void {
  const statement = db.prepare(
    `INSERT INTO cards (id, nid, did, ord, mod, usn, type, queue, due, ivl, factor, reps, lapses, left, odue, odid, flags, data)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
  );
  try {
    for (const card of collection.cards) {
      statement.run([
        card.id,
        card.noteId,
        card.deckId,
        card.ordinal,
        now,
        -1,
        CARD_TYPE.NEW,
        CARD_QUEUE.NEW,
        card.due,
        0,
        0,
        0,
        0,
        0,
        0,
        0,
        0,
        ''
      ]);
    }
  } finally {
    statement.free();
  }
}

/**
 * Serialize a collection to .apkg bytes: a zip holding the SQLite collection,
 * the media manifest and the numbered media payloads.
 */
export async function exportCollection(
  collection: AnkiCollection,
  options: ExportOptions = {}
): Promise<Uint8Array> {
  const nowMs = options.now ?? Date.now();
  const now = Math.floor(nowMs / 1000);

  const sql = await getSql();
  const db = new sql.Database();

  let dbData: Uint8Array;
  try {
    createLegacySchema(db);
    insertCollectionMetadata(db, collection, now, nowMs);
    insertNotes(db, collection);
    insertCards(db, collection, now);
    dbData = db.export();
  } finally {
    db.close();
  }

  const zip = new JSZip();
  zip.file(COLLECTION_ENTRY, dbData);

  const entries = createMediaManifestEntries(collection.media);
  for (const entry of entries) {
    const data = collection.media.get(entry.filename);
    if (data) {
      zip.file(entry.index.toString(), data);
    }
  }
  zip.file('media', serializeMediaManifest(entries));

  return zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });
}
