/** Model types from col.models JSON */
export type ModelKind = 'standard' | 'cloze';

/**
 * Required-fields rule for one template: [template ordinal, 'any' | 'all', field ordinals].
 * A card is generated for the template when the rule holds for the note's fields.
 */
export type RequiredFieldsRule = [number, 'any' | 'all', number[]];

export interface AnkiField {
  name: string;
  ordinal: number;
  sticky: boolean;
}

export interface AnkiTemplate {
  name: string;
  ordinal: number;
  questionFormat: string;
  answerFormat: string;
}

export interface AnkiModel {
  id: number;
  name: string;
  kind: ModelKind;
  fields: AnkiField[];
  templates: AnkiTemplate[];
  css: string;
  /** LaTeX preamble (usually \\documentclass...) */
  latexPre: string;
  /** LaTeX postamble (usually \\end{document}) */
  latexPost: string;
  /** Index of field used for sorting in browser (0-indexed) */
  sortField: number;
  /** Empty for cloze models, which generate cards from cloze numbers instead */
  requiredFields: RequiredFieldsRule[];
}

export interface AnkiNote {
  id: number;
  modelId: number;
  /** Exactly one value per model field, in field order */
  fields: string[];
  tags: string[];
  guid: string;
  /** Modification time (epoch seconds) */
  mod: number;
}

export interface AnkiCard {
  id: number;
  noteId: number;
  deckId: number;
  /** Template ordinal for standard models, cloze number - 1 for cloze models */
  ordinal: number;
  /** New-card position; follows note order across the whole package */
  due: number;
}

export interface AnkiDeck {
  id: number;
  name: string;
  description: string;
  /** ID of the deck options group from dconf */
  conf: number;
}

/**
 * Everything that goes into one package: a single model shared by all decks,
 * the decks with their notes and cards, and the media payloads by filename.
 */
export interface AnkiCollection {
  model: AnkiModel;
  decks: AnkiDeck[];
  notes: AnkiNote[];
  cards: AnkiCard[];
  media: Map<string, Uint8Array>;
}

/** What the builder hands back to the gateway once the artifact is on disk */
export interface BuildResult {
  filename: string;
  deckCount: number;
  noteCount: number;
  cardCount: number;
  mediaCount: number;
}
