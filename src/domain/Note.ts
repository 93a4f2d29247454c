import type { NoteDefinition } from '../schemas/package';
import type { AnkiModel, AnkiNote } from '../types';
import { guidFor } from '../utils/guid';
import { extractClozeNumbers, isFieldNonEmpty, referencedFields } from '../utils/templateRenderer';

/**
 * Bind note values to model fields by position.
 * Extra values are dropped and missing ones become empty strings, so the
 * result always has one value per model field.
 */
export function bindFields(model: AnkiModel, values: string[]): string[] {
  if (values.length !== model.fields.length) {
    console.warn(
      `[Package Builder] Note has ${values.length} field value(s) but model "${model.name}" has ${model.fields.length} field(s); ` +
      (values.length > model.fields.length ? 'dropping the extra values' : 'padding with empty values')
    );
  }
  return model.fields.map((_, index) => values[index] ?? '');
}

export function materializeNote(
  model: AnkiModel,
  definition: NoteDefinition,
  noteId: number,
  mod: number
): AnkiNote {
  const fields = bindFields(model, definition.fields);
  return {
    id: noteId,
    modelId: model.id,
    fields,
    tags: [...definition.tags],
    // Hash the values as supplied so the GUID does not depend on padding
    guid: definition.guid ?? guidFor(...definition.fields),
    mod,
  };
}

/**
 * Ordinals of the cards a note produces.
 *
 * Standard models: every template whose required-fields rule holds.
 * Cloze models: one card per cloze number in the fields the template feeds
 * through the cloze filter, falling back to a single card.
 */
export function cardOrdinals(model: AnkiModel, note: AnkiNote): number[] {
  if (model.kind === 'cloze') {
    const clozeFieldNames = new Set(
      model.templates.flatMap(t => referencedFields(t.questionFormat, 'cloze'))
    );
    const numbers = new Set<number>();
    model.fields.forEach((field, index) => {
      if (clozeFieldNames.has(field.name)) {
        for (const n of extractClozeNumbers(note.fields[index])) {
          numbers.add(n);
        }
      }
    });
    const ordinals = [...numbers].filter(n => n > 0).map(n => n - 1).sort((a, b) => a - b);
    return ordinals.length > 0 ? ordinals : [0];
  }

  const ordinals: number[] = [];
  for (const [templateOrdinal, mode, fieldOrdinals] of model.requiredFields) {
    const filled = fieldOrdinals.map(i => isFieldNonEmpty(note.fields[i]));
    const satisfied = mode === 'all' ? filled.every(Boolean) : filled.some(Boolean);
    if (satisfied) {
      ordinals.push(templateOrdinal);
    }
  }
  return ordinals;
}
