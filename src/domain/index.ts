/**
 * Domain Module
 *
 * Exports the model, deck and note builders used to assemble a package.
 */

// Deck domain model
export { Deck, DEFAULT_CONF_ID } from './Deck';
export type { CreateDeckOptions } from './Deck';

// Models
export {
  createModel,
  computeRequiredFields,
  DEFAULT_LATEX_PRE,
  DEFAULT_LATEX_POST,
} from './Model';

// Notes
export { bindFields, materializeNote, cardOrdinals } from './Note';

// IDs
export { randomId, distinctRandomIds, IdSequence } from './ids';
export type { RandomSource } from './ids';
