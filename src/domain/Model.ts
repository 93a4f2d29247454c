/**
 * Model (note type) construction.
 *
 * Turns a ModelDefinition into the AnkiModel written to col.models, including
 * the per-template required-fields rules that decide which cards a note gets.
 */

import type { ModelDefinition } from '../schemas/package';
import type { AnkiModel, AnkiTemplate, RequiredFieldsRule } from '../types';
import { renderTemplate, validateTemplate } from '../utils/templateRenderer';

/** Anki's default LaTeX preamble */
export const DEFAULT_LATEX_PRE = '\\documentclass[12pt]{article}\n\\special{papersize=3in,5in}\n\\usepackage{amssymb,amsmath}\n\\pagestyle{empty}\n\\setlength{\\parindent}{0in}\n\\begin{document}';

/** Anki's default LaTeX postamble */
export const DEFAULT_LATEX_POST = '\\end{document}';

const SENTINEL = 'SeNtInEl';

function renderQuestionWith(template: AnkiTemplate, fieldNames: string[], valueFor: (name: string) => string): string {
  const fields = new Map(fieldNames.map(name => [name, valueFor(name)]));
  return renderTemplate(template.questionFormat, { fields });
}

/**
 * Work out which fields must be filled for a template to produce a card.
 *
 * First tries 'all': fields whose blanking (with everything else filled)
 * leaves nothing field-derived on the question side. Failing that, 'any':
 * fields that on their own put something on the question side.
 * A question that shows no field at all yields ['all', []], i.e. the card is
 * always generated.
 */
export function computeRequiredFields(fieldNames: string[], template: AnkiTemplate): RequiredFieldsRule {
  const fullRender = renderQuestionWith(template, fieldNames, () => SENTINEL);
  if (!fullRender.includes(SENTINEL)) {
    return [template.ordinal, 'all', []];
  }

  const all: number[] = [];
  fieldNames.forEach((blanked, ordinal) => {
    const rendered = renderQuestionWith(template, fieldNames, name => (name === blanked ? '' : SENTINEL));
    if (!rendered.includes(SENTINEL)) {
      all.push(ordinal);
    }
  });
  if (all.length > 0) {
    return [template.ordinal, 'all', all];
  }

  const any: number[] = [];
  fieldNames.forEach((filled, ordinal) => {
    const rendered = renderQuestionWith(template, fieldNames, name => (name === filled ? SENTINEL : ''));
    if (rendered.includes(SENTINEL)) {
      any.push(ordinal);
    }
  });
  return [template.ordinal, 'any', any];
}

/**
 * Create the model for a package.
 * Templates and CSS are carried over verbatim; only section balance is checked.
 */
export function createModel(definition: ModelDefinition, modelId: number): AnkiModel {
  const templates: AnkiTemplate[] = definition.templates.map((t, ordinal) => {
    validateTemplate(t.qfmt);
    validateTemplate(t.afmt);
    return {
      name: t.name,
      ordinal,
      questionFormat: t.qfmt,
      answerFormat: t.afmt,
    };
  });

  const kind = definition.type;
  const requiredFields = kind === 'cloze'
    ? []
    : templates.map(t => computeRequiredFields(definition.fields, t));

  for (const [ordinal, mode, fieldOrdinals] of requiredFields) {
    if (mode === 'all' && fieldOrdinals.length === 0) {
      console.warn(`[Package Builder] Template "${templates[ordinal].name}" shows no field on its front; every note will get this card`);
    }
  }

  return {
    id: modelId,
    name: definition.name,
    kind,
    fields: definition.fields.map((name, ordinal) => ({ name, ordinal, sticky: false })),
    templates,
    css: definition.css,
    latexPre: DEFAULT_LATEX_PRE,
    latexPost: DEFAULT_LATEX_POST,
    sortField: definition.sort_field,
    requiredFields,
  };
}
