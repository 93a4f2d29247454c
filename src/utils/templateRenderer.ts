/**
 * Card template rendering.
 *
 * Implements the subset of mustache that card templates use:
 * - `{{Field}}` and filtered forms such as `{{text:Field}}` or `{{cloze:Text}}`
 * - `{{#Field}}...{{/Field}}` (shown when the field is non-empty)
 * - `{{^Field}}...{{/Field}}` (shown when the field is empty)
 * - `{{FrontSide}}` on the answer side
 *
 * Placeholders that name no known field are left in the output untouched.
 */

import { stripHtml } from './checksum';

export class TemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TemplateError';
  }
}

type TemplateNode =
  | { kind: 'text'; value: string }
  | { kind: 'variable'; raw: string; name: string; filters: string[] }
  | { kind: 'section'; name: string; inverted: boolean; children: TemplateNode[] };

interface OpenSection {
  name: string;
  inverted: boolean;
  children: TemplateNode[];
}

export interface RenderContext {
  /** Field values by field name */
  fields: Map<string, string>;
  /** Rendered question, substituted for {{FrontSide}} */
  frontSide?: string;
  /** 1-based cloze number being rendered, if any */
  cloze?: { ordinal: number; showAnswer: boolean };
}

const TAG_PATTERN = /\{\{([^{}]*)\}\}/g;

export function isFieldNonEmpty(value: string | undefined): boolean {
  return value !== undefined && value.trim().length > 0;
}

function parseTemplate(template: string): TemplateNode[] {
  const root: TemplateNode[] = [];
  const stack: OpenSection[] = [];
  const current = () => (stack.length > 0 ? stack[stack.length - 1].children : root);
  let lastIndex = 0;

  for (const match of template.matchAll(TAG_PATTERN)) {
    const index = match.index ?? 0;
    if (index > lastIndex) {
      current().push({ kind: 'text', value: template.slice(lastIndex, index) });
    }
    lastIndex = index + match[0].length;

    const tag = match[1].trim();
    const sigil = tag.charAt(0);

    if (sigil === '#' || sigil === '^') {
      stack.push({ name: tag.slice(1).trim(), inverted: sigil === '^', children: [] });
    } else if (sigil === '/') {
      const name = tag.slice(1).trim();
      const open = stack.pop();
      if (!open) {
        throw new TemplateError(`Closing tag {{/${name}}} has no matching opening tag`);
      }
      if (open.name !== name) {
        throw new TemplateError(`Expected {{/${open.name}}} but found {{/${name}}}`);
      }
      current().push({ kind: 'section', ...open });
    } else {
      const parts = tag.split(':');
      const name = parts[parts.length - 1].trim();
      const filters = parts.slice(0, -1).map(f => f.trim().toLowerCase());
      current().push({ kind: 'variable', raw: match[0], name, filters });
    }
  }

  if (stack.length > 0) {
    const open = stack[stack.length - 1];
    throw new TemplateError(`Section {{${open.inverted ? '^' : '#'}${open.name}}} is never closed`);
  }
  if (lastIndex < template.length) {
    root.push({ kind: 'text', value: template.slice(lastIndex) });
  }
  return root;
}

// Process cloze deletions
function processCloze(text: string, clozeOrdinal: number, showAnswer: boolean): string {
  // Match {{c1::answer::hint}} or {{c1::answer}}
  const clozeRegex = /\{\{c(\d+)::([^}]+?)(?:::([^}]+))?\}\}/g;

  return text.replace(clozeRegex, (_match, num: string, answer: string, hint: string | undefined) => {
    if (parseInt(num, 10) !== clozeOrdinal) {
      return answer;
    }
    if (showAnswer) {
      return `<span class="cloze">${answer}</span>`;
    }
    return `<span class="cloze">[${hint ?? '...'}]</span>`;
  });
}

function applyFilters(value: string, filters: string[], context: RenderContext): string {
  let result = value;
  // Filters apply right to left, innermost first
  for (const filter of [...filters].reverse()) {
    if (filter === 'text') {
      result = stripHtml(result);
    } else if (filter === 'cloze' && context.cloze) {
      result = processCloze(result, context.cloze.ordinal, context.cloze.showAnswer);
    }
  }
  return result;
}

function renderNodes(nodes: TemplateNode[], context: RenderContext): string {
  let out = '';
  for (const node of nodes) {
    switch (node.kind) {
      case 'text':
        out += node.value;
        break;
      case 'variable': {
        if (node.name === 'FrontSide' && node.filters.length === 0 && context.frontSide !== undefined) {
          out += context.frontSide;
          break;
        }
        const value = context.fields.get(node.name);
        out += value === undefined ? node.raw : applyFilters(value, node.filters, context);
        break;
      }
      case 'section': {
        // Unknown fields count as empty in conditionals
        const present = isFieldNonEmpty(context.fields.get(node.name));
        if (present !== node.inverted) {
          out += renderNodes(node.children, context);
        }
        break;
      }
    }
  }
  return out;
}

export function renderTemplate(template: string, context: RenderContext): string {
  return renderNodes(parseTemplate(template), context);
}

/** Throws TemplateError if the template's sections are unbalanced */
export function validateTemplate(template: string): void {
  parseTemplate(template);
}

function collectFields(nodes: TemplateNode[], into: Set<string>, filter?: string): void {
  for (const node of nodes) {
    if (node.kind === 'variable') {
      if (filter === undefined || node.filters.includes(filter)) {
        into.add(node.name);
      }
    } else if (node.kind === 'section') {
      if (filter === undefined) {
        into.add(node.name);
      }
      collectFields(node.children, into, filter);
    }
  }
}

/** Names referenced by a template, optionally only those passed through a given filter */
export function referencedFields(template: string, filter?: string): string[] {
  const names = new Set<string>();
  collectFields(parseTemplate(template), names, filter);
  names.delete('FrontSide');
  return [...names];
}

export function extractClozeNumbers(text: string): number[] {
  const regex = /\{\{c(\d+)::/g;
  const numbers = new Set<number>();

  for (const match of text.matchAll(regex)) {
    numbers.add(parseInt(match[1], 10));
  }

  return Array.from(numbers).sort((a, b) => a - b);
}
