/**
 * @module output/suggestions
 * @description Suggestion sink: renders an issue's templateKey + context into remediation text
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/output/data/suggestion-templates.json
 * @lastModified 2026-10-19
 */

import type { Issue } from '../types/issues';
import templateLines from './data/suggestion-templates.json';

// ============================================================================
// Renderer Interface
// ============================================================================

/**
 * Anything that turns a template key and its context into text. A host can
 * plug in its own template engine; analysis never depends on one.
 */
export interface SuggestionRenderer {
  /** Rendered text, or null when the key has no template */
  render(templateKey: string, context: Readonly<Record<string, unknown>>): string | null;
  has(templateKey: string): boolean;
}

// ============================================================================
// In-Memory Templates
// ============================================================================

const PLACEHOLDER = /\{\{\s*(\w+)\s*\}\}/g;

export const DEFAULT_TEMPLATES: Readonly<Record<string, string>> = Object.freeze(
  Object.fromEntries(Object.entries(templateLines).map(([key, lines]) => [key, lines.join('\n')]))
);

/**
 * `{{name}}` substitution over a map of templates.
 *
 * A line that names a placeholder missing from the context (or null there)
 * is left out, so one template serves issues with and without optional
 * details.
 *
 * @example
 * const renderer = new InMemoryTemplateRenderer({ hello: 'Hello {{name}}' });
 * renderer.render('hello', { name: 'orders' }); // 'Hello orders'
 */
export class InMemoryTemplateRenderer implements SuggestionRenderer {
  private templates: Map<string, string>;

  constructor(templates: Readonly<Record<string, string>> = DEFAULT_TEMPLATES) {
    this.templates = new Map(Object.entries(templates));
  }

  register(templateKey: string, template: string): this {
    this.templates.set(templateKey, template);
    return this;
  }

  has(templateKey: string): boolean {
    return this.templates.has(templateKey);
  }

  keys(): string[] {
    return [...this.templates.keys()];
  }

  render(templateKey: string, context: Readonly<Record<string, unknown>>): string | null {
    const template = this.templates.get(templateKey);
    if (template === undefined) return null;

    const lines: string[] = [];
    for (const line of template.split('\n')) {
      const rendered = renderLine(line, context);
      if (rendered !== null) lines.push(rendered);
    }
    return lines.join('\n');
  }
}

function renderLine(line: string, context: Readonly<Record<string, unknown>>): string | null {
  const missing: string[] = [];
  const rendered = line.replace(PLACEHOLDER, (_match, name: string) => {
    const value = Object.prototype.hasOwnProperty.call(context, name) ? context[name] : undefined;
    const text = formatValue(value);
    if (text === null) missing.push(name);
    return text ?? '';
  });
  return missing.length === 0 ? rendered : null;
}

/**
 * Display form of a context value; null for absent or empty values
 */
export function formatValue(value: unknown): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value === 'number') return Number.isInteger(value) ? String(value) : value.toFixed(2);
  if (typeof value === 'string') return value === '' ? null : value;
  if (typeof value === 'boolean') return value ? 'yes' : 'no';
  if (Array.isArray(value)) {
    const parts = value.map(formatValue).filter((part): part is string => part !== null);
    return parts.length > 0 ? parts.join(', ') : null;
  }
  return JSON.stringify(value);
}

/**
 * Remediation text for an issue, or null when it carries no suggestion
 */
export function renderSuggestion(issue: Issue, renderer: SuggestionRenderer): string | null {
  if (!issue.suggestion) return null;
  return renderer.render(issue.suggestion.templateKey, issue.suggestion.context);
}
