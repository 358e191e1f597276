/**
 * @module output/index
 * @description Report output: serialization, suggestion rendering, JSON and text formats
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/types/issues.ts, src/analyzer/index.ts
 * @lastModified 2026-10-19
 */

// ============================================================================
// JSON Formatting
// ============================================================================

export { buildJSONReport, formatJSON, REPORT_VERSION } from './json-formatter';

// ============================================================================
// Formatters
// ============================================================================

export * from './formatters';

// ============================================================================
// Suggestions
// ============================================================================

export {
  InMemoryTemplateRenderer,
  DEFAULT_TEMPLATES,
  renderSuggestion,
  formatValue,
  type SuggestionRenderer,
} from './suggestions';
