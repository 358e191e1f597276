/**
 * @module patterns/sql-pattern-detector
 * @description Shape checks for repeated-load patterns (N+1, lazy loading, partial collections)
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies none
 * @lastModified 2026-10-19
 */

// ============================================================================
// Patterns
// ============================================================================

/** A single bound value: placeholder or literal */
const VALUE = `(?:\\?|:\\w+|\\$\\d+|-?\\d+(?:\\.\\d+)?|'[^']*'|"[^"]*")`;

const PATTERNS = {
  select: /^\s*SELECT\b/i,
  insert: /^\s*(?:INSERT|REPLACE)\b/i,
  update: /^\s*UPDATE\b/i,
  delete: /^\s*DELETE\b/i,
  join: /\bJOIN\b/i,
  fromTable: /\bFROM\s+[`"]?(\w+)[`"]?(?:\s+(?:AS\s+)?(?!(?:WHERE|JOIN|INNER|LEFT|RIGHT|CROSS|ORDER|GROUP|LIMIT)\b)\w+)?\s*(,)?/i,
  foreignKeyEquality: new RegExp(`\\bWHERE\\b[\\s\\S]*?(?<![\\w.])(?:\\w+\\.)?(\\w+_id)\\s*=\\s*${VALUE}(?![\\w.(])`, 'i'),
  primaryKeyOnly: new RegExp(
    `\\bWHERE\\s+\\(?\\s*(?:\\w+\\.)?id\\s*=\\s*${VALUE}\\s*\\)?\\s*(?:(?:ORDER\\s+BY\\s+[\\w.]+(?:\\s+(?:ASC|DESC))?\\s*)?LIMIT\\s+\\S+\\s*)?;?\\s*$`,
    'i'
  ),
  limit: /\bLIMIT\s+(?:\d+|\?|:\w+|\$\d+)/i,
  joinOnForeignKey: /\bJOIN\s+[`"]?(\w+)[`"]?(?:\s+(?:AS\s+)?(?!ON\b)\w+)?\s+ON\s+(?:\w+\.)?(\w+_id)\s*=\s*(?:\w+\.)?id\b|\bJOIN\s+[`"]?(\w+)[`"]?(?:\s+(?:AS\s+)?(?!ON\b)\w+)?\s+ON\s+(?:\w+\.)?id\s*=\s*(?:\w+\.)?(\w+_id)\b/i,
} as const;

// ============================================================================
// Types
// ============================================================================

export interface ForeignKeyLookup {
  table: string;
  foreignKeyColumn: string;
}

// ============================================================================
// Statement Kind
// ============================================================================

export function isSelectQuery(sql: string): boolean {
  return PATTERNS.select.test(sql);
}

export function detectInsertQuery(sql: string): boolean {
  return PATTERNS.insert.test(sql);
}

export function detectUpdateQuery(sql: string): boolean {
  return PATTERNS.update.test(sql);
}

export function detectDeleteQuery(sql: string): boolean {
  return PATTERNS.delete.test(sql);
}

// ============================================================================
// Repeated-Load Shapes
// ============================================================================

/**
 * "Load related rows by foreign key": single-table SELECT whose WHERE
 * compares a `*_id` column with one value
 *
 * @example
 * detectNPlusOnePattern('SELECT * FROM posts WHERE user_id = ?');
 * // { table: 'posts', foreignKeyColumn: 'user_id' }
 */
export function detectNPlusOnePattern(sql: string): ForeignKeyLookup | null {
  if (!isSelectQuery(sql) || PATTERNS.join.test(sql)) return null;

  const from = PATTERNS.fromTable.exec(sql);
  if (!from || from[2] !== undefined) return null;

  const foreignKey = PATTERNS.foreignKeyEquality.exec(sql);
  if (!foreignKey) return null;

  return { table: from[1], foreignKeyColumn: foreignKey[1] };
}

/**
 * Joined variant: `JOIN child c ON c.parent_id = p.id` repeated per parent
 */
export function detectNPlusOneFromJoin(sql: string): ForeignKeyLookup | null {
  if (!isSelectQuery(sql)) return null;
  const match = PATTERNS.joinOnForeignKey.exec(sql);
  if (!match) return null;
  const table = match[1] ?? match[3];
  const foreignKeyColumn = match[2] ?? match[4];
  return table && foreignKeyColumn ? { table, foreignKeyColumn } : null;
}

/**
 * "Load one entity by primary key": the whole WHERE is `id = value`
 *
 * @example
 * detectLazyLoadingPattern('SELECT * FROM users WHERE id = ?'); // 'users'
 * detectLazyLoadingPattern('SELECT * FROM posts WHERE user_id = ?'); // null
 */
export function detectLazyLoadingPattern(sql: string): string | null {
  if (!isSelectQuery(sql) || PATTERNS.join.test(sql)) return null;
  if (!PATTERNS.primaryKeyOnly.test(sql)) return null;
  const from = PATTERNS.fromTable.exec(sql);
  return from ? from[1] : null;
}

/**
 * Foreign-key lookup with a LIMIT: a paginated slice of a collection
 */
export function detectPartialCollectionLoad(sql: string): boolean {
  return detectNPlusOnePattern(sql) !== null && PATTERNS.limit.test(sql);
}
