/**
 * @module parser/grammar
 * @description Grammar-based SQL parsing with a per-SQL memo of the outcome
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies node-sql-parser, src/parser/bounded-cache.ts, src/logging/logger.ts
 * @lastModified 2026-10-19
 */

import { Parser } from 'node-sql-parser';
import { BoundedCache } from './bounded-cache';
import { silentLogger, type Logger } from '../logging/logger';

// ============================================================================
// Grammar Parser
// ============================================================================

export interface ParseOutcome {
  /** First statement of the parsed AST, or null when the grammar rejected the input */
  statement: unknown;
}

/**
 * Wraps node-sql-parser. A failed parse is not an error: callers switch to
 * their regex fallback when `parse()` returns null.
 *
 * One instance is shared by the structure extractor and the normalizer so
 * each distinct SQL text is parsed once.
 */
export class SqlGrammar {
  private parser: Parser;
  private cache: BoundedCache<ParseOutcome>;
  private database: string;
  private logger: Logger;

  constructor(options: SqlGrammarOptions = {}) {
    this.parser = new Parser();
    this.cache = options.cache ?? new BoundedCache<ParseOutcome>();
    this.database = options.database ?? 'MySQL';
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Parse SQL and return its first statement node, or null on failure
   */
  parse(sql: string): unknown {
    return this.cache.getOrCompute(sql, text => this.parseUncached(text)).statement;
  }

  /**
   * True when the grammar accepts the SQL
   */
  accepts(sql: string): boolean {
    return this.parse(sql) !== null;
  }

  private parseUncached(sql: string): ParseOutcome {
    if (sql.trim() === '') {
      return { statement: null };
    }
    try {
      const ast: unknown = this.parser.astify(sql, { database: this.database });
      const statement: unknown = Array.isArray(ast) ? ast[0] : ast;
      return { statement: statement ?? null };
    } catch (error) {
      this.logger.debug('SQL grammar rejected query, using regex fallback:', error instanceof Error ? error.message : error);
      return { statement: null };
    }
  }
}

export interface SqlGrammarOptions {
  /** node-sql-parser dialect (default MySQL) */
  database?: string;
  cache?: BoundedCache<ParseOutcome>;
  logger?: Logger;
}
