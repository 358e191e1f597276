/**
 * @module cli/commands
 * @description CLI command exports
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies commander
 * @lastModified 2026-10-19
 */

export { analyzeCommand } from './analyze';
export { queriesCommand } from './queries';
export { issuesCommand } from './issues';
export { summaryCommand } from './summary';
