/**
 * Decides whether a failed command is worth retrying.
 *
 * Lock contention, busy databases and I/O or network hiccups are transient.
 * Constraint violations, syntax errors, type mismatches and every error this
 * library raises itself are not.
 */

import table from './transient-errors.json';
import { PersistenceError } from './errors';

const SQLITE_TRANSIENT = new Set(table.sqliteTransient);
const SQLITE_CONDITIONAL = new Map<string, string[]>(Object.entries(table.sqliteConditional));
const SYSTEM_TRANSIENT = new Set(table.systemTransient);
const MESSAGE_PATTERNS = table.messagePatterns;

const MAX_DEPTH = 8;

export type ErrorClassification = 'transient' | 'permanent' | 'unknown';

function codeOf(error: object): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/** `SQLITE_BUSY_SNAPSHOT` → `SQLITE_BUSY`. */
export function sqliteBaseCode(code: string): string {
  const [prefix, primary] = code.split('_');
  return primary === undefined ? code : `${prefix}_${primary}`;
}

function classifyCode(code: string, message: string): ErrorClassification {
  if (code.startsWith('SQLITE_')) {
    const base = sqliteBaseCode(code);
    if (SQLITE_TRANSIENT.has(base)) return 'transient';
    const keywords = SQLITE_CONDITIONAL.get(base);
    if (keywords) {
      return keywords.some((k) => message.includes(k)) ? 'transient' : 'permanent';
    }
    // any other result code is a definitive answer from the engine
    return 'permanent';
  }
  return SYSTEM_TRANSIENT.has(code) ? 'transient' : 'unknown';
}

/**
 * Classifies an error by its SQLite or system code, its message, the members of an
 * AggregateError and finally its `cause` chain.
 */
export function classifyError(error: unknown, depth = 0): ErrorClassification {
  if (depth > MAX_DEPTH || typeof error !== 'object' || error === null) {
    return 'unknown';
  }
  if (error instanceof PersistenceError) {
    return 'permanent';
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return 'permanent';
  }

  if (error instanceof AggregateError) {
    const members = error.errors.map((member: unknown) => classifyError(member, depth + 1));
    if (members.includes('transient')) return 'transient';
    if (members.length > 0 && members.every((m) => m === 'permanent')) return 'permanent';
  }

  const message = error instanceof Error ? error.message.toLowerCase() : '';
  const code = codeOf(error);
  if (code !== undefined) {
    const byCode = classifyCode(code, message);
    if (byCode !== 'unknown') return byCode;
  }

  if (MESSAGE_PATTERNS.some((pattern) => message.includes(pattern))) {
    return 'transient';
  }

  if ('cause' in error && error.cause !== undefined) {
    return classifyError(error.cause, depth + 1);
  }

  return 'unknown';
}

/** Only errors positively identified as transient are retried. */
export function isTransientError(error: unknown): boolean {
  return classifyError(error) === 'transient';
}
