/**
 * SQL Identifier Utilities
 */

/**
 * Escape a SQL identifier by wrapping in double quotes and escaping internal quotes
 *
 * SQLite uses double quotes for identifiers; used when introspecting tables
 * through PRAGMA statements.
 *
 * @example
 * escapeIdentifier('users') // => "users"
 * escapeIdentifier('user"s') // => "user""s"
 */
export function escapeIdentifier(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}
