/**
 * Quote an SQL identifier (table or column name) with double quotes.
 * Embedded quotes are doubled so a configured name cannot end the identifier.
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replaceAll('"', '""')}"`;
}
