/**
 * Identifiers of the store's query language. Map keys standing in for column
 * names have to follow the same grammar.
 */
export const IDENTIFIER_PATTERN = /^[A-Za-z0-9_]+$/

export function isIdentifier(value: unknown): value is string {
  return typeof value === "string" && IDENTIFIER_PATTERN.test(value)
}
