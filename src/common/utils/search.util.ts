/** Wraps a user-supplied term for a substring `ILIKE`, escaping its wildcards. */
export function containsPattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, (char) => `\\${char}`)}%`;
}
