/**
 * Split a comma-separated list, trimming entries and dropping empty ones.
 *
 * @example
 * splitCommaList(' GET, post ,,PUT') // ['GET', 'post', 'PUT']
 */
export function splitCommaList(value: string): string[] {
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}
