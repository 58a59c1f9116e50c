/**
 * Canonical key names.
 *
 * Keys compare equal when they differ only in case or in how words are
 * separated: `Card Style`, `card_style` and `card  style` are one key.
 */
export function canonicalName(name: string): string {
  return name.toLowerCase().replace(/[ _]+/g, '_');
}
