/**
 * Comma-joined item lists.
 *
 * List-like columns store a set of items as one string ("Cough, Fever").
 * Identity is case-insensitive; the stored casing is kept for display.
 */

export const ITEM_SEPARATOR = ", "

const EMPTY_MARKER = "none"

export function canonicalizeItem(item: string): string {
  return item.trim().toLowerCase()
}

/** Splits on commas only. Blank tokens and "none" placeholders are dropped. */
export function tokenizeItems(value: string): string[] {
  return value
    .split(",")
    .map((token) => token.trim())
    .filter((token) => token.length > 0 && token.toLowerCase() !== EMPTY_MARKER)
}

/**
 * Maps canonical form to display casing. The first spelling of an item wins
 * when it appears more than once.
 */
export function indexItems(tokens: readonly string[]): Map<string, string> {
  const index = new Map<string, string>()
  for (const token of tokens) {
    const key = canonicalizeItem(token)
    if (!index.has(key)) {
      index.set(key, token)
    }
  }
  return index
}

/** Orders by Unicode code point, so astral characters sort after all of the BMP. */
export function compareCanonical(a: string, b: string): number {
  let index = 0
  while (index < a.length && index < b.length) {
    const left = a.codePointAt(index) ?? 0
    const right = b.codePointAt(index) ?? 0
    if (left !== right) return left < right ? -1 : 1
    index += left > 0xffff ? 2 : 1
  }
  return Math.sign(a.length - b.length)
}

export function joinItems(items: readonly string[]): string {
  return items.join(ITEM_SEPARATOR)
}

export interface ItemUnion {
  /** Items of `proposed` not already in `current`, sorted by canonical form. */
  added: string[]
  /** Union of both sides, sorted by canonical form. */
  merged: string[]
}

export function unionItems(current: string, proposed: string): ItemUnion {
  const currentIndex = indexItems(tokenizeItems(current))
  const proposedIndex = indexItems(tokenizeItems(proposed))

  const addedKeys = [...proposedIndex.keys()].filter((key) => !currentIndex.has(key)).sort(compareCanonical)
  const mergedKeys = [...new Set([...currentIndex.keys(), ...addedKeys])].sort(compareCanonical)

  const display = (key: string): string => proposedIndex.get(key) ?? currentIndex.get(key) ?? key

  return {
    added: addedKeys.map(display),
    merged: mergedKeys.map(display),
  }
}
