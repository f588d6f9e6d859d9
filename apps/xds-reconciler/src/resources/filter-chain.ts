/**
 * Insert `item` immediately before the first element matching `predicate`.
 * Returns undefined when nothing matches; the input is never modified.
 */
export function insertBefore<T>(
  items: readonly T[],
  item: T,
  predicate: (element: T) => boolean
): T[] | undefined {
  const index = items.findIndex(predicate)
  if (index < 0) return undefined
  return [...items.slice(0, index), item, ...items.slice(index)]
}

export function hasNamed(items: readonly { name: string }[] | undefined, name: string): boolean {
  return items?.some((item) => item.name === name) ?? false
}
