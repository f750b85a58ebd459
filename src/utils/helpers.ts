/**
 * Exhaustiveness guard for closed unions
 */
export function assertNever(value: never, label = 'value'): never {
  throw new Error(`Unhandled ${label}: ${JSON.stringify(value)}`);
}

/**
 * "john smith" → "John Smith", "dr. smith" → "Dr. Smith"
 */
export function toTitleCase(text: string): string {
  return text
    .split(/\s+/)
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

/**
 * Join items as natural language: ["a"] → "a", ["a","b"] → "a and b",
 * ["a","b","c"] → "a, b and c"
 */
export function joinWithAnd(items: readonly string[]): string {
  return joinWith(items, 'and');
}

export function joinWithOr(items: readonly string[]): string {
  return joinWith(items, 'or');
}

function joinWith(items: readonly string[], conjunction: string): string {
  if (items.length <= 1) return items.join('');
  return `${items.slice(0, -1).join(', ')} ${conjunction} ${items[items.length - 1]}`;
}
