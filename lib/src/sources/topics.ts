/**
 * Joins topic names for the router's instructions: "a", "a and b",
 * "a, b and c".
 */
export function formatStoreTopics(topics: readonly string[]): string {
  const cleaned = topics.map((t) => t.trim()).filter((t) => t.length > 0);
  if (cleaned.length <= 1) {
    return cleaned[0] ?? '';
  }
  return `${cleaned.slice(0, -1).join(', ')} and ${cleaned[cleaned.length - 1] ?? ''}`;
}
