/**
 * Resource and target keys use the `collection/id` form
 */

export interface EntityKey {
  collection: string;
  id: string;
}

export function formatEntityKey(collection: string, id: string): string {
  return `${collection}/${id}`;
}

/**
 * Split `collection/id`. Ids may contain further slashes; the collection may not.
 */
export function parseEntityKey(key: string): EntityKey | null {
  const slash = key.indexOf('/');
  if (slash <= 0 || slash === key.length - 1) return null;
  return { collection: key.slice(0, slash), id: key.slice(slash + 1) };
}
