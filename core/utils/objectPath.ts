/**
 * Reads `a.b.c` from a root object, stepping through objects and functions.
 * Returns undefined as soon as a segment is missing.
 */
export function readPath(root: unknown, dotted: string): unknown {
  let current: unknown = root;
  for (const segment of dotted.split('.')) {
    if (segment === '') {
      return undefined;
    }
    if ((typeof current !== 'object' && typeof current !== 'function') || current === null) {
      return undefined;
    }
    if (!Reflect.has(current, segment)) {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
}
