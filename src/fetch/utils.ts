import type { HeaderOptions } from '../types/request.js';

/**
 * Merges header layers into one `Headers` instance, later layers winning.
 * A `null` or `undefined` value removes a header set by an earlier layer.
 *
 * Throws the `TypeError` from `Headers` for a name or value it rejects.
 */
export function mergeHeaderOptions(...layers: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const layer of layers) {
    const entries: Iterable<[string, string | null | undefined]> =
      layer instanceof Headers ? layer.entries() : Object.entries(layer ?? {});

    for (const [key, value] of entries) {
      if (value == null) {
        merged.delete(key);
        continue;
      }

      merged.set(key, value);
    }
  }

  return merged;
}
