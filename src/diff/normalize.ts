import { isStructuredList, isStructuredMap, type StructuredMap, type StructuredValue } from '../scenarios/values.js';

/**
 * Remove the given keys from every map in a value tree.
 *
 * Returns the input instance when nothing was removed.
 */
export function stripKeys(value: StructuredValue, keys: ReadonlySet<string>): StructuredValue {
  if (keys.size === 0) {
    return value;
  }
  if (isStructuredList(value)) {
    let changed = false;
    const items = value.map((item) => {
      const stripped = stripKeys(item, keys);
      if (stripped !== item) {
        changed = true;
      }
      return stripped;
    });
    return changed ? items : value;
  }
  if (isStructuredMap(value)) {
    return stripMapKeys(value, keys);
  }
  return value;
}

export function stripMapKeys(map: StructuredMap, keys: ReadonlySet<string>): StructuredMap {
  let changed = false;
  const kept: [string, StructuredValue][] = [];
  for (const [key, item] of Object.entries(map)) {
    if (keys.has(key)) {
      changed = true;
      continue;
    }
    const stripped = stripKeys(item, keys);
    if (stripped !== item) {
      changed = true;
    }
    kept.push([key, stripped]);
  }
  return changed ? Object.fromEntries(kept) : map;
}
