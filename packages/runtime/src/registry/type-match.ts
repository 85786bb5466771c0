// Entity type matching for filtered recency queries

/**
 * Normalize a type name for comparison: lower case, separators unified.
 */
export function normalizeTypeName(type: string): string {
  return type.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

/**
 * True if an entity type satisfies a filter type.
 *
 * Matches exactly (case-insensitive), or when the filter is one whole
 * segment of the entity type: `curve` matches `nurbs_curve`,
 * `script` matches `python_script`, but `cur` matches nothing.
 */
export function typeMatches(entityType: string, filterType: string): boolean {
  const entity = normalizeTypeName(entityType);
  const filter = normalizeTypeName(filterType);

  if (entity === filter) {
    return true;
  }
  return entity.split('_').includes(filter);
}

/**
 * True if an entity type satisfies any filter type.
 */
export function typeMatchesAny(entityType: string, filterTypes: readonly string[]): boolean {
  return filterTypes.some((filterType) => typeMatches(entityType, filterType));
}
