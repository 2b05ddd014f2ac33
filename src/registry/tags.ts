/**
 * Tag Resolution
 *
 * Tags live outside the registry. A resolver answers which tags a metric
 * carries; readers keep a metric only if it carries every requested tag.
 */

export interface TagResolver {
  /** Tags attached to a metric */
  tagsOf(qualifiedName: string): readonly string[]
}

/**
 * Check that a metric carries every one of `tags`
 */
export function hasAllTags(resolver: TagResolver, qualifiedName: string, tags: readonly string[]): boolean {
  if (tags.length === 0) return true
  const carried = new Set(resolver.tagsOf(qualifiedName))
  return tags.every((tag) => carried.has(tag))
}

/**
 * In-process resolver backed by a fixed mapping
 *
 * @example
 * ```typescript
 * const tags = createStaticTagResolver({
 *   tool_monitoring_courses: ['dashboard', 'prometheus'],
 *   tool_monitoring_users_online: ['prometheus'],
 * })
 * ```
 */
export function createStaticTagResolver(mapping: Readonly<Record<string, readonly string[]>>): TagResolver {
  const index = new Map(Object.entries(mapping))
  return {
    tagsOf: (qualifiedName) => index.get(qualifiedName) ?? [],
  }
}
