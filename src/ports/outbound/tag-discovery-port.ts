import type { TaggedResource } from '../../domain/entities/tagged-resource.js';

export interface TagDiscoveryPort {
  /**
   * All resources carrying `tagKey=tagValue` whose type is in
   * `resourceTypeFilters`. Pagination is drained before returning.
   * Transport failures yield an empty list rather than an error.
   */
  findResources(
    tagKey: string,
    tagValue: string,
    resourceTypeFilters: readonly string[]
  ): Promise<readonly TaggedResource[]>;
}
