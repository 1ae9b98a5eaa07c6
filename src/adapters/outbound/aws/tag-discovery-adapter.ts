import {
  GetResourcesCommand,
  type ResourceGroupsTaggingAPIClient,
  type ResourceTagMapping,
} from '@aws-sdk/client-resource-groups-tagging-api';
import type { TaggedResource } from '../../../domain/entities/tagged-resource.js';
import type { Logger } from '../../../ports/outbound/logger-port.js';
import type { TagDiscoveryPort } from '../../../ports/outbound/tag-discovery-port.js';

export class TagDiscoveryAdapter implements TagDiscoveryPort {
  constructor(
    private client: ResourceGroupsTaggingAPIClient,
    private logger: Logger
  ) {}

  async findResources(
    tagKey: string,
    tagValue: string,
    resourceTypeFilters: readonly string[]
  ): Promise<readonly TaggedResource[]> {
    const resources: TaggedResource[] = [];
    let paginationToken: string | undefined;

    try {
      do {
        const command = new GetResourcesCommand({
          TagFilters: [{ Key: tagKey, Values: [tagValue] }],
          ResourceTypeFilters: [...resourceTypeFilters],
          PaginationToken: paginationToken,
        });

        const response = await this.client.send(command);
        paginationToken = response.PaginationToken || undefined;

        for (const mapping of response.ResourceTagMappingList ?? []) {
          const resource = this.mapResource(mapping);
          if (resource) {
            resources.push(resource);
          }
        }
      } while (paginationToken);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error(`Tag discovery failed for ${tagKey}=${tagValue}: ${errorMessage}`);
      return [];
    }

    return resources;
  }

  private mapResource(mapping: ResourceTagMapping): TaggedResource | null {
    if (!mapping.ResourceARN) {
      return null;
    }

    return {
      arn: mapping.ResourceARN,
      tags: (mapping.Tags ?? []).map(tag => ({
        key: tag.Key ?? '',
        value: tag.Value ?? '',
      })),
    };
  }
}
