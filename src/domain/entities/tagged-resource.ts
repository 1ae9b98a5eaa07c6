export interface ResourceTag {
  readonly key: string;
  readonly value: string;
}

/**
 * A resource returned by tag discovery. Only the ARN drives classification;
 * tags are carried for reporting.
 */
export interface TaggedResource {
  readonly arn: string;
  readonly tags: readonly ResourceTag[];
}

export function compareByArn(a: TaggedResource, b: TaggedResource): number {
  if (a.arn < b.arn) return -1;
  if (a.arn > b.arn) return 1;
  return 0;
}

export function sortByArn(resources: readonly TaggedResource[]): TaggedResource[] {
  return [...resources].sort(compareByArn);
}
