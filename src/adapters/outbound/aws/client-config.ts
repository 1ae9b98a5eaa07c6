import { CloudWatchClient } from '@aws-sdk/client-cloudwatch';
import { ResourceGroupsTaggingAPIClient } from '@aws-sdk/client-resource-groups-tagging-api';
import { STSClient } from '@aws-sdk/client-sts';

/**
 * Transport-level retries only; nothing above the SDK retries.
 */
export const AWS_RETRY_CONFIG = {
  maxAttempts: 5,
  retryMode: 'standard',
} as const;

export interface AwsClients {
  tagging: ResourceGroupsTaggingAPIClient;
  cloudWatch: CloudWatchClient;
  sts: STSClient;
}

export function createAwsClients(region: string): AwsClients {
  const config = { region, ...AWS_RETRY_CONFIG };
  return {
    tagging: new ResourceGroupsTaggingAPIClient(config),
    cloudWatch: new CloudWatchClient(config),
    sts: new STSClient(config),
  };
}
