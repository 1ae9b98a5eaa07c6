import { GetCallerIdentityCommand, type STSClient } from '@aws-sdk/client-sts';

export interface AwsCredentialsStatus {
  readonly valid: boolean;
  readonly accountId?: string;
  readonly arn?: string;
  readonly error?: string;
}

/**
 * Resolves credentials through the default provider chain (environment,
 * profile, SSO or instance role) and asks STS who they belong to.
 */
export async function validateAwsCredentials(client: STSClient): Promise<AwsCredentialsStatus> {
  try {
    const response = await client.send(new GetCallerIdentityCommand({}));

    return {
      valid: true,
      accountId: response.Account,
      arn: response.Arn,
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    return {
      valid: false,
      error: `AWS credentials are invalid or expired: ${errorMessage}`,
    };
  }
}
