import { describe, test, expect, beforeEach } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import { GetCallerIdentityCommand, STSClient } from '@aws-sdk/client-sts';
import { validateAwsCredentials } from './credentials.js';

const stsMock = mockClient(STSClient);

describe('validateAwsCredentials', () => {
  beforeEach(() => {
    stsMock.reset();
  });

  test('returns the caller identity', async () => {
    stsMock.on(GetCallerIdentityCommand).resolves({
      Account: '123456789012',
      Arn: 'arn:aws:iam::123456789012:user/ci',
    });

    const status = await validateAwsCredentials(new STSClient({ region: 'us-east-1' }));

    expect(status).toEqual({
      valid: true,
      accountId: '123456789012',
      arn: 'arn:aws:iam::123456789012:user/ci',
    });
  });

  test('reports invalid credentials', async () => {
    stsMock.on(GetCallerIdentityCommand).rejects(new Error('ExpiredToken'));

    const status = await validateAwsCredentials(new STSClient({ region: 'us-east-1' }));

    expect(status).toEqual({
      valid: false,
      error: 'AWS credentials are invalid or expired: ExpiredToken',
    });
  });
});
