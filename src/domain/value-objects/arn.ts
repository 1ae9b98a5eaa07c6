/**
 * Segment helpers for AWS ARNs.
 *
 * arn:partition:service:region:account:resource
 *
 * The resource part may itself contain ':' or '/' separators depending on the
 * service, so builders pick whichever fragment the service's metrics key on.
 */

export function arnRegion(arn: string): string | undefined {
  const region = arn.split(':')[3];
  return region ? region : undefined;
}

export function colonSegment(arn: string, index: number): string {
  return arn.split(':')[index] ?? '';
}

export function lastColonSegment(arn: string): string {
  const parts = arn.split(':');
  return parts[parts.length - 1] ?? '';
}

export function lastPathSegment(value: string): string {
  const parts = value.split('/');
  return parts[parts.length - 1] ?? '';
}

/**
 * Last `count` '/'-separated segments, e.g. `app/my-alb/50dc6c495c0c9188`
 * for an application load balancer ARN.
 */
export function trailingPath(arn: string, count: number): string {
  return arn.split('/').slice(-count).join('/');
}

/**
 * Last segment after both separators, which is the bare resource id for
 * ARNs such as `arn:aws:ec2:us-east-1:123456789012:instance/i-0abc`.
 */
export function resourceId(arn: string): string {
  return lastPathSegment(lastColonSegment(arn));
}
