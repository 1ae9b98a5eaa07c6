import type { BuildDashboardDependencies } from '../../../application/build-dashboard.js';
import type { Logger } from '../../../ports/outbound/logger-port.js';
import { createAwsClients, type AwsClients } from './client-config.js';
import { CloudWatchDashboardStore } from './cloudwatch-dashboard-store.js';
import { CloudWatchMetricsAdapter } from './cloudwatch-metrics-adapter.js';
import { TagDiscoveryAdapter } from './tag-discovery-adapter.js';

export { AWS_RETRY_CONFIG, createAwsClients, type AwsClients } from './client-config.js';
export { CloudWatchDashboardStore } from './cloudwatch-dashboard-store.js';
export { CloudWatchMetricsAdapter } from './cloudwatch-metrics-adapter.js';
export { TagDiscoveryAdapter } from './tag-discovery-adapter.js';
export { validateAwsCredentials, type AwsCredentialsStatus } from './credentials.js';

export function createAwsDependencies(
  region: string,
  logger: Logger,
  clients: AwsClients = createAwsClients(region)
): BuildDashboardDependencies {
  return {
    tagDiscovery: new TagDiscoveryAdapter(clients.tagging, logger),
    metricsCatalog: new CloudWatchMetricsAdapter(clients.cloudWatch, logger),
    dashboardStore: new CloudWatchDashboardStore(clients.cloudWatch, region, logger),
    logger,
  };
}
