import { PutDashboardCommand, type CloudWatchClient } from '@aws-sdk/client-cloudwatch';
import { toDashboardBody } from '../../../domain/entities/dashboard.js';
import type { DashboardWidget } from '../../../domain/entities/widget.js';
import type {
  DashboardStorePort,
  DashboardWriteResult,
} from '../../../ports/outbound/dashboard-store-port.js';
import type { Logger } from '../../../ports/outbound/logger-port.js';

export class CloudWatchDashboardStore implements DashboardStorePort {
  constructor(
    private client: CloudWatchClient,
    private region: string,
    private logger: Logger
  ) {}

  async putDashboard(
    name: string,
    widgets: readonly DashboardWidget[]
  ): Promise<DashboardWriteResult> {
    try {
      const response = await this.client.send(
        new PutDashboardCommand({
          DashboardName: name,
          DashboardBody: toDashboardBody(widgets),
        })
      );

      // CloudWatch accepts the body but reports widgets it could not parse
      for (const message of response.DashboardValidationMessages ?? []) {
        this.logger.warn(
          `Dashboard validation: ${message.Message ?? 'unknown problem'}${message.DataPath ? ` (${message.DataPath})` : ''}`
        );
      }

      return {
        success: true,
        location: `https://${this.region}.console.aws.amazon.com/cloudwatch/home?region=${this.region}#dashboards:name=${encodeURIComponent(name)}`,
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      return { success: false, error: errorMessage };
    }
  }
}
