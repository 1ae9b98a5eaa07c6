/**
 * Lambda entry point, run on a schedule by EventBridge.
 */

import type { Context, ScheduledEvent } from 'aws-lambda';

import { loadConfig, validateConfig, type Environment } from './config/index.js';
import { toDashboardRequest } from './config/dashboard-inputs.js';
import { createAwsDependencies } from './adapters/outbound/aws/index.js';
import { ConsoleLogger } from './adapters/outbound/logging/console-logger.js';
import {
  createBuildDashboardUseCase,
  type BuildDashboardDependencies,
} from './application/build-dashboard.js';
import type { Logger } from './ports/outbound/logger-port.js';

export interface HandlerResponse {
  statusCode: number;
  body: string;
}

export interface HandlerOptions {
  env?: Environment;
  logger?: Logger;
  createDependencies?: (region: string, logger: Logger) => BuildDashboardDependencies;
}

export function createHandler(options: HandlerOptions = {}) {
  const logger = options.logger ?? new ConsoleLogger();
  const createDependencies = options.createDependencies ?? createAwsDependencies;

  return async (event: ScheduledEvent, context: Context): Promise<HandlerResponse> => {
    logger.info(`Invocation ${context.awsRequestId} (${event['detail-type']})`);

    const config = loadConfig(options.env ?? process.env);
    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
      const body = `Invalid configuration: ${configErrors.join('; ')}`;
      logger.error(body);
      return { statusCode: 400, body };
    }

    const request = toDashboardRequest(config, logger);
    const useCase = createBuildDashboardUseCase(createDependencies(config.region, logger));
    const result = await useCase.execute(request);

    return { statusCode: result.statusCode, body: result.body };
  };
}

export const handler = createHandler();
