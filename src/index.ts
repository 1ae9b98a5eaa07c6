#!/usr/bin/env node
/**
 * Tag Dashboard Builder CLI
 *
 * Builds a CloudWatch dashboard, including SLO aggregates, for every AWS
 * resource carrying a given tag.
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';

import { loadConfig, loadEnvFile, validateConfig, type AppConfig } from './config/index.js';
import { toDashboardRequest } from './config/dashboard-inputs.js';
import {
  createAwsClients,
  createAwsDependencies,
  validateAwsCredentials,
} from './adapters/outbound/aws/index.js';
import { FileDashboardStore } from './adapters/outbound/filesystem/file-dashboard-store.js';
import { writeRunReport } from './adapters/outbound/filesystem/run-report-writer.js';
import {
  applyConfigFile,
  loadDashboardConfigFile,
} from './adapters/outbound/filesystem/yaml-dashboard-config.js';
import { ClackLogger } from './adapters/inbound/cli/clack-logger.js';
import {
  applyCliOptions,
  parseCliOptions,
  USAGE,
  type CliOptions,
} from './adapters/inbound/cli/cli-options.js';
import { promptForTag } from './adapters/inbound/cli/tag-prompt.js';
import { createBuildDashboardUseCase } from './application/build-dashboard.js';
import { generateDashboardReport } from './domain/services/dashboard-report-generator.js';

async function resolveConfig(options: CliOptions): Promise<AppConfig> {
  loadEnvFile();
  let config = loadConfig();

  if (options.configFile) {
    config = applyConfigFile(config, await loadDashboardConfigFile(options.configFile));
  }

  return applyCliOptions(config, options);
}

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliOptions(process.argv.slice(2));
  } catch (error) {
    console.error(pc.red(error instanceof Error ? error.message : String(error)));
    console.error(USAGE);
    return 1;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  let config = await resolveConfig(options);

  p.intro(pc.bgCyan(pc.black(' Tag Dashboard Builder ')));

  if ((!config.tagKey || !config.tagValue) && process.stdin.isTTY) {
    const tag = await promptForTag(config);
    if (!tag) {
      p.cancel('Cancelled');
      return 1;
    }
    config = { ...config, tagKey: tag.key, tagValue: tag.value };
  }

  const configErrors = validateConfig(config);
  if (configErrors.length > 0) {
    p.log.error(pc.red('Configuration errors:'));
    for (const error of configErrors) {
      p.log.error(pc.red(`  - ${error}`));
    }
    p.outro(pc.red('Nothing was written'));
    return 1;
  }

  const clients = createAwsClients(config.region);

  const credentialsSpinner = p.spinner();
  credentialsSpinner.start('Validating AWS credentials...');
  const credentialsStatus = await validateAwsCredentials(clients.sts);

  if (!credentialsStatus.valid) {
    credentialsSpinner.stop('AWS credentials invalid or missing');
    p.log.error(pc.red(credentialsStatus.error ?? 'Invalid credentials'));
    p.outro(pc.red('Nothing was written'));
    return 1;
  }

  credentialsSpinner.stop(
    `Credentials valid ${pc.dim(`(Account: ${credentialsStatus.accountId ?? 'unknown'})`)}`
  );

  const logger = new ClackLogger();
  const request = toDashboardRequest(config, logger);
  const dependencies = createAwsDependencies(config.region, logger, clients);

  if (options.dryRun) {
    p.log.info(`Dry run: writing the dashboard body to ${pc.cyan(config.outputPath)}`);
  }

  const useCase = createBuildDashboardUseCase(
    options.dryRun
      ? { ...dependencies, dashboardStore: new FileDashboardStore(config.outputPath) }
      : dependencies
  );

  const result = await useCase.execute(request);

  if (options.report) {
    const reportPath = await writeRunReport(
      config.outputPath,
      request.dashboardName,
      generateDashboardReport({ request, result })
    );
    p.log.info(`Report written to ${reportPath}`);
  }

  if (result.statusCode !== 200) {
    p.outro(pc.red(result.body));
    return 1;
  }

  p.outro(pc.green(result.body));
  return 0;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(pc.red(`Fatal: ${error instanceof Error ? error.message : String(error)}`));
    process.exitCode = 1;
  });
