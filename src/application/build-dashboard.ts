import type { CatalogEntry, WidgetBuilderInput } from '../domain/entities/catalog-entry.js';
import type {
  BuildDashboardResult,
  DashboardRequest,
  ResourceOutcome,
} from '../domain/entities/dashboard.js';
import type { SloFamily } from '../domain/entities/service-family.js';
import { SLO_FAMILY_ORDER } from '../domain/entities/service-family.js';
import type { TaggedResource } from '../domain/entities/tagged-resource.js';
import { sortByArn } from '../domain/entities/tagged-resource.js';
import type { DashboardWidget, MetricWidget } from '../domain/entities/widget.js';
import { renderProbedWidget } from '../domain/services/capability-probe.js';
import {
  DashboardLayout,
  NO_RESOURCES_BODY,
  placeholderWidgets,
} from '../domain/services/layout-engine.js';
import { classify } from '../domain/services/resource-classifier.js';
import {
  partitionSloFamilies,
  SLO_ROW_HEIGHT,
  SloAggregator,
} from '../domain/services/slo-aggregator.js';
import {
  effectiveRegion,
  getAllCatalogEntries,
  resolveEnabledCatalog,
  resourceTypeFilters,
} from '../config/service-catalog.js';
import type { DashboardStorePort } from '../ports/outbound/dashboard-store-port.js';
import type { Logger } from '../ports/outbound/logger-port.js';
import type { MetricsCatalogPort } from '../ports/outbound/metrics-catalog-port.js';
import type { TagDiscoveryPort } from '../ports/outbound/tag-discovery-port.js';

export interface BuildDashboardDependencies {
  tagDiscovery: TagDiscoveryPort;
  metricsCatalog: MetricsCatalogPort;
  dashboardStore: DashboardStorePort;
  logger: Logger;
}

export class BuildDashboardUseCase {
  constructor(private deps: BuildDashboardDependencies) {}

  async execute(request: DashboardRequest): Promise<BuildDashboardResult> {
    const { tagDiscovery, logger } = this.deps;
    const { dashboardName, tagKey, tagValue } = request;

    const catalog = resolveEnabledCatalog(request.enabledWidgets, logger);
    const resources = await tagDiscovery.findResources(
      tagKey,
      tagValue,
      resourceTypeFilters(catalog)
    );
    logger.info(`Found ${resources.length} resources tagged ${tagKey}=${tagValue}`);

    if (resources.length === 0) {
      const widgets = placeholderWidgets(tagKey, tagValue);
      return this.persist(request, widgets, {
        body: NO_RESOURCES_BODY,
        discoveredCount: 0,
        outcomes: [],
        sloFamilies: [],
      });
    }

    const layout = new DashboardLayout();

    const sloFamilies = await this.placeSloRows(request, resources, layout);
    if (sloFamilies.length > 0) {
      layout.addSectionDivider();
    }

    const outcomes: ResourceOutcome[] = [];
    for (const resource of sortByArn(resources)) {
      outcomes.push(await this.placeResource(request, resource, catalog, layout));
    }

    layout.appendCustomWidgets(request.customWidgets, request.region);

    const widgets = layout.widgets;
    return this.persist(request, widgets, {
      body: `Dashboard updated successfully with ${widgets.length} widgets.`,
      discoveredCount: resources.length,
      outcomes,
      sloFamilies,
    });
  }

  private async placeSloRows(
    request: DashboardRequest,
    resources: readonly TaggedResource[],
    layout: DashboardLayout
  ): Promise<SloFamily[]> {
    const aggregator = new SloAggregator(
      this.deps.metricsCatalog,
      this.deps.logger,
      request.targets,
      request.region
    );
    const members = partitionSloFamilies(resources, getAllCatalogEntries());
    const emitted: SloFamily[] = [];

    for (const family of SLO_FAMILY_ORDER) {
      const familyMembers = members.get(family);
      if (!familyMembers) continue;

      const row = await aggregator.buildFamily(family, familyMembers, layout.cursor);
      if (row) {
        layout.placeRow(row, SLO_ROW_HEIGHT);
        emitted.push(family);
      }
    }

    return emitted;
  }

  private async placeResource(
    request: DashboardRequest,
    resource: TaggedResource,
    catalog: readonly CatalogEntry[],
    layout: DashboardLayout
  ): Promise<ResourceOutcome> {
    const { logger } = this.deps;
    const { arn } = resource;

    const classification = classify(arn, catalog);
    if (classification.kind === 'unmatched') {
      return { arn, status: 'unmatched' };
    }

    const { entry } = classification;
    const { family, renderer } = entry;
    const builderName = renderer.builderName;

    if (classification.kind === 'excluded') {
      logger.info(`Skipping ${arn}: not a classic load balancer`);
      return { arn, status: 'excluded', family, builderName };
    }

    try {
      const widget = await this.render(entry, {
        arn,
        region: effectiveRegion(entry, arn, request.region),
        y: layout.cursor,
        dimensionOverrides: request.dimensionOverrides,
      });

      if (!widget) {
        logger.warn(`No widget built for ARN ${arn}. Builder: ${builderName}`);
        return { arn, status: 'skipped', family, builderName };
      }

      layout.place(widget);
      return { arn, status: 'rendered', family, builderName, title: widget.properties.title };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Could not create widget for ARN ${arn}. Builder: ${builderName}. Details: ${message}`);
      return { arn, status: 'failed', family, builderName, error: message };
    }
  }

  private async render(entry: CatalogEntry, input: WidgetBuilderInput): Promise<MetricWidget | null> {
    const { renderer } = entry;
    switch (renderer.kind) {
      case 'static':
        return renderer.build(input);
      case 'probed':
        return renderProbedWidget(renderer.capability, input, this.deps.metricsCatalog, this.deps.logger);
    }
  }

  private async persist(
    request: DashboardRequest,
    widgets: readonly DashboardWidget[],
    summary: Omit<BuildDashboardResult, 'statusCode' | 'dashboard'>
  ): Promise<BuildDashboardResult> {
    const { dashboardStore, logger } = this.deps;
    const dashboard = { name: request.dashboardName, widgets };

    const result = await dashboardStore.putDashboard(request.dashboardName, widgets);
    if (!result.success) {
      const body = `Failed to update dashboard '${request.dashboardName}': ${result.error}`;
      logger.error(body);
      return { ...summary, statusCode: 500, body, dashboard };
    }

    logger.success(`Dashboard ${request.dashboardName} written to ${result.location}`);
    return { ...summary, statusCode: 200, dashboard };
  }
}

export function createBuildDashboardUseCase(
  deps: BuildDashboardDependencies
): BuildDashboardUseCase {
  return new BuildDashboardUseCase(deps);
}
