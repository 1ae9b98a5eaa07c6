/**
 * Dashboard Layout
 *
 * Stacks widgets top to bottom with a single forward-only cursor.
 */

import type { CustomWidget, DashboardWidget, TextWidget } from '../entities/widget.js';
import { DASHBOARD_WIDTH, DEFAULT_WIDGET_HEIGHT } from '../entities/widget.js';
import type { JsonObject } from '../value-objects/json.js';
import { isJsonObject } from '../value-objects/json.js';

export const SECTION_DIVIDER_MARKDOWN = '--- \n ### **Individual Resource Metrics**';
export const NO_RESOURCES_BODY = 'No tagged resources found.';

/**
 * Height used to advance the cursor; widgets without a numeric height take
 * the default.
 */
export function heightOf(widget: DashboardWidget): number {
  const height = widget['height'];
  return typeof height === 'number' ? height : DEFAULT_WIDGET_HEIGHT;
}

/**
 * Moves a configured widget to row `y` and points it at the dashboard
 * region. Everything else is passed through untouched.
 */
export function positionCustomWidget(widget: CustomWidget, y: number, region: string): CustomWidget {
  const properties = widget['properties'];
  if (!isJsonObject(properties)) {
    return { ...widget, y };
  }
  const regional: JsonObject = { ...properties, region };
  return { ...widget, y, properties: regional };
}

export function placeholderWidgets(tagKey: string, tagValue: string): readonly TextWidget[] {
  return [
    {
      type: 'text',
      x: 0,
      y: 0,
      width: DASHBOARD_WIDTH,
      height: 2,
      properties: { markdown: `# No resources found with tag: \`${tagKey}:${tagValue}\`` },
    },
  ];
}

export class DashboardLayout {
  private readonly placed: DashboardWidget[] = [];
  private y = 0;

  get cursor(): number {
    return this.y;
  }

  get widgets(): readonly DashboardWidget[] {
    return this.placed;
  }

  /**
   * Widgets that share one row, already positioned at the current cursor.
   */
  placeRow(row: readonly DashboardWidget[], height: number): void {
    this.placed.push(...row);
    this.y += height;
  }

  place(widget: DashboardWidget): void {
    this.placeRow([widget], heightOf(widget));
  }

  addSectionDivider(): void {
    const divider: TextWidget = {
      type: 'text',
      x: 0,
      y: this.y,
      width: DASHBOARD_WIDTH,
      height: 1,
      properties: { markdown: SECTION_DIVIDER_MARKDOWN },
    };
    this.place(divider);
  }

  appendCustomWidgets(definitions: readonly CustomWidget[], region: string): void {
    for (const definition of definitions) {
      this.place(positionCustomWidget(definition, this.y, region));
    }
  }
}
