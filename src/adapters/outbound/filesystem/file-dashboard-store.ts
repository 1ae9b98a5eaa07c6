import { writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { DashboardWidget } from '../../../domain/entities/widget.js';
import type {
  DashboardStorePort,
  DashboardWriteResult,
} from '../../../ports/outbound/dashboard-store-port.js';

/**
 * File name for a dashboard; anything outside [A-Za-z0-9_-] becomes '-'.
 */
export function dashboardFileName(name: string): string {
  return `${name.replace(/[^A-Za-z0-9_-]/g, '-')}.json`;
}

/**
 * Dry-run store: writes the dashboard body to disk instead of CloudWatch.
 */
export class FileDashboardStore implements DashboardStorePort {
  private outputDirectory: string;

  constructor(outputDirectory: string) {
    this.outputDirectory = outputDirectory;
  }

  async putDashboard(
    name: string,
    widgets: readonly DashboardWidget[]
  ): Promise<DashboardWriteResult> {
    const fullPath = join(this.outputDirectory, dashboardFileName(name));

    try {
      await mkdir(this.outputDirectory, { recursive: true });
      await writeFile(fullPath, `${JSON.stringify({ widgets }, null, 2)}\n`, 'utf-8');
      return { success: true, location: fullPath };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      return { success: false, error: errorMessage };
    }
  }
}
