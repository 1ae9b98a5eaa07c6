import { writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';

/**
 * Writes a Markdown run report and returns its path.
 */
export async function writeRunReport(
  outputDirectory: string,
  dashboardName: string,
  content: string,
  date: Date = new Date()
): Promise<string> {
  const timestamp = date.toISOString().slice(0, 10);
  const safeName = dashboardName.replace(/[^A-Za-z0-9_-]/g, '-');
  const fullPath = join(outputDirectory, `${safeName}-report-${timestamp}.md`);

  await mkdir(outputDirectory, { recursive: true });
  await writeFile(fullPath, content, 'utf-8');
  return fullPath;
}
