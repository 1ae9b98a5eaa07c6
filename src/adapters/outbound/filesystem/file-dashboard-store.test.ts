import { describe, test, expect } from 'vitest';
import { mkdtemp, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { dashboardFileName, FileDashboardStore } from './file-dashboard-store.js';
import { writeRunReport } from './run-report-writer.js';

describe('dashboardFileName', () => {
  test('replaces unsafe characters', () => {
    expect(dashboardFileName('ops dashboard/prod')).toBe('ops-dashboard-prod.json');
    expect(dashboardFileName('Ops_1-a')).toBe('Ops_1-a.json');
  });
});

describe('FileDashboardStore', () => {
  test('writes the dashboard body as pretty JSON', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'dashboard-store-'));
    const store = new FileDashboardStore(join(dir, 'nested'));

    const result = await store.putDashboard('ops', [
      { type: 'text', x: 0, y: 0, width: 24, height: 1, properties: { markdown: 'hi' } },
    ]);

    const path = join(dir, 'nested', 'ops.json');
    expect(result).toEqual({ success: true, location: path });
    const written = await readFile(path, 'utf-8');
    expect(written.endsWith('}\n')).toBe(true);
    expect(JSON.parse(written)).toEqual({
      widgets: [{ type: 'text', x: 0, y: 0, width: 24, height: 1, properties: { markdown: 'hi' } }],
    });
  });
});

describe('writeRunReport', () => {
  test('names the report after the dashboard and date', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'dashboard-report-'));

    const path = await writeRunReport(dir, 'ops dashboard', '# Report', new Date('2026-03-01T12:00:00Z'));

    expect(path).toBe(join(dir, 'ops-dashboard-report-2026-03-01.md'));
    expect(await readFile(path, 'utf-8')).toBe('# Report');
  });
});
