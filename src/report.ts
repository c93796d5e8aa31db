import { Logger } from './logger';
import { MigrationResult, MigrationStatus } from './types';

export function countByStatus(results: MigrationResult[]): Record<MigrationStatus, number> {
  const counts: Record<MigrationStatus, number> = { Successful: 0, Skipped: 0, Failed: 0, DryRun: 0 };
  for (const r of results) counts[r.status]++;
  return counts;
}

export function formatResults(results: MigrationResult[]): string[] {
  if (!results.length) return [];
  const rows = results.map(r => [r.type, r.name, r.status, r.notes ?? '']);
  const header = ['Type', 'Name', 'Status', 'Notes'];
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map(row => row[i].length)));
  const line = (cells: string[]) => cells.map((c, i) => c.padEnd(widths[i])).join('  ').trimEnd();
  return [line(header), line(widths.map(w => '-'.repeat(w))), ...rows.map(line)];
}

export function logSummary(results: MigrationResult[], logger: Logger): void {
  for (const l of formatResults(results)) logger.info(l);
  const c = countByStatus(results);
  logger.info(`${c.Successful} successful, ${c.Skipped} skipped, ${c.Failed} failed, ${c.DryRun} dry-run`);
}
