import path from 'node:path';
import fs from 'fs-extra';
import type { RunReport } from '../../shared/types/artifact.js';

type CsvRow = [outcome: string, key: string, detail: string];

export const reportRows = (report: RunReport): CsvRow[] => [
  ...report.built.map((key): CsvRow => ['built', key, '']),
  ...report.planned.map((key): CsvRow => ['planned', key, '']),
  ...report.skipped.map(({ key, reason }): CsvRow => ['skipped', key, reason]),
  ...report.pulled.map((key): CsvRow => ['pulled', key, '']),
  ...report.evicted.map((key): CsvRow => ['evicted', key, '']),
  ...report.published.map((key): CsvRow => ['published', key, '']),
  ...report.errors.map(({ key, kind, message }): CsvRow => ['error', key, `${kind}: ${message}`])
];

const csvCell = (value: string): string => `"${value.replace(/"/g, '""')}"`;

export const buildCsv = (report: RunReport): string =>
  [['outcome', 'key', 'detail'], ...reportRows(report)].map((cols) => cols.map(csvCell).join(',')).join('\n');

export class ReportService {
  constructor(private readonly reportDir: string) {}

  async create(report: RunReport): Promise<string> {
    await fs.ensureDir(this.reportDir);
    const timestamp = report.startedAt.replace(/[:.]/g, '-');
    const jsonPath = path.join(this.reportDir, `run-${timestamp}.json`);
    const csvPath = path.join(this.reportDir, `run-${timestamp}.csv`);

    await fs.writeJson(jsonPath, { ...report, reportPath: jsonPath }, { spaces: 2 });
    await fs.writeFile(csvPath, buildCsv(report));

    return jsonPath;
  }
}
