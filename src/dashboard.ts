import fs from 'fs';
import path from 'path';
import ejs from 'ejs';
import type { AnalysisReport, FailureSummary } from './types';

export const TEMPLATES_DIR = path.resolve(__dirname, '..', 'templates');
export const REPORT_FILE = 'failure_report.html';

export type ReportData = {
  summary: FailureSummary;
  reports: AnalysisReport[];
  generatedAt?: string;
};

// Static HTML report (summary + one card per analyzed failure)
export async function renderReport(data: ReportData, outDir = 'out/report', templatesDir = TEMPLATES_DIR) {
  const tpl = await fs.promises.readFile(path.join(templatesDir, 'report.ejs'), 'utf-8');
  const html = ejs.render(tpl, {
    generatedAt: data.generatedAt ?? new Date().toISOString(),
    summary: data.summary,
    reports: data.reports,
    pct: (n: number) => `${(n * 100).toFixed(1)}%`,
  });

  await fs.promises.mkdir(outDir, { recursive: true });
  const outFile = path.join(outDir, REPORT_FILE);
  await fs.promises.writeFile(outFile, html, 'utf-8');
  await fs.promises.copyFile(path.join(templatesDir, 'report.css'), path.join(outDir, 'report.css'));
  return outFile;
}
