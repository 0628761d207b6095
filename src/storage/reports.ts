/**
 * Run Report Storage
 *
 * Plain-text run summaries saved to `<dataDir>/reports/`.
 *
 * @module storage/reports
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { isErrnoException } from './atomic.js';

/**
 * Build the report file name for a run finishing at `at` (UTC).
 *
 * @example
 * reportFileName(new Date('2026-03-01T10:04:05Z')); // 'pipeline_report_20260301_100405.txt'
 */
export function reportFileName(at: Date): string {
  const iso = at.toISOString();
  const date = iso.slice(0, 10).replace(/-/g, '');
  const time = iso.slice(11, 19).replace(/:/g, '');
  return `pipeline_report_${date}_${time}.txt`;
}

/**
 * Write a report. Never overwrites an earlier report from the same second.
 *
 * @returns Path of the written report
 */
export async function saveReport(reportsDir: string, text: string, at: Date): Promise<string> {
  await fs.mkdir(reportsDir, { recursive: true });
  const base = reportFileName(at);

  for (let suffix = 0; ; suffix++) {
    const name = suffix === 0 ? base : base.replace(/\.txt$/, `_${suffix}.txt`);
    const filePath = path.join(reportsDir, name);
    try {
      await fs.writeFile(filePath, text.endsWith('\n') ? text : `${text}\n`, {
        encoding: 'utf-8',
        flag: 'wx',
      });
      return filePath;
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') {
        throw error;
      }
    }
  }
}

/**
 * List saved reports, newest first.
 */
export async function listReports(reportsDir: string): Promise<string[]> {
  try {
    const names = await fs.readdir(reportsDir);
    return names
      .filter((name) => name.startsWith('pipeline_report_') && name.endsWith('.txt'))
      .sort()
      .reverse()
      .map((name) => path.join(reportsDir, name));
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}
