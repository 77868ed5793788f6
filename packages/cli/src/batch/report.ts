/**
 * Plain-text batch report.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { PLATFORM_NAME } from '@giftcheck/shared';
import type { LookupOutcome } from '../api/types.js';
import { formatCompactTimestamp, formatReportTimestamp } from '../utils.js';
import type { BatchReport, OutcomeCategory } from './runner.js';

const RULE = '='.repeat(70);
const DIVIDER = '-'.repeat(70);

interface SectionFormat {
  title: string;
  fields: (outcome: LookupOutcome) => string[];
  footer?: string[];
}

const SECTIONS: ReadonlyArray<[OutcomeCategory, SectionFormat]> = [
  [
    'claimable',
    {
      title: '✅ CLAIMABLE CODES',
      fields: (r) => [`Code: ${r.code}`, `Plan: ${r.plan ?? 'N/A'}`, `Status: ${r.message}`],
    },
  ],
  [
    'claimed',
    {
      title: '❌ CLAIMED CODES',
      fields: (r) => [`Code: ${r.code}`, `Plan: ${r.plan ?? 'N/A'}`],
    },
  ],
  [
    'invalid',
    {
      title: '⚠️ INVALID CODES',
      fields: (r) => [`Code: ${r.code}`],
    },
  ],
  [
    'rate_limited',
    {
      title: '⏳ RATE LIMITED CODES',
      fields: (r) => [`Code: ${r.code}`, `Message: ${r.message}`],
      footer: [
        '💡 TIP: Re-run these codes with a higher delay (3-5 seconds)',
        `to avoid ${PLATFORM_NAME}'s rate limits.`,
      ],
    },
  ],
  [
    'error',
    {
      title: '❌ ERROR CODES',
      fields: (r) => [`Code: ${r.code}`, `Message: ${r.message}`],
    },
  ],
];

/**
 * Render a finished report. Empty categories are left out.
 */
export function formatReport(report: BatchReport, generatedAt: Date): string {
  let out = `${RULE}\n`;
  out += `${PLATFORM_NAME} Gift Code Check Results - ${formatReportTimestamp(generatedAt)}\n`;
  out += `${RULE}\n\n`;

  for (const [category, section] of SECTIONS) {
    const entries = report[category];
    if (entries.length === 0) continue;

    out += `${section.title} (${String(entries.length)}):\n`;
    out += `${DIVIDER}\n`;
    for (const entry of entries) {
      out += section.fields(entry).map((line) => `${line}\n`).join('');
      out += `${DIVIDER}\n`;
    }
    // The error section closes the report without a blank line
    if (category !== 'error') {
      out += '\n';
    }
    if (section.footer != null) {
      out += section.footer.map((line) => `${line}\n`).join('');
      out += '\n';
    }
  }

  return out;
}

/**
 * Default report file name, e.g. results_20260105_090307.txt
 */
export function defaultReportFilename(now: Date): string {
  return `results_${formatCompactTimestamp(now)}.txt`;
}

export function resolveReportPath(output: string | undefined, outputDir: string, now: Date): string {
  if (output != null && output !== '') {
    return path.resolve(output);
  }
  return path.resolve(outputDir, defaultReportFilename(now));
}

/**
 * Write the report to destination. The file either holds the whole report
 * or is left untouched.
 */
export function writeReport(report: BatchReport, destination: string, generatedAt: Date): void {
  const content = formatReport(report, generatedAt);
  const dir = path.dirname(destination);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const tempPath = `${destination}.${String(process.pid)}.tmp`;
  try {
    fs.writeFileSync(tempPath, content, 'utf-8');
    fs.renameSync(tempPath, destination);
  } catch (err) {
    fs.rmSync(tempPath, { force: true });
    throw err;
  }
}
