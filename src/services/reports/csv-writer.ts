/**
 * @fileoverview Serialises pipeline results into the two CSV reports.
 * @module src/services/reports/csv-writer
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type {
  PipelineResult,
  ReportPaths,
  TargetKeywords,
  TargetLink,
} from '@/services/drug-targets/types.js';
import { logger, type RequestContext } from '@/utils/index.js';

export const DRUG_TARGETS_FILE = 'drug_targets.csv';
export const TARGET_KEYWORDS_FILE = 'target_keywords.csv';

export const DRUG_TARGETS_HEADER = [
  'drug_identifier',
  'drug_name',
  'target_accession',
] as const;
export const TARGET_KEYWORDS_HEADER = ['target_accession', 'keywords'] as const;

export const KEYWORD_DELIMITER = ', ';

export function escapeCsvField(value: string | number | null | undefined): string {
  if (value == null) return '';
  const str = String(value);
  if (/[",\r\n]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * Header plus one line per row, `\n`-terminated.
 */
export function toCsv(
  header: readonly string[],
  rows: ReadonlyArray<ReadonlyArray<string | number | null>>,
): string {
  const lines: ReadonlyArray<ReadonlyArray<string | number | null>> = [
    header,
    ...rows,
  ];
  return lines
    .map((row) => row.map(escapeCsvField).join(','))
    .map((line) => `${line}\n`)
    .join('');
}

export function drugTargetsCsv(links: readonly TargetLink[]): string {
  return toCsv(
    DRUG_TARGETS_HEADER,
    links.map((link) => [link.drugId, link.drugName, link.accession]),
  );
}

export function targetKeywordsCsv(keywords: readonly TargetKeywords[]): string {
  return toCsv(
    TARGET_KEYWORDS_HEADER,
    keywords.map((entry) => [
      entry.accession,
      entry.keywords.join(KEYWORD_DELIMITER),
    ]),
  );
}

/**
 * Write both reports into `outputDir`, replacing existing files.
 */
export async function writeReports(
  result: Pick<PipelineResult, 'links' | 'keywords'>,
  outputDir: string,
  context: RequestContext,
): Promise<ReportPaths> {
  await mkdir(outputDir, { recursive: true });

  const paths: ReportPaths = {
    drugTargets: join(outputDir, DRUG_TARGETS_FILE),
    targetKeywords: join(outputDir, TARGET_KEYWORDS_FILE),
  };

  await writeFile(paths.drugTargets, drugTargetsCsv(result.links), 'utf8');
  await writeFile(
    paths.targetKeywords,
    targetKeywordsCsv(result.keywords),
    'utf8',
  );

  logger.info('Reports written', {
    ...context,
    ...paths,
    drugTargetRows: result.links.length,
    targetKeywordRows: result.keywords.length,
  });

  return paths;
}
