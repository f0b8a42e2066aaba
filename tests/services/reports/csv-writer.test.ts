/**
 * @fileoverview Unit tests for CSV report serialisation.
 * @module tests/services/reports/csv-writer.test
 */
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  drugTargetsCsv,
  escapeCsvField,
  targetKeywordsCsv,
  toCsv,
  writeReports,
} from '@/services/reports/csv-writer.js';
import { makeContext } from '../../helpers/config.js';

describe('escapeCsvField', () => {
  it('leaves plain values alone', () => {
    expect(escapeCsvField('CHEMBL25')).toBe('CHEMBL25');
    expect(escapeCsvField(2019)).toBe('2019');
  });

  it('writes null as an empty field', () => {
    expect(escapeCsvField(null)).toBe('');
  });

  it('quotes commas, quotes and line breaks', () => {
    expect(escapeCsvField('a, b')).toBe('"a, b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('line\nbreak')).toBe('"line\nbreak"');
  });
});

describe('toCsv', () => {
  it('writes a header even without rows', () => {
    expect(toCsv(['a', 'b'], [])).toBe('a,b\n');
  });
});

describe('drugTargetsCsv', () => {
  it('writes one row per drug-target pair', () => {
    expect(
      drugTargetsCsv([
        { drugId: 'CHEMBL1', drugName: 'ALPHA', accession: 'P1' },
        { drugId: 'CHEMBL1', drugName: 'ALPHA', accession: 'P2' },
        { drugId: 'CHEMBL2', drugName: null, accession: 'P1' },
      ]),
    ).toBe(
      'drug_identifier,drug_name,target_accession\n' +
        'CHEMBL1,ALPHA,P1\n' +
        'CHEMBL1,ALPHA,P2\n' +
        'CHEMBL2,,P1\n',
    );
  });
});

describe('targetKeywordsCsv', () => {
  it('joins keywords and keeps targets without any', () => {
    expect(
      targetKeywordsCsv([
        { accession: 'P1', keywords: ['Kinase'] },
        { accession: 'P2', keywords: [] },
        { accession: 'P3', keywords: ['Receptor', 'Transducer'] },
      ]),
    ).toBe(
      'target_accession,keywords\n' +
        'P1,Kinase\n' +
        'P2,\n' +
        'P3,"Receptor, Transducer"\n',
    );
  });
});

describe('writeReports', () => {
  const context = makeContext();
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), 'reports-'));
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  it('creates the output directory and overwrites existing reports', async () => {
    const nested = join(outputDir, 'out');
    await writeReports({ links: [], keywords: [] }, nested, context);
    await writeFile(join(nested, 'target_keywords.csv'), 'stale contents\n');

    const paths = await writeReports(
      {
        links: [{ drugId: 'CHEMBL1', drugName: 'ALPHA', accession: 'P1' }],
        keywords: [{ accession: 'P1', keywords: [] }],
      },
      nested,
      context,
    );

    await expect(readFile(paths.drugTargets, 'utf8')).resolves.toBe(
      'drug_identifier,drug_name,target_accession\nCHEMBL1,ALPHA,P1\n',
    );
    await expect(readFile(paths.targetKeywords, 'utf8')).resolves.toBe(
      'target_accession,keywords\nP1,\n',
    );
  });
});
