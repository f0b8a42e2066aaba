/**
 * @fileoverview Unit tests for UniProt keyword retrieval and extraction.
 * @module tests/services/drug-targets/providers/uniprot/keyword-client.test
 */
import { describe, expect, it } from 'vitest';

import { UniProtAnnotationProvider } from '@/services/drug-targets/providers/uniprot/index.js';
import { extractKeywords } from '@/services/drug-targets/providers/uniprot/keyword-client.js';
import type { UniProtEntry } from '@/services/drug-targets/providers/uniprot/types.js';
import { PipelineErrorCode } from '@/types-global/errors.js';
import { makeContext, makeTestConfig } from '../../../../helpers/config.js';
import { requestedPaths, stubFetch } from '../../../../helpers/stubFetch.js';

const receptorEntry: UniProtEntry = {
  primaryAccession: 'P11111',
  entryType: 'UniProtKB reviewed (Swiss-Prot)',
  proteinDescription: {
    recommendedName: { fullName: { value: 'Test adrenergic receptor beta' } },
  },
  keywords: [
    { id: 'KW-0001', category: 'Cellular component', name: 'Cell membrane' },
    { id: 'KW-0002', category: 'Molecular function', name: 'G-protein coupled receptor' },
    { id: 'KW-0003', category: 'Molecular function', name: 'Transducer' },
  ],
  uniProtKBCrossReferences: [
    {
      database: 'GO',
      id: 'GO:0000001',
      properties: [
        { key: 'GoTerm', value: 'F:G protein-coupled receptor activity' },
        { key: 'GoEvidenceType', value: 'IDA:UniProtKB' },
      ],
    },
    {
      database: 'GO',
      id: 'GO:0000002',
      properties: [{ key: 'GoTerm', value: 'P:signal transduction' }],
    },
    {
      database: 'GO',
      id: 'GO:0000003',
      properties: [{ key: 'GoTerm', value: 'F:ATP binding' }],
    },
    { database: 'PDB', id: '9ZZZ', properties: [{ key: 'Method', value: 'X-ray' }] },
  ],
  comments: [
    {
      commentType: 'FUNCTION',
      texts: [{ value: 'Receptor for test ligands.' }],
    },
    {
      commentType: 'SIMILARITY',
      texts: [
        {
          value:
            'Belongs to the G-protein coupled receptor 1 family. Adrenergic receptor subfamily.',
        },
      ],
    },
  ],
};

describe('extractKeywords', () => {
  it('merges every source into a sorted set', () => {
    expect(
      extractKeywords(receptorEntry, ['keywords', 'description', 'go', 'family']),
    ).toEqual([
      'ATP binding',
      'Belongs to the G-protein coupled receptor 1 family',
      'Cell membrane',
      'G protein-coupled receptor activity',
      'G-protein coupled receptor',
      'Receptor',
      'Transducer',
    ]);
  });

  it('uses only the selected sources', () => {
    expect(extractKeywords(receptorEntry, ['keywords'])).toEqual([
      'Cell membrane',
      'G-protein coupled receptor',
      'Transducer',
    ]);
    expect(extractKeywords(receptorEntry, ['description', 'go'])).toEqual([
      'ATP binding',
      'G protein-coupled receptor activity',
      'Receptor',
    ]);
  });

  it('derives several classes from one description', () => {
    const entry: UniProtEntry = {
      primaryAccession: 'Q44444',
      proteinDescription: {
        recommendedName: {
          fullName: { value: 'Sodium channel transporter-like enzyme' },
        },
      },
    };
    expect(extractKeywords(entry, ['description'])).toEqual([
      'Channel',
      'Enzyme',
      'Transporter',
    ]);
  });

  it('trims and deduplicates keywords', () => {
    const entry: UniProtEntry = {
      primaryAccession: 'Q55555',
      keywords: [{ name: ' Kinase ' }, { name: 'Kinase' }, { name: '   ' }],
    };
    expect(extractKeywords(entry, ['keywords'])).toEqual(['Kinase']);
  });

  it('ignores similarity comments that name no family', () => {
    const entry: UniProtEntry = {
      primaryAccession: 'Q66666',
      comments: [
        { commentType: 'SIMILARITY', texts: [{ value: 'Weakly similar to something.' }] },
      ],
    };
    expect(extractKeywords(entry, ['family'])).toEqual([]);
  });

  it('returns an empty set for an unannotated entry', () => {
    expect(
      extractKeywords({ primaryAccession: 'Q77777' }, [
        'keywords',
        'description',
        'go',
        'family',
      ]),
    ).toEqual([]);
  });
});

describe('UniProtAnnotationProvider.fetchKeywords', () => {
  const context = makeContext();

  it('requests the entry JSON and returns its keywords', async () => {
    const fetchMock = stubFetch({
      '/uniprotkb/P11111.json': { body: receptorEntry },
    });
    const provider = new UniProtAnnotationProvider(
      makeTestConfig({ KEYWORD_SOURCES: 'keywords,description' }),
    );

    await expect(provider.fetchKeywords('P11111', context)).resolves.toEqual({
      accession: 'P11111',
      keywords: ['Cell membrane', 'G-protein coupled receptor', 'Receptor', 'Transducer'],
    });
    expect(requestedPaths(fetchMock)).toEqual(['/uniprotkb/P11111.json']);
    expect(fetchMock.mock.calls[0]?.[1]).toMatchObject({
      method: 'GET',
      headers: { Accept: 'application/json' },
    });
  });

  it('returns an empty keyword set for an accession UniProt does not know', async () => {
    const fetchMock = stubFetch({});
    const provider = new UniProtAnnotationProvider(makeTestConfig());

    await expect(provider.fetchKeywords('P99999', context)).resolves.toEqual({
      accession: 'P99999',
      keywords: [],
    });
    expect(requestedPaths(fetchMock)).toEqual(['/uniprotkb/P99999.json']);
  });

  it('fails with NetworkError when UniProt answers 500', async () => {
    stubFetch({ '/uniprotkb/P11111.json': { status: 500, body: {} } });
    const provider = new UniProtAnnotationProvider(makeTestConfig());

    await expect(provider.fetchKeywords('P11111', context)).rejects.toMatchObject({
      code: PipelineErrorCode.NetworkError,
    });
  });

  it('fails with SchemaError when the entry has no accession', async () => {
    stubFetch({ '/uniprotkb/P11111.json': { body: { keywords: [] } } });
    const provider = new UniProtAnnotationProvider(makeTestConfig());

    await expect(provider.fetchKeywords('P11111', context)).rejects.toMatchObject({
      code: PipelineErrorCode.SchemaError,
    });
  });
});
