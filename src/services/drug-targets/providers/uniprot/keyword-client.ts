/**
 * @fileoverview UniProt entry client and keyword extraction.
 * @module src/services/drug-targets/providers/uniprot/keyword-client
 */
import { setTimeout as sleep } from 'node:timers/promises';

import type { KeywordSource } from '@/config/index.js';
import { PipelineError, PipelineErrorCode } from '@/types-global/errors.js';
import {
  fetchWithTimeout,
  logger,
  parseJsonResponse,
  type RequestContext,
} from '@/utils/index.js';
import type { TargetKeywords } from '../../types.js';
import {
  DESCRIPTION_CLASSES,
  FAMILY_MARKERS,
  GO_DATABASE,
  GO_MOLECULAR_FUNCTION_PREFIX,
  GO_TERM_PROPERTY,
  SIMILARITY_COMMENT_TYPE,
  entryEndpoint,
  type UniProtClientOptions,
} from './config.js';
import { UniProtEntrySchema, type UniProtEntry } from './types.js';

function keywordNames(entry: UniProtEntry): string[] {
  return entry.keywords?.map((kw) => kw.name) ?? [];
}

function descriptionClasses(entry: UniProtEntry): string[] {
  const fullName =
    entry.proteinDescription?.recommendedName?.fullName.value.toLowerCase();
  if (!fullName) return [];
  return DESCRIPTION_CLASSES.filter(({ term }) => fullName.includes(term)).map(
    ({ keyword }) => keyword,
  );
}

function molecularFunctions(entry: UniProtEntry): string[] {
  const terms: string[] = [];
  for (const ref of entry.uniProtKBCrossReferences ?? []) {
    if (ref.database !== GO_DATABASE) continue;
    const goTerm = ref.properties?.find((p) => p.key === GO_TERM_PROPERTY);
    if (goTerm?.value.startsWith(GO_MOLECULAR_FUNCTION_PREFIX)) {
      terms.push(
        goTerm.value.slice(GO_MOLECULAR_FUNCTION_PREFIX.length).split(';')[0] ??
          '',
      );
    }
  }
  return terms;
}

function proteinFamilies(entry: UniProtEntry): string[] {
  const families: string[] = [];
  for (const comment of entry.comments ?? []) {
    if (comment.commentType !== SIMILARITY_COMMENT_TYPE) continue;
    const text = comment.texts?.[0]?.value;
    if (!text) continue;
    const lower = text.toLowerCase();
    if (FAMILY_MARKERS.some((marker) => lower.includes(marker))) {
      families.push(text.split('.')[0] ?? '');
    }
  }
  return families;
}

const EXTRACTORS: Record<KeywordSource, (entry: UniProtEntry) => string[]> = {
  keywords: keywordNames,
  description: descriptionClasses,
  go: molecularFunctions,
  family: proteinFamilies,
};

/**
 * Collect the keyword set of an entry from the selected sources.
 * @returns Trimmed, non-empty, deduplicated and sorted keywords
 */
export function extractKeywords(
  entry: UniProtEntry,
  sources: readonly KeywordSource[],
): string[] {
  const keywords = new Set<string>();
  for (const source of sources) {
    for (const raw of EXTRACTORS[source](entry)) {
      const keyword = raw.trim();
      if (keyword) keywords.add(keyword);
    }
  }
  return [...keywords].sort();
}

/**
 * Fetch a UniProtKB entry by accession
 */
export async function getEntry(
  accession: string,
  options: UniProtClientOptions,
  context: RequestContext,
): Promise<UniProtEntry> {
  const url = `${options.baseUrl}/${entryEndpoint(accession)}`;
  try {
    const response = await fetchWithTimeout(
      url,
      {
        method: 'GET',
        headers: { Accept: 'application/json' },
        timeout: options.timeoutMs,
      },
      context,
    );
    return await parseJsonResponse(
      response,
      UniProtEntrySchema,
      'UniProt entry',
      context,
    );
  } finally {
    if (options.delayMs > 0) {
      await sleep(options.delayMs);
    }
  }
}

/**
 * Keywords of one accession. An accession UniProt does not know yields an
 * empty keyword set.
 */
export async function fetchKeywords(
  accession: string,
  sources: readonly KeywordSource[],
  options: UniProtClientOptions,
  context: RequestContext,
): Promise<TargetKeywords> {
  let entry: UniProtEntry;
  try {
    entry = await getEntry(accession, options, context);
  } catch (error) {
    if (
      error instanceof PipelineError &&
      error.code === PipelineErrorCode.NotFound
    ) {
      logger.warning('UniProt entry not found, writing empty keywords', {
        ...context,
        accession,
      });
      return { accession, keywords: [] };
    }
    throw error;
  }
  const keywords = extractKeywords(entry, sources);

  logger.debug('UniProt keywords retrieved', {
    ...context,
    accession,
    entryType: entry.entryType,
    keywordCount: keywords.length,
  });

  return { accession, keywords };
}
