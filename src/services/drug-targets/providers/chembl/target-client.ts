/**
 * @fileoverview Resolves a drug's protein targets through ChEMBL mechanisms and target components.
 * @module src/services/drug-targets/providers/chembl/target-client
 */
import { PipelineError, PipelineErrorCode } from '@/types-global/errors.js';
import {
  fetchWithTimeout,
  logger,
  parseJsonResponse,
  type RequestContext,
} from '@/utils/index.js';
import type { DrugRecord, TargetLink } from '../../types.js';
import {
  EXCLUDED_ACCESSION_PREFIXES,
  MECHANISM_ENDPOINT,
  targetEndpoint,
  type ChemblClientOptions,
} from './config.js';
import { fetchAllPages } from './page-client.js';
import { MechanismSchema, TargetSchema, type ChemblTarget } from './types.js';

export function isProteinAccession(accession: string | null | undefined): accession is string {
  if (!accession) return false;
  const trimmed = accession.trim();
  return (
    trimmed.length > 0 &&
    !EXCLUDED_ACCESSION_PREFIXES.some((prefix) => trimmed.startsWith(prefix))
  );
}

/**
 * Distinct target ids named by the drug's mechanisms of action, in first-seen order.
 */
export async function listMechanismTargets(
  drugId: string,
  options: ChemblClientOptions,
  context: RequestContext,
): Promise<string[]> {
  const url = new URL(`${options.baseUrl}/${MECHANISM_ENDPOINT}`);
  url.searchParams.set('molecule_chembl_id', drugId);
  url.searchParams.set('limit', String(options.pageSize));

  const targetIds = new Set<string>();
  for await (const mechanism of fetchAllPages(
    url,
    'mechanisms',
    MechanismSchema,
    options.timeoutMs,
    context,
  )) {
    if (mechanism.target_chembl_id) {
      targetIds.add(mechanism.target_chembl_id);
    }
  }
  return [...targetIds];
}

/**
 * Fetch one target record. Returns null when ChEMBL has no such target.
 */
export async function getTarget(
  targetId: string,
  options: ChemblClientOptions,
  context: RequestContext,
): Promise<ChemblTarget | null> {
  try {
    const response = await fetchWithTimeout(
      `${options.baseUrl}/${targetEndpoint(targetId)}`,
      {
        method: 'GET',
        headers: { Accept: 'application/json' },
        timeout: options.timeoutMs,
      },
      context,
    );
    return await parseJsonResponse(
      response,
      TargetSchema,
      'ChEMBL target',
      context,
    );
  } catch (error) {
    if (
      error instanceof PipelineError &&
      error.code === PipelineErrorCode.NotFound
    ) {
      logger.debug('ChEMBL target not found, skipping', {
        ...context,
        targetId,
      });
      return null;
    }
    throw error;
  }
}

/**
 * Resolve every UniProt accession targeted by `drug`.
 */
export async function resolveTargets(
  drug: DrugRecord,
  options: ChemblClientOptions,
  context: RequestContext,
): Promise<TargetLink[]> {
  const targetIds = await listMechanismTargets(drug.id, options, context);
  const accessions = new Set<string>();

  for (const targetId of targetIds) {
    const target = await getTarget(targetId, options, context);
    if (!target) continue;
    for (const component of target.target_components) {
      if (isProteinAccession(component.accession)) {
        accessions.add(component.accession.trim());
      }
    }
  }

  logger.debug('Resolved drug targets', {
    ...context,
    drugId: drug.id,
    targetIds,
    accessionCount: accessions.size,
  });

  return [...accessions].sort().map((accession) => ({
    drugId: drug.id,
    drugName: drug.name,
    accession,
  }));
}
