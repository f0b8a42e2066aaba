/**
 * @fileoverview Streams drug records from the ChEMBL molecule endpoint.
 * @module src/services/drug-targets/providers/chembl/drug-client
 */
import { logger, type RequestContext } from '@/utils/index.js';
import type { DrugRecord } from '../../types.js';
import {
  MOLECULE_ENDPOINT,
  MOLECULE_ORDER_BY,
  type ChemblClientOptions,
} from './config.js';
import { fetchAllPages } from './page-client.js';
import { MoleculeSchema, type ChemblMolecule } from './types.js';

export function buildMoleculeQueryUrl(
  maxPhase: number,
  options: ChemblClientOptions,
): URL {
  const url = new URL(`${options.baseUrl}/${MOLECULE_ENDPOINT}`);
  url.searchParams.set('max_phase', String(maxPhase));
  for (const field of MOLECULE_ORDER_BY) {
    url.searchParams.append('order_by', field);
  }
  url.searchParams.set('limit', String(options.pageSize));
  return url;
}

export function toDrugRecord(molecule: ChemblMolecule): DrugRecord | null {
  if (molecule.max_phase === null) return null;
  return {
    id: molecule.molecule_chembl_id,
    name: molecule.pref_name ?? null,
    maxPhase: molecule.max_phase,
    firstApprovalYear: molecule.first_approval ?? null,
  };
}

/**
 * Stream every molecule at `maxPhase`. Molecules reported at another phase
 * (or none) are dropped.
 */
export async function* streamDrugs(
  maxPhase: number,
  options: ChemblClientOptions,
  context: RequestContext,
): AsyncGenerator<DrugRecord, void, undefined> {
  const url = buildMoleculeQueryUrl(maxPhase, options);

  logger.debug('Querying ChEMBL molecules', {
    ...context,
    maxPhase,
    url: url.toString(),
  });

  let yielded = 0;
  let dropped = 0;
  for await (const molecule of fetchAllPages(
    url,
    'molecules',
    MoleculeSchema,
    options.timeoutMs,
    context,
  )) {
    const record = toDrugRecord(molecule);
    if (!record || record.maxPhase !== maxPhase) {
      dropped += 1;
      logger.debug('Dropping molecule outside requested phase', {
        ...context,
        moleculeId: molecule.molecule_chembl_id,
        maxPhase: molecule.max_phase,
      });
      continue;
    }
    yielded += 1;
    yield record;
  }

  logger.debug('ChEMBL molecule stream complete', {
    ...context,
    yielded,
    dropped,
  });
}
