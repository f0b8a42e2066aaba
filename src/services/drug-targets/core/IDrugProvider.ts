/**
 * @fileoverview Provider interface for the drug database: approved drugs and their targets.
 * @module src/services/drug-targets/core/IDrugProvider
 */

import type { RequestContext } from '@/utils/index.js';
import type { DrugRecord, TargetLink } from '../types.js';

export interface IDrugProvider {
  /**
   * Human-readable provider name
   */
  readonly name: string;

  /**
   * Stream every drug at the given maximal phase, one page at a time.
   * Each call starts a new query from the first page.
   * @throws {PipelineError} NetworkError on transport failure, SchemaError on malformed records
   */
  streamApprovedDrugs(
    maxPhase: number,
    context: RequestContext,
  ): AsyncGenerator<DrugRecord, void, undefined>;

  /**
   * Resolve a drug's protein targets. Unresolvable targets are omitted.
   * @returns Links sorted by accession, one per distinct accession
   * @throws {PipelineError} NetworkError on transport failure, SchemaError on malformed records
   */
  resolveTargets(
    drug: DrugRecord,
    context: RequestContext,
  ): Promise<TargetLink[]>;
}
