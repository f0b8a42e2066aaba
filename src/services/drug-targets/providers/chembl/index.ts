/**
 * @fileoverview ChEMBL provider: approved drugs and their protein targets.
 * @module src/services/drug-targets/providers/chembl
 */

import { inject, injectable } from 'tsyringe';

import type { AppConfigType } from '@/config/index.js';
import { AppConfig } from '@/container/tokens.js';
import { PipelineError, PipelineErrorCode } from '@/types-global/errors.js';
import type { RequestContext } from '@/utils/index.js';
import type { IDrugProvider } from '../../core/IDrugProvider.js';
import type { DrugRecord, TargetLink } from '../../types.js';
import type { ChemblClientOptions } from './config.js';
import * as drugClient from './drug-client.js';
import * as targetClient from './target-client.js';

@injectable()
export class ChemblDrugProvider implements IDrugProvider {
  public readonly name = 'ChEMBL';
  private readonly options: ChemblClientOptions;

  constructor(@inject(AppConfig) config: AppConfigType) {
    this.options = {
      baseUrl: config.chembl.baseUrl,
      pageSize: config.chembl.pageSize,
      timeoutMs: config.request.timeoutMs,
    };
  }

  streamApprovedDrugs(
    maxPhase: number,
    context: RequestContext,
  ): AsyncGenerator<DrugRecord, void, undefined> {
    return drugClient.streamDrugs(maxPhase, this.options, context);
  }

  async resolveTargets(
    drug: DrugRecord,
    context: RequestContext,
  ): Promise<TargetLink[]> {
    try {
      return await targetClient.resolveTargets(drug, this.options, context);
    } catch (error) {
      if (error instanceof PipelineError) throw error;

      throw new PipelineError(
        PipelineErrorCode.InternalError,
        `Failed to resolve targets for ${drug.id}: ${error instanceof Error ? error.message : String(error)}`,
        { requestId: context.requestId, drugId: drug.id },
      );
    }
  }
}
