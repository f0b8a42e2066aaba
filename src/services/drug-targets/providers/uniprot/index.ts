/**
 * @fileoverview UniProt provider for protein keyword annotations.
 * @module src/services/drug-targets/providers/uniprot
 */

import { inject, injectable } from 'tsyringe';

import type { AppConfigType, KeywordSource } from '@/config/index.js';
import { AppConfig } from '@/container/tokens.js';
import { PipelineError, PipelineErrorCode } from '@/types-global/errors.js';
import type { RequestContext } from '@/utils/index.js';
import type { IAnnotationProvider } from '../../core/IAnnotationProvider.js';
import type { TargetKeywords } from '../../types.js';
import type { UniProtClientOptions } from './config.js';
import * as keywordClient from './keyword-client.js';

@injectable()
export class UniProtAnnotationProvider implements IAnnotationProvider {
  public readonly name = 'UniProt';
  private readonly options: UniProtClientOptions;
  private readonly sources: readonly KeywordSource[];

  constructor(@inject(AppConfig) config: AppConfigType) {
    this.options = {
      baseUrl: config.uniprot.baseUrl,
      timeoutMs: config.request.timeoutMs,
      delayMs: config.request.delayMs,
    };
    this.sources = config.keywordSources;
  }

  /**
   * Fetch keywords by UniProt accession
   */
  async fetchKeywords(
    accession: string,
    context: RequestContext,
  ): Promise<TargetKeywords> {
    try {
      return await keywordClient.fetchKeywords(
        accession,
        this.sources,
        this.options,
        context,
      );
    } catch (error) {
      if (error instanceof PipelineError) throw error;

      throw new PipelineError(
        PipelineErrorCode.InternalError,
        `Failed to fetch keywords from UniProt: ${error instanceof Error ? error.message : String(error)}`,
        { requestId: context.requestId, accession },
      );
    }
  }
}
