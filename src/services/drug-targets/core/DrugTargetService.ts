/**
 * @fileoverview Orchestrates the drug → target → keyword pipeline.
 * Runs sequentially: fetch approved drugs, filter by approval year,
 * resolve targets per drug, then fetch keywords once per distinct target.
 * @module src/services/drug-targets/core/DrugTargetService
 */

import { inject, injectable } from 'tsyringe';

import type { AppConfigType } from '@/config/index.js';
import {
  AnnotationProvider,
  AppConfig,
  DrugProvider,
} from '@/container/tokens.js';
import { isNetworkFailure } from '@/types-global/errors.js';
import {
  logger,
  requestContextService,
  type RequestContext,
} from '@/utils/index.js';
import type { IAnnotationProvider } from './IAnnotationProvider.js';
import type { IDrugProvider } from './IDrugProvider.js';
import { filterApprovedSince } from './date-filter.js';
import type {
  DrugRecord,
  FailedDrug,
  PipelineResult,
  TargetKeywords,
  TargetLink,
} from '../types.js';

export function compareLinks(a: TargetLink, b: TargetLink): number {
  if (a.drugId !== b.drugId) return a.drugId < b.drugId ? -1 : 1;
  if (a.accession !== b.accession) return a.accession < b.accession ? -1 : 1;
  return 0;
}

/**
 * Distinct accessions across all links, sorted.
 */
export function distinctAccessions(links: readonly TargetLink[]): string[] {
  return [...new Set(links.map((link) => link.accession))].sort();
}

@injectable()
export class DrugTargetService {
  constructor(
    @inject(DrugProvider) private drugProvider: IDrugProvider,
    @inject(AnnotationProvider) private annotationProvider: IAnnotationProvider,
    @inject(AppConfig) private config: AppConfigType,
  ) {}

  /**
   * Drugs at the configured phase first approved in or after the configured year
   */
  async collectRecentDrugs(context: RequestContext): Promise<DrugRecord[]> {
    const { maxPhase, minApprovalYear } = this.config.selection;
    logger.info(`Retrieving drugs at phase ${maxPhase} from ${this.drugProvider.name}`, {
      ...context,
      maxPhase,
      minApprovalYear,
    });

    const drugs: DrugRecord[] = [];
    const seen = new Set<string>();
    for await (const drug of filterApprovedSince(
      this.drugProvider.streamApprovedDrugs(maxPhase, context),
      minApprovalYear,
    )) {
      if (seen.has(drug.id)) {
        logger.debug('Skipping drug already seen on an earlier page', {
          ...context,
          drugId: drug.id,
        });
        continue;
      }
      seen.add(drug.id);
      drugs.push(drug);
    }

    logger.info(`Found ${drugs.length} drugs approved since ${minApprovalYear}`, {
      ...context,
      drugCount: drugs.length,
    });
    return drugs;
  }

  /**
   * Resolve targets for every drug. Failures abort or are skipped per
   * `targetFailurePolicy`.
   */
  async resolveAllTargets(
    drugs: readonly DrugRecord[],
    context: RequestContext,
  ): Promise<{ links: TargetLink[]; failedDrugs: FailedDrug[] }> {
    const links: TargetLink[] = [];
    const failedDrugs: FailedDrug[] = [];

    for (const [index, drug] of drugs.entries()) {
      const drugContext = requestContextService.createRequestContext(
        { operation: 'resolveTargets', drugId: drug.id },
        context,
      );
      try {
        links.push(
          ...(await this.drugProvider.resolveTargets(drug, drugContext)),
        );
      } catch (error) {
        if (this.config.targetFailurePolicy === 'abort') throw error;

        const reason = error instanceof Error ? error.message : String(error);
        logger.warning('Target resolution failed, skipping drug', {
          ...drugContext,
          networkFailure: isNetworkFailure(error),
          error,
        });
        failedDrugs.push({ drugId: drug.id, reason });
      }
      this.reportProgress('Processing drugs', index + 1, drugs.length, context);
    }

    return { links: links.sort(compareLinks), failedDrugs };
  }

  /**
   * Fetch keywords once per distinct accession.
   */
  async fetchAllKeywords(
    accessions: readonly string[],
    context: RequestContext,
  ): Promise<TargetKeywords[]> {
    logger.info(`Fetching keywords for ${accessions.length} unique targets`, {
      ...context,
      targetCount: accessions.length,
    });

    const results: TargetKeywords[] = [];
    for (const [index, accession] of accessions.entries()) {
      const targetContext = requestContextService.createRequestContext(
        { operation: 'fetchKeywords', accession },
        context,
      );
      try {
        results.push(
          await this.annotationProvider.fetchKeywords(accession, targetContext),
        );
      } catch (error) {
        if (this.config.targetFailurePolicy === 'abort') throw error;

        // Keep the accession so every target of the link report has a keyword row.
        logger.warning('Keyword lookup failed, writing empty keywords', {
          ...targetContext,
          networkFailure: isNetworkFailure(error),
          error,
        });
        results.push({ accession, keywords: [] });
      }
      this.reportProgress('Fetching keywords', index + 1, accessions.length, context);
    }

    return results;
  }

  /**
   * Run the whole pipeline and return its sorted results.
   */
  async run(parentContext?: RequestContext): Promise<PipelineResult> {
    const context = requestContextService.createRequestContext(
      { operation: 'DrugTargetPipeline' },
      parentContext,
    );

    const drugs = await this.collectRecentDrugs(context);
    const { links, failedDrugs } = await this.resolveAllTargets(drugs, context);
    const keywords = await this.fetchAllKeywords(
      distinctAccessions(links),
      context,
    );

    logger.info('Pipeline complete', {
      ...context,
      drugCount: drugs.length,
      linkCount: links.length,
      targetCount: keywords.length,
      failedDrugCount: failedDrugs.length,
    });

    return { drugs, links, keywords, failedDrugs };
  }

  private reportProgress(
    label: string,
    done: number,
    total: number,
    context: RequestContext,
  ): void {
    if (done % this.config.progressInterval === 0 || done === total) {
      logger.info(`${label}: ${done}/${total}`, { ...context, done, total });
    }
  }
}
