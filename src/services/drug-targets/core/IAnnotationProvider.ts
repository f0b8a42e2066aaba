/**
 * @fileoverview Provider interface for the protein-annotation database.
 * @module src/services/drug-targets/core/IAnnotationProvider
 */

import type { RequestContext } from '@/utils/index.js';
import type { TargetKeywords } from '../types.js';

export interface IAnnotationProvider {
  readonly name: string;

  /**
   * Fetch the descriptive keywords of one protein accession.
   * @throws {PipelineError} NetworkError or SchemaError
   */
  fetchKeywords(
    accession: string,
    context: RequestContext,
  ): Promise<TargetKeywords>;
}
