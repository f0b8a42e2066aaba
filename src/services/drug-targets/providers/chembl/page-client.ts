/**
 * @fileoverview Iterates ChEMBL list endpoints page by page using `page_meta.next`.
 * @module src/services/drug-targets/providers/chembl/page-client
 */
import { z } from 'zod';

import {
  fetchWithTimeout,
  logger,
  parseJsonResponse,
  validateWith,
  type RequestContext,
} from '@/utils/index.js';
import { PageMetaSchema } from './types.js';

const PageEnvelopeSchema = z
  .object({ page_meta: PageMetaSchema })
  .catchall(z.unknown());

/**
 * Yields every item of a paginated ChEMBL collection.
 *
 * @param firstPageUrl - Fully built URL of the first page
 * @param collectionKey - Name of the array in the page body (`molecules`, `mechanisms`, ...)
 * @param itemSchema - Schema each item must match
 */
export async function* fetchAllPages<S extends z.ZodTypeAny>(
  firstPageUrl: URL,
  collectionKey: string,
  itemSchema: S,
  timeoutMs: number,
  context: RequestContext,
): AsyncGenerator<z.output<S>, void, undefined> {
  const itemsSchema = z.array(itemSchema);
  let url: URL | null = firstPageUrl;
  let pageNumber = 0;

  while (url) {
    pageNumber += 1;
    const response = await fetchWithTimeout(
      url,
      {
        method: 'GET',
        headers: { Accept: 'application/json' },
        timeout: timeoutMs,
      },
      context,
    );
    const page = await parseJsonResponse(
      response,
      PageEnvelopeSchema,
      `ChEMBL ${collectionKey} page`,
      context,
    );
    const items = validateWith(
      itemsSchema,
      page[collectionKey],
      `ChEMBL ${collectionKey} list`,
      context,
    );

    logger.debug('ChEMBL page received', {
      ...context,
      collectionKey,
      pageNumber,
      offset: page.page_meta.offset,
      totalCount: page.page_meta.total_count,
      itemCount: items.length,
    });

    yield* items;

    // `next` is a site-absolute path such as /chembl/api/data/molecule.json?...
    url = page.page_meta.next ? new URL(page.page_meta.next, firstPageUrl) : null;
  }
}
