/**
 * Paged Collector
 * Follows continuation links until a list endpoint is exhausted
 */

import type { RetryPolicy } from '../types';
import { GRAPH_API } from '../utils/constants';
import { logger } from '../utils/logger';
import { PageFetchError, RequestError, toErrorMessage } from './errors';
import { ResilientRequestExecutor, describeUri } from './request';

export type ItemDecoder<T> = (raw: unknown, index: number) => T;

export interface PagedCollectorOptions {
  /** Response field holding the page's items. */
  itemsField?: string;
  /** Response field holding the continuation URI. */
  cursorField?: string;
  /** Hard cap on pages; reaching it fails the collection. */
  maxPages?: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

export class PagedCollector<T> {
  private readonly itemsField: string;
  private readonly cursorField: string;
  private readonly maxPages?: number;

  constructor(
    private readonly executor: ResilientRequestExecutor,
    private readonly decodeItem: ItemDecoder<T>,
    options: PagedCollectorOptions = {}
  ) {
    this.itemsField = options.itemsField ?? GRAPH_API.ITEMS_FIELD;
    this.cursorField = options.cursorField ?? GRAPH_API.NEXT_LINK_FIELD;
    this.maxPages = options.maxPages;
  }

  /**
   * Fetch every page starting at `initialUri` and return all items in order.
   * Any page failure aborts the whole collection.
   */
  async collectAll(initialUri: string, policy?: Partial<RetryPolicy>): Promise<T[]> {
    const items: T[] = [];
    let cursor: string | undefined = initialUri;
    let page = 0;

    while (cursor) {
      if (this.maxPages != null && page >= this.maxPages) {
        throw new PageFetchError({
          message: `Collection from ${describeUri(initialUri)} exceeded ${this.maxPages} pages`,
          page: page + 1,
        });
      }
      page += 1;

      const response = await this.fetchPage(cursor, page, policy);
      const rawItems = response[this.itemsField];
      if (!Array.isArray(rawItems)) {
        throw new PageFetchError({
          message: `Page ${page} from ${describeUri(cursor)} has no "${this.itemsField}" array`,
          page,
        });
      }

      for (const raw of rawItems) {
        items.push(this.decode(raw, items.length, page));
      }

      const next = response[this.cursorField];
      cursor = typeof next === 'string' && next !== '' ? next : undefined;
      logger.debug('Collected page', { page, items: rawItems.length, total: items.length, more: cursor != null });
    }

    logger.info('Collection complete', { uri: describeUri(initialUri), pages: page, items: items.length });
    return items;
  }

  private async fetchPage(
    uri: string,
    page: number,
    policy?: Partial<RetryPolicy>
  ): Promise<Record<string, unknown>> {
    let body: unknown;
    try {
      body = await this.executor.execute({ method: 'GET', uri }, policy);
    } catch (error) {
      if (!(error instanceof RequestError)) throw error;
      throw new PageFetchError({
        message: `Failed to fetch page ${page}: ${error.message}`,
        page,
        statusCode: error.statusCode,
        cause: error,
      });
    }

    if (!isRecord(body)) {
      throw new PageFetchError({ message: `Page ${page} from ${describeUri(uri)} is not a JSON object`, page });
    }
    return body;
  }

  private decode(raw: unknown, index: number, page: number): T {
    try {
      return this.decodeItem(raw, index);
    } catch (error) {
      throw new PageFetchError({
        message: `Item ${index} on page ${page} could not be decoded: ${toErrorMessage(error)}`,
        page,
        cause: error,
      });
    }
  }
}

/**
 * Collector that hands items through untouched.
 */
export const createRawCollector = (
  executor: ResilientRequestExecutor,
  options?: PagedCollectorOptions
): PagedCollector<unknown> => new PagedCollector<unknown>(executor, (raw) => raw, options);
