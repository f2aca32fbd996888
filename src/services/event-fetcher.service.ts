import type { Logger } from '../types/logger.types.js';
import type { LogQueryClient, LogRecord, TimeWindow } from '../types/log.types.js';

export interface FetchQuery {
  sourceId: string;
  window: TimeWindow;
  filterPattern?: string;
}

export interface FetchResult {
  records: LogRecord[];
  pageCount: number;
}

/**
 * Pages through the log-query API until a response carries no continuation
 * token. Pages are requested one at a time, and records keep the order the API
 * returned them in. A failed page rejects the whole fetch.
 */
export class EventFetcherService {
  constructor(
    private readonly client: LogQueryClient,
    private readonly logger: Logger
  ) {}

  async fetchAll(query: FetchQuery): Promise<FetchResult> {
    const records: LogRecord[] = [];
    let pageCount = 0;
    let nextToken: string | undefined;

    do {
      const page = await this.client.filterLogEvents({
        sourceId: query.sourceId,
        startMs: query.window.startMs,
        endMs: query.window.endMs,
        ...(query.filterPattern ? { filterPattern: query.filterPattern } : {}),
        ...(nextToken ? { nextToken } : {}),
      });
      pageCount += 1;
      records.push(...page.records);
      nextToken = page.nextToken || undefined;

      this.logger.debug('Fetched page', {
        page: pageCount,
        records: page.records.length,
        hasNextToken: nextToken !== undefined,
      });
    } while (nextToken !== undefined);

    this.logger.info('Fetch complete', {
      logGroupName: query.sourceId,
      pages: pageCount,
      records: records.length,
    });

    return { records, pageCount };
  }
}
