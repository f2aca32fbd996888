import { assertRunnable, type AppConfig } from '../config.js';
import { EventFetcherService } from './event-fetcher.service.js';
import { resolveWindow } from './window-resolver.service.js';
import { renderTable, renderWindowHeader } from './record-renderer.service.js';
import type { Logger } from '../types/logger.types.js';
import type { LogQueryClient, LogRecord, ResolvedWindow } from '../types/log.types.js';

export interface LogWindowDeps {
  config: AppConfig;
  logger: Logger;
  client: LogQueryClient;
  write: (line: string) => void;
  now?: () => number;
}

export interface LogWindowResult {
  window: ResolvedWindow;
  records: LogRecord[];
  pageCount: number;
}

/**
 * One run: check prerequisites, resolve the window, fetch every page, then
 * print the table. The window header is written before the first query, so
 * on a QueryFailure stdout holds only the header lines and no records.
 * This function does not exit the process; the caller maps errors to exit codes.
 */
export async function runLogWindow(deps: LogWindowDeps): Promise<LogWindowResult> {
  const { config, logger, client, write } = deps;
  const now = deps.now ?? Date.now;

  assertRunnable(config);
  await client.assertReady();

  const window = resolveWindow(config.logs, now());
  logger.debug('Resolved window', {
    mode: window.mode,
    startMs: window.startMs,
    endMs: window.endMs,
  });

  const { logGroupName, filterPattern } = config.logs;
  for (const line of renderWindowHeader(window, logGroupName, filterPattern)) {
    write(line);
  }

  const fetcher = new EventFetcherService(client, logger);
  const { records, pageCount } = await fetcher.fetchAll({
    sourceId: logGroupName,
    window,
    ...(filterPattern ? { filterPattern } : {}),
  });

  for (const line of renderTable(records)) {
    write(line);
  }

  return { window, records, pageCount };
}
