import {
  CloudWatchLogsClient,
  FilterLogEventsCommand,
  type FilteredLogEvent,
  type FilterLogEventsCommandOutput,
} from '@aws-sdk/client-cloudwatch-logs';
import { MissingDependencyError, QueryFailureError, toError } from '../errors/log-window.error.js';
import type { AppConfig } from '../config.js';
import type { Logger } from '../types/logger.types.js';
import type { LogQueryClient, LogQueryPage, LogQueryRequest, LogRecord } from '../types/log.types.js';

export type FilterLogEventsSender = (command: FilterLogEventsCommand) => Promise<FilterLogEventsCommandOutput>;

export type CredentialsResolver = () => Promise<unknown>;

export function toLogRecord(event: FilteredLogEvent): LogRecord {
  const record: LogRecord = {
    timestampMs: event.timestamp ?? 0,
    message: event.message ?? '',
  };
  if (event.ingestionTime !== undefined) {
    record.ingestionTimeMs = event.ingestionTime;
  }
  return record;
}

/**
 * `LogQueryClient` backed by CloudWatch Logs `FilterLogEvents`.
 */
export class CloudWatchLogsQueryClient implements LogQueryClient {
  constructor(
    private readonly send: FilterLogEventsSender,
    private readonly resolveCredentials: CredentialsResolver,
    private readonly logger: Logger
  ) {}

  async assertReady(): Promise<void> {
    try {
      await this.resolveCredentials();
    } catch (error) {
      throw new MissingDependencyError({
        message: 'AWS credentials could not be resolved. Configure a profile, environment credentials or an instance role.',
        cause: toError(error),
      });
    }
  }

  async filterLogEvents(request: LogQueryRequest): Promise<LogQueryPage> {
    const command = new FilterLogEventsCommand({
      logGroupName: request.sourceId,
      startTime: request.startMs,
      endTime: request.endMs,
      ...(request.filterPattern ? { filterPattern: request.filterPattern } : {}),
      ...(request.nextToken ? { nextToken: request.nextToken } : {}),
    });

    let response: FilterLogEventsCommandOutput;
    try {
      response = await this.send(command);
    } catch (error) {
      const cause = toError(error);
      this.logger.debug('FilterLogEvents failed', { logGroupName: request.sourceId, errorName: cause.name });
      throw new QueryFailureError({
        message: cause.message,
        cause,
        metadata: { logGroupName: request.sourceId, errorName: cause.name },
      });
    }

    const records = (response.events ?? []).map(toLogRecord);
    return response.nextToken ? { records, nextToken: response.nextToken } : { records };
  }
}

export function createCloudWatchLogsQueryClient(config: AppConfig, logger: Logger): CloudWatchLogsQueryClient {
  const client = new CloudWatchLogsClient({ region: config.aws.region });
  return new CloudWatchLogsQueryClient(
    (command) => client.send(command),
    () => client.config.credentials(),
    logger
  );
}
