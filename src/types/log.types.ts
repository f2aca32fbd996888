export type DurationUnit = 'm' | 'h' | 'd' | 'w';

export type WindowMode = 'relative' | 'absolute';

export interface TimeWindow {
  startMs: number;
  endMs: number;
}

export interface ResolvedWindow extends TimeWindow {
  mode: WindowMode;
  description: string;
}

/**
 * Form-style window selection. Month and day default to "current"; when both
 * are "current" the window is relative to now.
 */
export interface WindowSelection {
  relativeWindow: string;
  specificMonth: string;
  specificDay: string;
}

export interface LogRecord {
  timestampMs: number;
  ingestionTimeMs?: number;
  message: string;
}

export interface LogQueryRequest {
  sourceId: string;
  startMs: number;
  endMs: number;
  filterPattern?: string;
  nextToken?: string;
}

export interface LogQueryPage {
  records: LogRecord[];
  nextToken?: string;
}

/**
 * Binding to the log-query API. One call returns one page.
 */
export interface LogQueryClient {
  assertReady(): Promise<void>;
  filterLogEvents(request: LogQueryRequest): Promise<LogQueryPage>;
}

export type MessageField = 'log' | 'message' | 'msg';

export type DisplayMessage =
  | { kind: 'field'; field: MessageField; text: string }
  | { kind: 'raw'; text: string; truncated: boolean };
