import { formatTimestamp } from '../utils/calendar.util.js';
import type { DisplayMessage, LogRecord, MessageField, ResolvedWindow } from '../types/log.types.js';

const MESSAGE_FIELDS: readonly MessageField[] = ['log', 'message', 'msg'];
const MAX_RAW_LENGTH = 120;
const TRUNCATED_LENGTH = 117;
const ELLIPSIS = ' …';
const COLUMN_WIDTH = 24;

function parseJsonObject(raw: string): Record<string, unknown> | null {
  const trimmed = raw.trim();
  if (!trimmed.startsWith('{') || !trimmed.endsWith('}')) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  return Object.fromEntries(Object.entries(parsed));
}

function fieldText(value: unknown): string | null {
  if (value === undefined || value === null || value === false) {
    return null;
  }
  const text = stripTrailingNewlines(typeof value === 'string' ? value : JSON.stringify(value));
  return text.length > 0 ? text : null;
}

function stripTrailingNewlines(text: string): string {
  return text.replace(/\n+$/, '');
}

/**
 * Pick the human-readable text out of an event message.
 *
 * A JSON object with a non-empty `log`, `message` or `msg` field (checked in
 * that order) yields that field. Anything else is shown raw, cut to 117
 * characters plus an ellipsis when longer than 120. Lengths count code
 * points, and trailing newlines are dropped before measuring.
 */
export function extractMessage(message: string): DisplayMessage {
  const raw = stripTrailingNewlines(message);
  const payload = parseJsonObject(raw);
  if (payload) {
    for (const field of MESSAGE_FIELDS) {
      const text = fieldText(payload[field]);
      if (text !== null) {
        return { kind: 'field', field, text };
      }
    }
  }

  const chars = [...raw];
  if (chars.length > MAX_RAW_LENGTH) {
    return { kind: 'raw', text: `${chars.slice(0, TRUNCATED_LENGTH).join('')}${ELLIPSIS}`, truncated: true };
  }
  return { kind: 'raw', text: raw, truncated: false };
}

export function renderRow(record: LogRecord): string {
  const eventTime = formatTimestamp(record.timestampMs);
  const ingestion = record.ingestionTimeMs !== undefined ? formatTimestamp(record.ingestionTimeMs) : '';
  const message = extractMessage(record.message);
  return `${eventTime.padEnd(COLUMN_WIDTH)} ${ingestion.padEnd(COLUMN_WIDTH)} ${message.text}`;
}

export function renderTableHeader(): string {
  return `${'Event time'.padEnd(COLUMN_WIDTH)} ${'Ingestion'.padEnd(COLUMN_WIDTH)} Message`;
}

/**
 * Count line, blank line, column header, then one row per record in input order.
 */
export function renderTable(records: readonly LogRecord[]): string[] {
  return [
    `✅ ${records.length} event(s) retrieved`,
    '',
    renderTableHeader(),
    ...records.map(renderRow),
  ];
}

export function renderWindowHeader(window: ResolvedWindow, sourceId: string, filterPattern?: string): string[] {
  return [
    `⏱️  Window : ${window.description}  (${formatTimestamp(window.startMs)} → ${formatTimestamp(window.endMs)})`,
    `📒 Group  : ${sourceId}`,
    `🔍 Pattern: ${filterPattern ?? '(none)'}`,
    '',
  ];
}
