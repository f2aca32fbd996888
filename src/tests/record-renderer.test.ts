import { describe, it, expect } from 'vitest';
import {
  extractMessage,
  renderRow,
  renderTable,
  renderTableHeader,
  renderWindowHeader,
} from '../services/record-renderer.service.js';
import type { LogRecord, ResolvedWindow } from '../types/log.types.js';

const NOW = 1_700_000_000_000;
const HEADER = 'Event time' + ' '.repeat(14) + ' ' + 'Ingestion' + ' '.repeat(15) + ' Message';

describe('extractMessage', () => {
  it('should pull the log field out of a JSON payload', () => {
    expect(extractMessage('{"log":"boot ok"}')).toEqual({ kind: 'field', field: 'log', text: 'boot ok' });
  });

  it('should prefer log, then message, then msg', () => {
    expect(extractMessage('{"msg":"c","message":"b","log":"a"}').text).toBe('a');
    expect(extractMessage('{"msg":"c","message":"b"}')).toEqual({ kind: 'field', field: 'message', text: 'b' });
    expect(extractMessage('{"msg":"c","level":"info"}')).toEqual({ kind: 'field', field: 'msg', text: 'c' });
  });

  it('should skip empty and null fields', () => {
    expect(extractMessage('{"log":"","message":null,"msg":"fallback"}')).toEqual({
      kind: 'field',
      field: 'msg',
      text: 'fallback',
    });
  });

  it('should render non-string field values as JSON', () => {
    expect(extractMessage('{"log":{"status":200}}').text).toBe('{"status":200}');
    expect(extractMessage('{"msg":42}').text).toBe('42');
  });

  it('should truncate a long non-JSON payload to 117 characters plus an ellipsis', () => {
    const raw = 'x'.repeat(150);
    expect(extractMessage(raw)).toEqual({ kind: 'raw', text: `${'x'.repeat(117)} …`, truncated: true });
  });

  it('should leave a short non-JSON payload unchanged', () => {
    const raw = 'a'.repeat(50);
    expect(extractMessage(raw)).toEqual({ kind: 'raw', text: raw, truncated: false });
  });

  it('should leave a payload of exactly 120 characters unchanged', () => {
    const raw = 'b'.repeat(120);
    expect(extractMessage(raw).text).toBe(raw);
  });

  it('should truncate a long JSON object with no message field', () => {
    const raw = JSON.stringify({ level: 'info', detail: 'd'.repeat(200) });
    const result = extractMessage(raw);
    expect(result.kind).toBe('raw');
    expect(result.text).toBe(`${raw.slice(0, 117)} …`);
  });

  it('should drop trailing newlines from an extracted field', () => {
    expect(extractMessage('{"log":"boot ok\\n","stream":"stdout"}')).toEqual({
      kind: 'field',
      field: 'log',
      text: 'boot ok',
    });
  });

  it('should fall through to the next field when a field is only newlines', () => {
    expect(extractMessage('{"log":"\\n","msg":"next"}').text).toBe('next');
  });

  it('should drop trailing newlines before measuring a raw payload', () => {
    const raw = 'y'.repeat(120);
    expect(extractMessage(`${raw}\n`)).toEqual({ kind: 'raw', text: raw, truncated: false });
    expect(extractMessage(`${raw}\n\n`).text).toBe(raw);
  });

  it('should cut on code points so a surrogate pair is never split', () => {
    const raw = 'a'.repeat(116) + '😀'.repeat(20);
    expect(extractMessage(raw)).toEqual({ kind: 'raw', text: `${'a'.repeat(116)}😀 …`, truncated: true });
  });

  it('should count astral characters once when measuring', () => {
    const raw = '😀'.repeat(100);
    expect(extractMessage(raw)).toEqual({ kind: 'raw', text: raw, truncated: false });
  });

  it('should treat malformed JSON and arrays as raw text', () => {
    expect(extractMessage('{"log": broken}')).toEqual({ kind: 'raw', text: '{"log": broken}', truncated: false });
    expect(extractMessage('["log"]')).toEqual({ kind: 'raw', text: '["log"]', truncated: false });
  });
});

describe('renderRow', () => {
  it('should print both timestamps and the extracted message', () => {
    const record: LogRecord = { timestampMs: NOW, ingestionTimeMs: NOW + 250, message: '{"msg":"ready"}' };
    expect(renderRow(record)).toBe('2023-11-14T22:13:20.000Z 2023-11-14T22:13:20.250Z ready');
  });

  it('should not end a row with the newline a container log carries', () => {
    const record: LogRecord = { timestampMs: NOW, ingestionTimeMs: NOW, message: '{"log":"boot ok\\n","stream":"stdout"}' };
    expect(renderRow(record)).toBe('2023-11-14T22:13:20.000Z 2023-11-14T22:13:20.000Z boot ok');
  });

  it('should leave the ingestion column blank when absent', () => {
    const record: LogRecord = { timestampMs: NOW, message: 'plain line' };
    expect(renderRow(record)).toBe(`2023-11-14T22:13:20.000Z ${' '.repeat(24)} plain line`);
  });
});

describe('renderTable', () => {
  it('should report the count before the header and rows', () => {
    const records: LogRecord[] = [
      { timestampMs: NOW, ingestionTimeMs: NOW, message: 'first' },
      { timestampMs: NOW + 1, ingestionTimeMs: NOW + 1, message: '{"log":"second"}' },
    ];
    expect(renderTable(records)).toEqual([
      '✅ 2 event(s) retrieved',
      '',
      HEADER,
      '2023-11-14T22:13:20.000Z 2023-11-14T22:13:20.000Z first',
      '2023-11-14T22:13:20.001Z 2023-11-14T22:13:20.001Z second',
    ]);
  });

  it('should print the header even with no records', () => {
    expect(renderTable([])).toEqual(['✅ 0 event(s) retrieved', '', HEADER]);
  });

  it('should pad the header columns to 24 characters', () => {
    expect(renderTableHeader()).toBe(HEADER);
  });
});

describe('renderWindowHeader', () => {
  const window: ResolvedWindow = {
    mode: 'relative',
    startMs: 1_699_992_800_000,
    endMs: NOW,
    description: 'last 2h',
  };

  it('should describe window, group and pattern', () => {
    expect(renderWindowHeader(window, '/aws/lambda/test', 'ERROR')).toEqual([
      '⏱️  Window : last 2h  (2023-11-14T20:13:20.000Z → 2023-11-14T22:13:20.000Z)',
      '📒 Group  : /aws/lambda/test',
      '🔍 Pattern: ERROR',
      '',
    ]);
  });

  it('should show (none) without a pattern', () => {
    expect(renderWindowHeader(window, '/aws/lambda/test')[2]).toBe('🔍 Pattern: (none)');
  });
});
