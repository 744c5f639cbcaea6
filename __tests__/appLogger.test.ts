import { __test__ } from '../src/lib/appLogger';

const { formatLine, safeStringify } = __test__;

describe('appLogger formatting', () => {
  const at = new Date('2026-01-02T03:04:05.000Z');

  test('writes timestamp, level, message and JSON payload on one line', () => {
    expect(formatLine('info', 'NAV_START', { points: 3 }, at)).toBe(
      '2026-01-02T03:04:05.000Z [INFO] NAV_START {"points":3}\n',
    );
  });

  test('omits the payload when none is given', () => {
    expect(formatLine('warn', 'POSITION_STREAM_ERROR', undefined, at)).toBe(
      '2026-01-02T03:04:05.000Z [WARN] POSITION_STREAM_ERROR\n',
    );
  });

  test('keeps error name and message', () => {
    const error = new Error('gps lost');
    error.stack = 'Error: gps lost';
    expect(safeStringify(error)).toBe('{"name":"Error","message":"gps lost","stack":"Error: gps lost"}');
  });

  test('marks values JSON cannot encode', () => {
    const circular: { self?: unknown } = {};
    circular.self = circular;
    expect(safeStringify(circular)).toBe('"[unserializable]"');
    expect(safeStringify(() => undefined)).toBe('"[unserializable]"');
  });
});
