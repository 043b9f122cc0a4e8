import { describe, it, expect } from 'vitest';
import { LogBuffer, formatBufferLine } from './log-buffer';

describe('LogBuffer', () => {
  it('keeps lines in insertion order', () => {
    const buffer = new LogBuffer(3);
    buffer.push('a');
    buffer.push('b');

    expect(buffer.entries()).toEqual(['a', 'b']);
    expect(buffer.size).toBe(2);
  });

  it('evicts the oldest line when full', () => {
    const buffer = new LogBuffer(2);
    buffer.push('a');
    buffer.push('b');
    buffer.push('c');

    expect(buffer.entries()).toEqual(['b', 'c']);
  });

  it('returns a copy', () => {
    const buffer = new LogBuffer(2);
    buffer.push('a');
    buffer.entries().push('x');

    expect(buffer.entries()).toEqual(['a']);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new LogBuffer(0)).toThrow('LogBuffer capacity must be positive');
  });
});

describe('formatBufferLine', () => {
  it('formats level, name, message and context', () => {
    const line = formatBufferLine('2026-01-01T00:00:00.000Z', 'warn', 'sync:engine', 'Page failed', {
      symbol: 'BTCUSDT',
      count: 3,
    });

    expect(line).toBe('2026-01-01T00:00:00.000Z [WARN] sync:engine: Page failed (symbol=BTCUSDT count=3)');
  });

  it('omits empty context', () => {
    expect(formatBufferLine('t', 'info', 'api', 'ready')).toBe('t [INFO] api: ready');
  });
});
