/**
 * Bounded in-memory list of recent log lines, oldest first.
 * When full, the oldest line is dropped.
 */
export class LogBuffer {
  private lines: string[] = [];

  constructor(private capacity: number) {
    if (capacity <= 0) {
      throw new Error('LogBuffer capacity must be positive');
    }
  }

  push(line: string): void {
    if (this.lines.length >= this.capacity) {
      this.lines.shift();
    }
    this.lines.push(line);
  }

  /** Copy of the buffered lines */
  entries(): string[] {
    return [...this.lines];
  }

  get size(): number {
    return this.lines.length;
  }

  clear(): void {
    this.lines = [];
  }
}

/**
 * Format a log entry the way it is shown on /logs: `<iso> [LEVEL] name: message`
 */
export function formatBufferLine(
  timestamp: string,
  level: string,
  name: string,
  msg: string | undefined,
  context: Record<string, unknown> = {}
): string {
  const extras = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  const suffix = extras.length > 0 ? ` (${extras.join(' ')})` : '';
  return `${timestamp} [${level.toUpperCase()}] ${name}: ${msg ?? ''}${suffix}`;
}
