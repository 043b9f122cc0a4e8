import * as fs from 'fs';
import * as path from 'path';

type LogFileType = 'main' | 'error';

/**
 * Configuration for file transport
 */
export interface FileTransportConfig {
  /** Base directory for logs (default: 'logs') */
  logDir: string;
  /** Service name for file grouping (e.g., 'sync', 'api') */
  service: string;
  /** Max file size in bytes before rotation (default: 10MB) */
  maxSize: number;
  /** Number of rotated files to keep (default: 5) */
  maxFiles: number;
  /** Write errors to separate .error.log file */
  separateErrorLog: boolean;
}

/**
 * Default file transport configuration
 */
export const DEFAULT_FILE_CONFIG: FileTransportConfig = {
  logDir: 'logs',
  service: 'candlevault',
  maxSize: 10 * 1024 * 1024,
  maxFiles: 5,
  separateErrorLog: true,
};

/**
 * Get the current date string for log file naming
 */
function getDateString(): string {
  return new Date().toISOString().split('T')[0]; // YYYY-MM-DD
}

/**
 * File transport for writing logs to disk with rotation
 *
 * - Daily log files: {service}-{YYYY-MM-DD}.log
 * - Rotation at maxSize, keeping maxFiles numbered backups
 * - Separate error log for ERROR/FATAL entries
 * - JSON lines
 */
export class FileTransport {
  private config: FileTransportConfig;
  private currentDate: string;
  private streams: Record<LogFileType, fs.WriteStream | null> = { main: null, error: null };
  private sizes: Record<LogFileType, number> = { main: 0, error: 0 };

  constructor(config: Partial<FileTransportConfig> = {}) {
    this.config = { ...DEFAULT_FILE_CONFIG, ...config };
    this.currentDate = getDateString();
    this.ensureLogDirectory();
  }

  private ensureLogDirectory(): void {
    if (!fs.existsSync(this.config.logDir)) {
      fs.mkdirSync(this.config.logDir, { recursive: true });
    }
  }

  /**
   * Get the log file path for a given type
   */
  getLogFilePath(type: LogFileType, date: string = this.currentDate): string {
    const suffix = type === 'main' ? '.log' : `.${type}.log`;
    return path.join(this.config.logDir, `${this.config.service}-${date}${suffix}`);
  }

  /**
   * Check if date has changed and start new files if so
   */
  private checkDateRotation(): void {
    const today = getDateString();
    if (today !== this.currentDate) {
      this.closeStreams();
      this.currentDate = today;
      this.sizes = { main: 0, error: 0 };
    }
  }

  /**
   * Rotate a log file if it exceeds maxSize
   */
  private rotateIfNeeded(type: LogFileType): void {
    if (this.sizes[type] < this.config.maxSize) {
      return;
    }

    const filePath = this.getLogFilePath(type);
    if (!fs.existsSync(filePath)) {
      return;
    }

    this.streams[type]?.end();
    this.streams[type] = null;
    this.rotateFiles(type);
    this.sizes[type] = 0;
  }

  /**
   * Rotate files by renaming with numeric suffix
   */
  private rotateFiles(type: LogFileType): void {
    const basePath = this.getLogFilePath(type);

    const oldestPath = `${basePath}.${this.config.maxFiles}`;
    if (fs.existsSync(oldestPath)) {
      fs.unlinkSync(oldestPath);
    }

    for (let i = this.config.maxFiles - 1; i >= 1; i--) {
      const oldPath = `${basePath}.${i}`;
      if (fs.existsSync(oldPath)) {
        fs.renameSync(oldPath, `${basePath}.${i + 1}`);
      }
    }

    if (fs.existsSync(basePath)) {
      fs.renameSync(basePath, `${basePath}.1`);
    }
  }

  /**
   * Get or create the write stream for a log type
   */
  private getStream(type: LogFileType): fs.WriteStream {
    this.checkDateRotation();
    this.rotateIfNeeded(type);

    const existing = this.streams[type];
    if (existing) {
      return existing;
    }

    const filePath = this.getLogFilePath(type);
    if (fs.existsSync(filePath)) {
      this.sizes[type] = fs.statSync(filePath).size;
    }
    const stream = fs.createWriteStream(filePath, { flags: 'a' });
    this.streams[type] = stream;
    return stream;
  }

  private append(type: LogFileType, entry: Record<string, unknown>): void {
    const line = JSON.stringify(entry) + '\n';
    this.getStream(type).write(line);
    this.sizes[type] += Buffer.byteLength(line, 'utf8');
  }

  /**
   * Write a log entry to the main log file
   */
  write(entry: Record<string, unknown>): void {
    this.append('main', entry);

    const level = entry.level;
    if (this.config.separateErrorLog && (level === 'ERROR' || level === 'FATAL')) {
      this.append('error', entry);
    }
  }

  /**
   * Close all open streams
   */
  closeStreams(): void {
    for (const type of ['main', 'error'] as const) {
      this.streams[type]?.end();
      this.streams[type] = null;
    }
  }

  /**
   * Wait until buffered writes are handed to the OS (for graceful shutdown)
   *
   * Writes complete in order, so the callback of an empty write fires once
   * everything queued before it is on disk.
   */
  async flush(): Promise<void> {
    const open = [this.streams.main, this.streams.error].filter(
      (stream): stream is fs.WriteStream => stream !== null
    );

    await Promise.all(
      open.map(
        (stream) =>
          new Promise<void>((resolve, reject) => {
            stream.write('', (error) => (error ? reject(error) : resolve()));
          })
      )
    );
  }
}
