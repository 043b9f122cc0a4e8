import { DateTime, FixedOffsetZone, IANAZone, type Zone } from 'luxon';
import type { Interval } from '@candlevault/schemas';

/** Wall-clock format used for stored timestamps */
export const LOCAL_TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

export interface TimeZoneConfig {
  /** IANA zone name, e.g. 'Asia/Shanghai' */
  name: string;
  /** Whole hours east of UTC, used when the name cannot be resolved */
  offsetHours: number;
}

/**
 * Resolve a zone by name, falling back to a fixed UTC offset.
 */
export function resolveZone(config: TimeZoneConfig): Zone {
  if (IANAZone.isValidZone(config.name)) {
    return IANAZone.create(config.name);
  }
  return FixedOffsetZone.instance(config.offsetHours * 60);
}

/**
 * Converts between upstream UTC milliseconds and local wall-clock time.
 *
 * The zone is resolved once at construction; every conversion is pure.
 */
export class TimeNormalizer {
  readonly zone: Zone;

  constructor(zone: Zone) {
    this.zone = zone;
  }

  static fromConfig(config: TimeZoneConfig): TimeNormalizer {
    return new TimeNormalizer(resolveZone(config));
  }

  get zoneName(): string {
    return this.zone.name;
  }

  /** UTC epoch milliseconds rendered in the configured zone */
  toLocal(utcMillis: number): DateTime {
    return DateTime.fromMillis(utcMillis, { zone: this.zone });
  }

  /** Inverse of toLocal */
  toUtcMillis(local: DateTime): number {
    return local.toMillis();
  }

  /** Current instant in the configured zone */
  now(clock: () => number = Date.now): DateTime {
    return this.toLocal(clock());
  }

  /**
   * First instant to backfill from when a table is empty.
   * Short intervals start later to bound the backfill size.
   */
  defaultHistoryStart(interval: Interval): DateTime {
    switch (interval) {
      case '5m':
        return this.wallClock(2025, 1, 1);
      case '30m':
        return this.wallClock(2022, 1, 1);
      default:
        return this.wallClock(2020, 1, 1);
    }
  }

  /** Storage representation (second precision) */
  formatLocal(local: DateTime): string {
    return local.setZone(this.zone).toFormat(LOCAL_TIMESTAMP_FORMAT);
  }

  /**
   * Parse a stored wall-clock value. Accepts the storage format and ISO
   * strings without an offset (both read as local time).
   */
  parseLocal(text: string): DateTime {
    const trimmed = text.trim();
    let parsed = DateTime.fromFormat(trimmed, LOCAL_TIMESTAMP_FORMAT, { zone: this.zone });
    if (!parsed.isValid) {
      parsed = DateTime.fromISO(trimmed.replace(' ', 'T'), { zone: this.zone });
    }
    if (!parsed.isValid) {
      throw new Error(`Invalid local timestamp: "${text}"`);
    }
    return parsed;
  }

  /** Stored wall-clock string to UTC milliseconds */
  localStringToUtcMillis(text: string): number {
    return this.toUtcMillis(this.parseLocal(text));
  }

  /** UTC milliseconds to the stored wall-clock string */
  utcMillisToLocalString(utcMillis: number): string {
    return this.formatLocal(this.toLocal(utcMillis));
  }

  private wallClock(year: number, month: number, day: number): DateTime {
    return DateTime.fromObject({ year, month, day, hour: 0, minute: 0, second: 0 }, { zone: this.zone });
  }
}
