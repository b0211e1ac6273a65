// Node.js built-in modules
import { Transform } from 'node:stream';

// Local imports
import { sleep as defaultSleep } from './utils';

export interface BandwidthLimiterOptions {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Aggregate bandwidth ceiling shared by every upload of a run.
 *
 * Each consumer reserves a slot on one schedule: the reservation starts when the
 * previously reserved bytes have drained at `bytesPerSecond`, so the combined rate of
 * all concurrent streams stays under the limit.
 */
export class BandwidthLimiter {
  private nextAvailable = 0;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(readonly bytesPerSecond: number, options: BandwidthLimiterOptions = {}) {
    if (!Number.isFinite(bytesPerSecond) || bytesPerSecond <= 0) {
      throw new Error(`Bandwidth limit must be a positive number of bytes per second, got ${bytesPerSecond}`);
    }
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  static fromMegabytes(megabytes: number, options?: BandwidthLimiterOptions): BandwidthLimiter {
    return new BandwidthLimiter(megabytes * 1024 * 1024, options);
  }

  /**
   * Wait until `bytes` may be sent. Returns the wait in milliseconds.
   */
  async consume(bytes: number): Promise<number> {
    const now = this.now();
    if (this.nextAvailable < now) {
      this.nextAvailable = now;
    }

    const waitMs = this.nextAvailable - now;
    this.nextAvailable += (bytes / this.bytesPerSecond) * 1000;

    if (waitMs > 0) {
      await this.sleep(waitMs);
    }
    return waitMs;
  }
}

/**
 * Pass-through stream that paces chunks through a limiter
 */
export function createThrottleStream(limiter: BandwidthLimiter): Transform {
  return new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      limiter.consume(chunk.length).then(
        () => callback(null, chunk),
        (error: Error) => callback(error),
      );
    },
  });
}
