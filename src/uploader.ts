// Local imports
import { isCredentialExpiry } from './credentials';
import { logError, logSuccess, logWarning } from './logger';
import { errorMessage, formatTime, sleep as defaultSleep } from './utils';

// Types
import type { CredentialGate } from './credentials';
import type { DestinationStore } from './types';

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 1000;
export const DEFAULT_RETRY_MAX_DELAY_MS = 60000;
export const DEFAULT_MAX_OBJECT_TRANSFER_MS = 30 * 60 * 1000;

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  maxTotalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export type UploadResult =
  | { ok: true; attempts: number }
  | { ok: false; attempts: number; error: string };

/**
 * Exponential backoff, base 2: attempt 1 waits 2 units, attempt 2 waits 4, capped at maxDelayMs
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
}

/**
 * Upload with bounded retries.
 *
 * Credential expiry does not consume an attempt: the uploader waits for the
 * credential gate to renew the session and repeats the same attempt. Any other error
 * consumes one attempt and backs off. Exhaustion is returned, never thrown.
 */
export class RetryingUploader {
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly maxTotalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(
    private readonly destination: DestinationStore,
    private readonly gate: CredentialGate,
    options: RetryOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_RETRY_MAX_DELAY_MS;
    this.maxTotalMs = options.maxTotalMs ?? DEFAULT_MAX_OBJECT_TRANSFER_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async upload(localPath: string, key: string): Promise<UploadResult> {
    const startedAt = this.now();
    let attempt = 0;
    let lastError = 'no upload attempt was made';

    while (attempt < this.maxAttempts) {
      if (this.now() - startedAt > this.maxTotalMs) {
        logWarning(`Giving up on ${key}: exceeded the upload time budget of ${formatTime(Math.round(this.maxTotalMs / 1000))}`);
        break;
      }

      const generation = this.gate.generation;

      try {
        await this.destination.uploadFile(localPath, key);
        logSuccess(`${key} uploaded successfully on attempt ${attempt + 1}.`);
        return { ok: true, attempts: attempt + 1 };
      } catch (error) {
        lastError = errorMessage(error);

        if (isCredentialExpiry(error) && await this.gate.refresh(generation)) {
          continue;
        }

        attempt++;
        logError(`Failed to upload ${key} (attempt ${attempt}/${this.maxAttempts}): ${lastError}`);

        if (attempt >= this.maxAttempts) {
          break;
        }

        const delay = backoffDelay(attempt, this.baseDelayMs, this.maxDelayMs);
        if (this.now() - startedAt + delay > this.maxTotalMs) {
          logWarning(`Giving up on ${key}: next retry would exceed the upload time budget`);
          break;
        }
        await this.sleep(delay);
      }
    }

    return { ok: false, attempts: attempt, error: lastError };
  }
}
