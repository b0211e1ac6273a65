// Third-party dependencies
import inquirer from 'inquirer';

// Local imports
import { logError, logSuccess, logWarning } from './logger';

// Types
import type { AwsCredentials } from './types';

export type CredentialPrompt = () => Promise<AwsCredentials>;

const EXPIRY_ERROR_NAMES = new Set([
  'ExpiredToken',
  'ExpiredTokenException',
  'TokenRefreshRequired',
  'RequestExpired',
]);

/**
 * Whether an SDK error means the session credentials have to be replaced
 */
export function isCredentialExpiry(error: unknown): boolean {
  return error instanceof Error && EXPIRY_ERROR_NAMES.has(error.name);
}

/**
 * Ask the operator for a fresh set of short-lived AWS credentials
 */
export const promptForCredentials: CredentialPrompt = async () => {
  const answers = await inquirer.prompt<{
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken: string;
  }>([
    { type: 'input', name: 'accessKeyId', message: 'Enter AWS Access Key ID:' },
    { type: 'password', name: 'secretAccessKey', message: 'Enter AWS Secret Access Key:', mask: '*' },
    { type: 'password', name: 'sessionToken', message: 'Enter AWS Session Token:', mask: '*' },
  ]);

  return {
    accessKeyId: answers.accessKeyId.trim(),
    secretAccessKey: answers.secretAccessKey.trim(),
    sessionToken: answers.sessionToken.trim() || undefined,
  };
};

/**
 * Holds the destination credentials for a run and serializes their renewal.
 *
 * Every worker that hits an expired session calls `refresh` with the generation it
 * used; the first caller prompts, later callers of the same wave wait for that prompt
 * and reuse its result. The coordinator awaits `whenReady` before dispatching, so no
 * new object starts while a prompt is open.
 */
export class CredentialGate {
  private credentials: AwsCredentials;
  private version = 0;
  private pending: Promise<void> | null = null;

  constructor(initial: AwsCredentials, private readonly prompt: CredentialPrompt = promptForCredentials) {
    this.credentials = initial;
  }

  get current(): AwsCredentials {
    return this.credentials;
  }

  get generation(): number {
    return this.version;
  }

  get refreshing(): boolean {
    return this.pending !== null;
  }

  whenReady(): Promise<void> {
    return this.pending ?? Promise.resolve();
  }

  /**
   * Resolves true when credentials newer than `observedGeneration` are available
   */
  async refresh(observedGeneration: number): Promise<boolean> {
    if (this.version > observedGeneration) {
      return true;
    }

    if (!this.pending) {
      this.pending = this.renew().finally(() => {
        this.pending = null;
      });
    }
    await this.pending;

    return this.version > observedGeneration;
  }

  private async renew(): Promise<void> {
    logWarning('AWS session expired. Requesting new credentials.');

    try {
      this.credentials = await this.prompt();
      this.version++;
      logSuccess('AWS credentials refreshed, resuming transfers.');
    } catch (error) {
      logError('Failed to refresh AWS credentials', error);
    }
  }
}
