// Node.js built-in modules
import * as fs from 'node:fs';
import { Readable, Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';

// Third-party dependencies
import { z } from 'zod';

// Local imports
import { logVerbose } from './logger';

// Types
import type { SourceObject, SourceStore, SwiftAuthOptions } from './types';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface SwiftSession {
  storageUrl: string;
  token: string;
}

export class SwiftRequestError extends Error {
  constructor(message: string, readonly status: number) {
    super(message);
    this.name = 'SwiftRequestError';
  }
}

/**
 * Container listing entry (GET ?format=json)
 */
const listingPageSchema = z.array(z.object({
  name: z.string(),
  bytes: z.number().optional(),
  last_modified: z.string().optional(),
  hash: z.string().optional(),
  content_type: z.string().optional(),
}));

const keystoneTokenSchema = z.object({
  token: z.object({
    catalog: z.array(z.object({
      type: z.string(),
      endpoints: z.array(z.object({
        interface: z.string(),
        url: z.string(),
        region: z.string().nullish(),
        region_id: z.string().nullish(),
      })),
    })).default([]),
  }),
});

function trimTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Percent-encode every segment of an object name, keeping the separators
 */
export function encodeObjectPath(key: string): string {
  return key.split('/').map(encodeURIComponent).join('/');
}

/**
 * Obtain a Swift storage URL and token.
 * A pre-issued storageUrl/authToken pair is used as is, otherwise a Keystone v3
 * application credential is exchanged for a token and the public object-store endpoint.
 */
export async function authenticateSwift(
  options: SwiftAuthOptions,
  fetchImpl: FetchLike = fetch
): Promise<SwiftSession> {
  if (options.storageUrl && options.authToken) {
    return { storageUrl: trimTrailingSlashes(options.storageUrl), token: options.authToken };
  }

  const { authUrl, applicationCredentialId, applicationCredentialSecret } = options;
  if (!authUrl || !applicationCredentialId || !applicationCredentialSecret) {
    throw new Error(
      'OpenStack credentials are missing: set OS_AUTH_URL, OS_APPLICATION_CREDENTIAL_ID and '
      + 'OS_APPLICATION_CREDENTIAL_SECRET, or OS_STORAGE_URL and OS_AUTH_TOKEN'
    );
  }

  const base = trimTrailingSlashes(authUrl);
  const identityUrl = base.endsWith('/v3') ? base : `${base}/v3`;

  const response = await fetchImpl(`${identityUrl}/auth/tokens`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({
      auth: {
        identity: {
          methods: ['application_credential'],
          application_credential: {
            id: applicationCredentialId,
            secret: applicationCredentialSecret,
          },
        },
      },
    }),
  });

  if (!response.ok) {
    throw new SwiftRequestError(
      `Keystone authentication failed: ${response.status} ${response.statusText}`,
      response.status
    );
  }

  const token = response.headers.get('x-subject-token');
  if (!token) {
    throw new Error('Keystone response did not include an X-Subject-Token header');
  }

  const { token: body } = keystoneTokenSchema.parse(await response.json());
  const objectStore = body.catalog.find(service => service.type === 'object-store');
  const endpoint = objectStore?.endpoints.find(candidate =>
    candidate.interface === 'public'
    && (!options.region || candidate.region === options.region || candidate.region_id === options.region)
  );

  if (!endpoint) {
    throw new Error(
      `No public object-store endpoint${options.region ? ` in region ${options.region}` : ''} in the Keystone catalog`
    );
  }

  return { storageUrl: trimTrailingSlashes(endpoint.url), token };
}

export interface SwiftSourceStoreOptions {
  session: SwiftSession;
  container: string;
  prefix?: string;
  pageSize?: number;
  requestTimeoutMs?: number;
  fetch?: FetchLike;
}

/**
 * Read-only view of one Swift container
 */
export class SwiftSourceStore implements SourceStore {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: SwiftSourceStoreOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  get name(): string {
    return `swift://${this.options.container}`;
  }

  private get containerUrl(): string {
    return `${this.options.session.storageUrl}/${encodeURIComponent(this.options.container)}`;
  }

  private get headers(): Record<string, string> {
    return { 'X-Auth-Token': this.options.session.token };
  }

  /**
   * Page through the container with the marker mechanism until an empty page comes back
   */
  async *listObjects(): AsyncGenerator<SourceObject[]> {
    let marker: string | undefined;

    for (;;) {
      const url = new URL(this.containerUrl);
      url.searchParams.set('format', 'json');
      if (marker !== undefined) {
        url.searchParams.set('marker', marker);
      }
      if (this.options.prefix) {
        url.searchParams.set('prefix', this.options.prefix);
      }
      if (this.options.pageSize) {
        url.searchParams.set('limit', this.options.pageSize.toString());
      }

      const response = await this.fetchImpl(url.toString(), {
        headers: this.headers,
        signal: this.options.requestTimeoutMs ? AbortSignal.timeout(this.options.requestTimeoutMs) : undefined,
      });

      if (!response.ok) {
        throw new SwiftRequestError(
          `Failed to list container '${this.options.container}': ${response.status} ${response.statusText}`,
          response.status
        );
      }

      // Some deployments answer an empty listing with 204 and no body
      if (response.status === 204) {
        return;
      }

      const page = listingPageSchema.parse(await response.json());
      if (page.length === 0) {
        return;
      }

      yield page.map(entry => ({
        key: entry.name,
        size: entry.bytes ?? 0,
        lastModified: entry.last_modified,
        isDirectoryMarker: entry.name.endsWith('/'),
      }));

      marker = page[page.length - 1].name;
    }
  }

  /**
   * Stream an object into a local file. The request is aborted when no bytes arrive
   * for requestTimeoutMs.
   */
  async downloadObject(key: string, destinationPath: string): Promise<void> {
    const controller = new AbortController();
    const idleTimeoutMs = this.options.requestTimeoutMs;
    let timer: NodeJS.Timeout | undefined;

    const resetTimer = (): void => {
      if (!idleTimeoutMs) return;
      clearTimeout(timer);
      timer = setTimeout(() => {
        controller.abort(new Error(`Download of ${key} stalled for ${idleTimeoutMs}ms`));
      }, idleTimeoutMs);
    };

    resetTimer();

    try {
      const response = await this.fetchImpl(`${this.containerUrl}/${encodeObjectPath(key)}`, {
        headers: this.headers,
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new SwiftRequestError(
          `Failed to download '${key}': ${response.status} ${response.statusText}`,
          response.status
        );
      }

      const fileStream = fs.createWriteStream(destinationPath);

      if (!response.body) {
        await pipeline(Readable.from([]), fileStream);
        return;
      }

      const idleWatch = new Transform({
        transform(chunk: Buffer, _encoding, callback) {
          resetTimer();
          callback(null, chunk);
        },
      });

      await pipeline(Readable.fromWeb(response.body), idleWatch, fileStream, { signal: controller.signal });
      logVerbose(`Downloaded ${key} to ${destinationPath}`);
    } finally {
      clearTimeout(timer);
    }
  }
}
