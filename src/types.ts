export interface AwsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

export interface SwiftAuthOptions {
  authUrl?: string;
  applicationCredentialId?: string;
  applicationCredentialSecret?: string;
  region?: string;
  // Pre-issued token, skips Keystone entirely when both are set
  storageUrl?: string;
  authToken?: string;
}

export interface TransferConfig {
  container: string;
  bucket: string;
  region: string;
  maxWorkers: number;
  bandwidthLimitMb: number;
  // Optional parameters
  prefix?: string;
  stagingDir?: string;
  maxAttempts?: number; // Maximum number of upload attempts per object
  retryBaseDelayMs?: number; // Backoff unit, delays are base * 2^attempt
  retryMaxDelayMs?: number; // Ceiling for a single backoff sleep
  maxObjectTransferMs?: number; // Wall-clock budget for the upload step of one object
  requestTimeoutMs?: number; // Per-call network timeout
  listPageSize?: number;
  verbose?: boolean;
  logFile?: string;
  swift?: SwiftAuthOptions;
}

/**
 * Entry of the source container listing
 */
export interface SourceObject {
  readonly key: string;
  readonly size: number;
  readonly lastModified?: string;
  readonly isDirectoryMarker: boolean;
}

export interface DestinationObject {
  key: string;
  etag: string;
  size: number;
}

export interface SourceStore {
  readonly name: string;
  listObjects(): AsyncGenerator<SourceObject[]>;
  downloadObject(key: string, destinationPath: string): Promise<void>;
}

export interface DestinationStore {
  readonly name: string;
  ensureBucket(): Promise<void>;
  listObjects(): AsyncGenerator<DestinationObject[]>;
  // Resolves undefined when the object does not exist
  headObject(key: string): Promise<DestinationObject | undefined>;
  uploadFile(localPath: string, key: string): Promise<void>;
  putDirectoryMarker(key: string): Promise<void>;
}

// Per-object state machine
export enum TransferStatus {
  PENDING = 'pending',
  DOWNLOADING = 'downloading',
  CHECKSUMMING = 'checksumming',
  UPLOADING = 'uploading',
  UPLOADED = 'uploaded',
  SKIPPED_UP_TO_DATE = 'skipped_up_to_date',
  MARKER_CREATED = 'marker_created',
  FAILED = 'failed',
}

export type TerminalStatus =
  | TransferStatus.UPLOADED
  | TransferStatus.SKIPPED_UP_TO_DATE
  | TransferStatus.MARKER_CREATED
  | TransferStatus.FAILED;

export type TransferOutcome =
  | { key: string; status: TransferStatus.UPLOADED; attempts: number }
  | { key: string; status: TransferStatus.SKIPPED_UP_TO_DATE }
  | { key: string; status: TransferStatus.MARKER_CREATED }
  | { key: string; status: TransferStatus.FAILED; reason: string };

export interface TransferStats {
  total: number;
  uploaded: number;
  skipped: number;
  markersCreated: number;
  failed: number;
  failures: Array<{ key: string; reason: string }>;
  outcomes: TransferOutcome[];
  startTime: number;
  endTime?: number;
}
