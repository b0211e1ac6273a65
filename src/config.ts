// Node.js built-in modules
import fs from 'node:fs';
import path from 'node:path';

// Third-party dependencies
import yaml from 'js-yaml';
import { z } from 'zod';

// Local imports
import {
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_OBJECT_TRANSFER_MS,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
} from './uploader';
import { errorMessage } from './utils';

// Types
import type { AwsCredentials, SwiftAuthOptions, TransferConfig } from './types';

export const DEFAULT_REQUEST_TIMEOUT_MS = 120000;
export const DEFAULT_LIST_PAGE_SIZE = 1000;

/**
 * Options parsed from the command line
 */
export interface CliOptions {
  openStackContainer: string;
  s3Bucket: string;
  maxWorkers: number;
  regionName: string;
  bandwidthLimitMb: number;
  // Optional parameters
  config?: string;
  prefix?: string;
  stagingDir?: string;
  maxAttempts?: number;
  verbose?: boolean;
  logFile?: string;
}

const fileConfigSchema = z.object({
  prefix: z.string().optional(),
  stagingDir: z.string().optional(),
  maxAttempts: z.number().int().positive().optional(),
  retryBaseDelayMs: z.number().int().nonnegative().optional(),
  retryMaxDelayMs: z.number().int().positive().optional(),
  maxObjectTransferMs: z.number().int().positive().optional(),
  requestTimeoutMs: z.number().int().positive().optional(),
  listPageSize: z.number().int().positive().max(10000).optional(),
  verbose: z.boolean().optional(),
  logFile: z.string().optional(),
  // Secrets stay in the environment, only locations go in the file
  swift: z.object({
    authUrl: z.string().optional(),
    region: z.string().optional(),
    storageUrl: z.string().optional(),
  }).strict().optional(),
}).strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Load and parse an optional configuration file
 * @param configPath Path to a YAML or JSON file
 */
export function loadConfigFile(configPath: string): FileConfig {
  const resolvedPath = path.resolve(configPath);

  if (!fs.existsSync(resolvedPath)) {
    throw new Error(`Configuration file not found: ${resolvedPath}`);
  }

  const fileContent = fs.readFileSync(resolvedPath, 'utf-8');
  const fileExt = path.extname(resolvedPath).toLowerCase();

  let raw: unknown;

  try {
    if (fileExt === '.json') {
      raw = JSON.parse(fileContent);
    } else if (fileExt === '.yaml' || fileExt === '.yml') {
      raw = yaml.load(fileContent);
    } else {
      throw new Error(`Unsupported configuration file format: ${fileExt}`);
    }
  } catch (error) {
    throw new Error(`Failed to parse configuration file: ${errorMessage(error)}`);
  }

  // An empty YAML document loads as undefined
  const result = fileConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration file: ${issues}`);
  }

  return result.data;
}

/**
 * Read the initial destination credentials once, into an explicit object
 */
export function readAwsCredentials(env: NodeJS.ProcessEnv): AwsCredentials {
  const accessKeyId = env.AWS_ACCESS_KEY_ID;
  const secretAccessKey = env.AWS_SECRET_ACCESS_KEY;

  if (!accessKeyId || !secretAccessKey) {
    throw new Error('AWS credentials are missing: set AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY');
  }

  return {
    accessKeyId,
    secretAccessKey,
    sessionToken: env.AWS_SESSION_TOKEN || undefined,
  };
}

export function readSwiftAuth(env: NodeJS.ProcessEnv, fileOptions?: FileConfig['swift']): SwiftAuthOptions {
  return {
    authUrl: env.OS_AUTH_URL || fileOptions?.authUrl,
    applicationCredentialId: env.OS_APPLICATION_CREDENTIAL_ID,
    applicationCredentialSecret: env.OS_APPLICATION_CREDENTIAL_SECRET,
    region: env.OS_REGION_NAME || fileOptions?.region,
    storageUrl: env.OS_STORAGE_URL || fileOptions?.storageUrl,
    authToken: env.OS_AUTH_TOKEN,
  };
}

/**
 * Merge command line options over the configuration file, then validate
 */
export function buildConfig(
  cli: CliOptions,
  file: FileConfig = {},
  env: NodeJS.ProcessEnv = process.env
): TransferConfig {
  const config: TransferConfig = {
    container: cli.openStackContainer,
    bucket: cli.s3Bucket,
    region: cli.regionName,
    maxWorkers: cli.maxWorkers,
    bandwidthLimitMb: cli.bandwidthLimitMb,
    prefix: cli.prefix ?? file.prefix,
    stagingDir: cli.stagingDir ?? file.stagingDir,
    maxAttempts: cli.maxAttempts ?? file.maxAttempts,
    retryBaseDelayMs: file.retryBaseDelayMs,
    retryMaxDelayMs: file.retryMaxDelayMs,
    maxObjectTransferMs: file.maxObjectTransferMs,
    requestTimeoutMs: file.requestTimeoutMs,
    listPageSize: file.listPageSize,
    verbose: cli.verbose ?? file.verbose,
    logFile: cli.logFile ?? file.logFile,
    swift: readSwiftAuth(env, file.swift),
  };

  validateConfig(config);

  return config;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1;
}

/**
 * Validate a transfer configuration and fill in defaults
 */
export function validateConfig(config: TransferConfig): void {
  const requiredFields: Array<'container' | 'bucket' | 'region'> = ['container', 'bucket', 'region'];

  for (const field of requiredFields) {
    if (!config[field] || !config[field].trim()) {
      throw new Error(`${field} is missing`);
    }
  }

  if (!isPositiveInteger(config.maxWorkers)) {
    throw new Error(`maxWorkers must be an integer of at least 1, got ${config.maxWorkers}`);
  }

  if (!isPositiveInteger(config.bandwidthLimitMb)) {
    throw new Error(`bandwidthLimitMb must be an integer of at least 1, got ${config.bandwidthLimitMb}`);
  }

  if (config.maxAttempts !== undefined && !isPositiveInteger(config.maxAttempts)) {
    throw new Error(`maxAttempts must be an integer of at least 1, got ${config.maxAttempts}`);
  }

  // Set default values
  if (config.maxAttempts === undefined) {
    config.maxAttempts = DEFAULT_MAX_ATTEMPTS;
  }

  if (config.retryBaseDelayMs === undefined) {
    config.retryBaseDelayMs = DEFAULT_RETRY_BASE_DELAY_MS;
  }

  if (config.retryMaxDelayMs === undefined) {
    config.retryMaxDelayMs = DEFAULT_RETRY_MAX_DELAY_MS;
  }

  if (config.maxObjectTransferMs === undefined) {
    config.maxObjectTransferMs = DEFAULT_MAX_OBJECT_TRANSFER_MS;
  }

  if (config.requestTimeoutMs === undefined) {
    config.requestTimeoutMs = DEFAULT_REQUEST_TIMEOUT_MS;
  }

  if (config.listPageSize === undefined) {
    config.listPageSize = DEFAULT_LIST_PAGE_SIZE;
  }

  if (typeof config.verbose !== 'boolean') {
    config.verbose = false;
  }

  if (config.retryMaxDelayMs < config.retryBaseDelayMs) {
    throw new Error('retryMaxDelayMs must not be smaller than retryBaseDelayMs');
  }
}
