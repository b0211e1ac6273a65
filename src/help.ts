// Third-party dependencies
import chalk from 'chalk';

// Define help topic interface
export interface HelpTopic {
  title: string;
  content: string;
}

// Define help topics
export const helpTopics: Record<string, HelpTopic> = {
  config: {
    title: 'Configuration File Format',
    content: `
Optional configuration file (YAML or JSON), passed with --config.
Command line flags take precedence over values in the file.

  prefix: 'photos/'              # Only transfer objects with this prefix
  stagingDir: '/var/tmp'         # Parent of the per-run staging directory (default: OS temp dir)
  maxAttempts: 3                 # Upload attempts per object
  retryBaseDelayMs: 1000         # Backoff unit: waits are 2, 4, 8... units
  retryMaxDelayMs: 60000         # Ceiling for a single backoff wait
  maxObjectTransferMs: 1800000   # Give up on an object's upload after this long
  requestTimeoutMs: 120000       # Per-call network timeout
  listPageSize: 1000             # Listing page size
  verbose: false
  logFile: './logs/transfer.log' # Default: <timestamp>_<container>_to_<bucket>.log

  swift:
    authUrl: 'https://keystone.example.com/v3'
    region: 'RegionOne'
    `
  },
  credentials: {
    title: 'Credentials',
    content: `
Credentials are read from the environment once, at start-up.

OpenStack Swift (one of):
  OS_AUTH_URL, OS_APPLICATION_CREDENTIAL_ID, OS_APPLICATION_CREDENTIAL_SECRET
  [OS_REGION_NAME]                      Keystone v3 application credential
  OS_STORAGE_URL, OS_AUTH_TOKEN         Pre-issued token

AWS:
  AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY, [AWS_SESSION_TOKEN]

When the AWS session expires mid-run, new dispatch pauses and you are prompted once
for a new access key, secret key and session token. Running uploads then resume with
the new credentials; an expiry does not count as a failed attempt.
    `
  },
  process: {
    title: 'Transfer Process',
    content: `
1. Check that the S3 bucket exists (abort otherwise)
2. List every object in the Swift container
3. For each object, on a pool of --maxWorkers workers:
   - Keys ending in "/" are recreated as zero-byte directory markers
   - Download to the staging directory and compute its MD5
   - Compare with the S3 ETag: equal objects are skipped, missing or changed
     objects are uploaded (with retries and exponential backoff)
   - Remove the staged file
4. Remove the staging directory
5. Re-list both stores and compare object counts

Running the tool again only uploads what changed since the previous run.
All uploads together stay under --bandwidthLimitMb MB/s.
    `
  },
};

/**
 * Display help for a topic, or the list of topics
 */
export function displayHelp(topic: string | undefined, programName: string): void {
  if (topic && helpTopics[topic]) {
    const { title, content } = helpTopics[topic];
    console.log(chalk.cyanBright.bold(`\n${title}`));
    console.log(chalk.white(content));
    return;
  }

  if (topic) {
    console.log(chalk.yellow(`Unknown help topic: ${topic}`));
  }

  console.log(chalk.cyanBright.bold('\nAvailable help topics:'));
  for (const [key, value] of Object.entries(helpTopics)) {
    console.log(`  ${chalk.green(key.padEnd(12))} ${value.title}`);
  }
  console.log(`\nUsage: ${programName} help <topic>\n`);
}
