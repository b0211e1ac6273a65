#!/usr/bin/env node
// Third-party dependencies
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';

// Local imports
import { buildConfig, loadConfigFile } from './config';
import { displayHelp } from './help';
import { closeLogger, defaultLogFileName, initLogger, logError } from './logger';
import { createTransferServices, runTransfer } from './migration';

// Types
import type { CliOptions } from './config';

// Package info
import { name, version } from '../package.json';

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be an integer of at least 1.');
  }
  return parsed;
}

const REQUIRED_OPTIONS: Array<keyof CliOptions> = [
  'openStackContainer',
  's3Bucket',
  'maxWorkers',
  'regionName',
  'bandwidthLimitMb',
];

// Create the command line program
const program = new Command();

// Main command
program
  .name(name)
  .version(version)
  .description('Transfer objects from an OpenStack Swift container to an AWS S3 bucket')
  .option('--openStackContainer <name>', 'Name of the OpenStack container (required)')
  .option('--s3Bucket <name>', 'Name of the S3 bucket (required)')
  .option('--maxWorkers <number>', 'Number of workers for concurrent transfers, minimum 1 (required)', parsePositiveInt)
  .option('--regionName <region>', 'AWS region name (required)')
  .option('--bandwidthLimitMb <number>', 'Maximum bandwidth in MB/s for S3 uploads, minimum 1 (required)', parsePositiveInt)
  .option('-c, --config <file>', 'Optional configuration file (YAML or JSON)')
  .option('-p, --prefix <prefix>', 'Only transfer objects with this prefix')
  .option('--staging-dir <dir>', 'Directory for temporary files')
  .option('--max-attempts <number>', 'Upload attempts per object', parsePositiveInt)
  .option('-v, --verbose', 'Enable verbose logging with detailed error messages')
  .option('-l, --log-file <path>', 'Save logs to the specified file')
  .action(async () => {
    const options = program.opts<CliOptions>();

    // Required for transfers, not for "help"
    const missing = REQUIRED_OPTIONS.filter(option => options[option] === undefined);
    if (missing.length > 0) {
      program.error(`error: required option(s) not specified: ${missing.map(option => `--${option}`).join(', ')}`);
    }

    // Load configuration
    const fileConfig = options.config ? loadConfigFile(options.config) : {};
    const config = buildConfig(options, fileConfig);

    initLogger({
      container: config.container,
      bucket: config.bucket,
      verbose: config.verbose,
      logFile: config.logFile ?? defaultLogFileName(config.container, config.bucket),
    });

    try {
      const services = await createTransferServices(config);
      await runTransfer(config, services);
    } catch (error) {
      logError('Transfer aborted', error);
      process.exitCode = 1;
    } finally {
      closeLogger();
    }
  });

// Help command
program
  .command('help [topic]')
  .description('Display help information about specific topics')
  .action((topic?: string) => {
    displayHelp(topic, name);
  });

// Add examples
program.addHelpText('after', `
Examples:
  $ ${name} --openStackContainer photos --s3Bucket photo-archive --maxWorkers 8 --regionName eu-west-1 --bandwidthLimitMb 50
  $ ${name} --openStackContainer logs --s3Bucket log-archive --maxWorkers 4 --regionName us-east-1 --bandwidthLimitMb 10 --prefix "2024/"
  $ ${name} --openStackContainer logs --s3Bucket log-archive --maxWorkers 4 --regionName us-east-1 --bandwidthLimitMb 10 --config ./transfer.yaml
  $ ${name} help config
  $ ${name} help credentials
  $ ${name} help process
`);

// Parse command line arguments
program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red.bold('Error:'), chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
