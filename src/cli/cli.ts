#!/usr/bin/env node

import { Command } from 'commander';
import { runCommand } from './commands/run';
import { validateCommand } from './commands/validate';
import { DEFAULT_REQUEST_FORMAT, DEFAULT_RESPONSE_FORMAT } from './options';

const program = new Command();

program
  .name('httpscript')
  .description('Run .http request files with pre-request and response test scripts')
  .version('0.1.0');

program
  .command('run', { isDefault: true })
  .description('Execute requests, run their handler scripts and report test results')
  .argument('[files...]', 'Request files, `path#N` runs only the N-th request of a file')
  .option('-n, --env-file <path>', 'Environment file (JSON or YAML)', 'http-client.env.json')
  .option('-p, --snapshot <path>', 'File holding persisted variables between runs', '.snapshot.json')
  .option('-e, --env <name>', 'Environment to select from the environment file', 'dev')
  .option('--request-format <format>', 'Request output format (%N name, %R request line, %H headers, %B body)', DEFAULT_REQUEST_FORMAT)
  .option('--response-format <format>', 'Response output format (%R status line, %H headers, %B body, %T tests)', DEFAULT_RESPONSE_FORMAT)
  .option('--format <kind>', 'Output kind (standard|ci)', 'standard')
  .option('-k, --insecure', 'Do not verify TLS certificates')
  .option('--timeout <ms>', 'Request timeout in milliseconds', '30000')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(runCommand);

program
  .command('validate')
  .description('Parse request files and list their requests')
  .argument('[files...]', 'Request files, `path#N` selects a single request')
  .option('--preview', 'Print each request with variables and generators substituted')
  .option('-n, --env-file <path>', 'Environment file used by --preview', 'http-client.env.json')
  .option('-p, --snapshot <path>', 'Snapshot file used by --preview', '.snapshot.json')
  .option('-e, --env <name>', 'Environment used by --preview', 'dev')
  .option('--request-format <format>', 'Request format used by --preview', '%N\\n%R\\n%H\\n%B\\n\\n')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(validateCommand);

program.parseAsync().catch(error => {
  console.error(error);
  process.exit(1);
});
