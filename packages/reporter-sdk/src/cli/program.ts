import { Command } from 'commander';
import { readFileSync } from 'fs';
import chalk from 'chalk';
import { z } from 'zod';
import type { Payload } from '@tuner-cloud/shared-types';
import { ReportingClient, type ReportingClientOptions } from '../client.js';
import { loadConfig } from '../config.js';
import { OUTCOME } from '../constants.js';
import { createLogger } from '../logger.js';

export interface CliDependencies {
  createClient?: (options: ReportingClientOptions) => ReportingClient;
  env?: NodeJS.ProcessEnv;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

interface ConnectionOptions {
  apiKey?: string;
  url?: string;
}

interface SendOptions extends ConnectionOptions {
  type: string;
  file?: string;
  data?: string;
}

interface StatusOptions extends ConnectionOptions {
  extended?: boolean;
}

const PayloadSchema = z.record(z.unknown());

function readPayload(options: SendOptions): Payload {
  let raw: string;
  if (options.file) {
    raw = readFileSync(options.file, 'utf-8');
  } else if (options.data) {
    raw = options.data;
  } else {
    throw new Error('Either --file or --data must be provided');
  }

  const parsed: unknown = JSON.parse(raw);
  const result = PayloadSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error('Payload must be a JSON object');
  }
  return result.data;
}

function addConnectionOptions(command: Command): Command {
  return command
    .option('-k, --api-key <key>', 'Cloud service API key (default: $TUNER_CLOUD_API_KEY)')
    .option('-u, --url <url>', 'Cloud service base URL (default: $TUNER_CLOUD_URL)');
}

/**
 * cloud-reporter CLI の構築
 */
export function createProgram(deps: CliDependencies = {}): Command {
  const env = deps.env ?? process.env;
  const stdout = deps.stdout ?? ((line: string) => console.log(line));
  const stderr = deps.stderr ?? ((line: string) => console.error(line));
  // 結果は stdout に出すため、クライアントのログは警告以上に絞る
  const createClient =
    deps.createClient ??
    ((options) => new ReportingClient({ ...options, logger: createLogger({ level: 'warn' }) }));

  const fail = (message: string): void => {
    stderr(chalk.red(`❌ ${message}`));
    process.exitCode = 1;
  };

  /**
   * 環境変数とオプションからクライアントを作成して有効化する
   */
  const connect = async (options: ConnectionOptions): Promise<ReportingClient | undefined> => {
    const config = loadConfig(env);
    const apiKey = options.apiKey ?? config.apiKey;
    if (!apiKey) {
      fail('An API key is required (--api-key or TUNER_CLOUD_API_KEY)');
      return undefined;
    }

    const { apiKey: _omitted, ...settings } = config;
    const client = createClient(settings);
    await client.enable(apiKey, options.url);
    return client;
  };

  const program = new Command();

  program
    .name('cloud-reporter')
    .description('Report tuning status and results to the cloud service')
    .version('0.1.0')
    .addHelpText(
      'after',
      `
Examples:
  $ cloud-reporter check-access -k <key>
  $ cloud-reporter send -t results -f ./trial.json
  $ cloud-reporter status --extended`
    );

  addConnectionOptions(
    program.command('check-access').description('Check whether an API key is accepted')
  ).action(async (options: ConnectionOptions) => {
    const client = await connect(options);
    if (!client) {
      return;
    }

    if (client.isEnabled) {
      stdout(chalk.green('✅ API key accepted'));
    } else {
      fail(`API key rejected (${client.status})`);
    }
  });

  addConnectionOptions(
    program
      .command('send')
      .description('Send a single payload and wait for the outcome')
      .option('-t, --type <type>', 'Information type (status, results)', 'results')
      .option('-f, --file <file>', 'Path to a JSON file containing the payload')
      .option('-d, --data <json>', 'Payload as a JSON string')
  ).action(async (options: SendOptions) => {
    let payload: Payload;
    try {
      payload = readPayload(options);
    } catch (error) {
      fail(error instanceof Error ? error.message : String(error));
      return;
    }

    const client = await connect(options);
    if (!client) {
      return;
    }
    if (!client.isEnabled) {
      fail(`Cloud service not enabled (${client.status})`);
      return;
    }

    const outcome = await client.sendBlocking(options.type, payload);
    if (outcome === OUTCOME.OK) {
      stdout(chalk.green(`✅ ${options.type} sent`));
    } else {
      fail(`Send failed: ${outcome}`);
    }
  });

  addConnectionOptions(
    program
      .command('status')
      .description('Show the cloud service status summary')
      .option('--extended', 'Include endpoint and dispatcher details')
  ).action(async (options: StatusOptions) => {
    const client = await connect(options);
    if (!client) {
      return;
    }
    stdout(client.summary(options.extended ?? false));
    if (!client.isEnabled) {
      process.exitCode = 1;
    }
  });

  return program;
}
