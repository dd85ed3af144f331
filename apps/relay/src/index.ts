#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import axios from 'axios';
import { getEnvWithFallback, logger } from '@telemetry-relay/core';
import { ConfigStore } from './config/config-store.js';
import { loadConfigFile } from './config/loader.js';
import { ConfigError } from './config/types.js';
import { TelemetryRelay } from './relay.js';

const DEFAULT_CONFIG = 'config/relay.yaml';

function configPath(option: string | undefined): string {
  return option ?? getEnvWithFallback('RELAY_CONFIG', DEFAULT_CONFIG, 'Pass --config or set RELAY_CONFIG.');
}

function printConfigError(error: ConfigError): void {
  console.error(chalk.red(`❌ Invalid configuration: ${error.source}`));
  for (const issue of error.issues) {
    console.error(chalk.red(`  - ${issue}`));
  }
}

const program = new Command();

program.name('relay').description('OTLP ingestion and fan-out relay').version('1.0.0');

program
  .command('start', { isDefault: true })
  .description('Start the relay')
  .option('-c, --config <path>', 'Configuration file (default: $RELAY_CONFIG or config/relay.yaml)')
  .action(async (options: { config?: string }) => {
    const path = configPath(options.config);

    let relay: TelemetryRelay;
    try {
      const store = new ConfigStore(await loadConfigFile(path), () => loadConfigFile(path));
      relay = new TelemetryRelay(store, {
        handleSignals: true,
        onSignalStop: (error) => {
          if (error) {
            logger.error('Error during shutdown', { error });
            process.exit(1);
          }
          process.exit(0);
        },
      });
    } catch (error) {
      if (error instanceof ConfigError) {
        printConfigError(error);
        process.exit(1);
      }
      throw error;
    }

    try {
      await relay.start();
    } catch (error) {
      logger.error('Fatal error while starting the relay', { error });
      process.exit(1);
    }
  });

program
  .command('validate')
  .description('Load and validate a configuration file')
  .option('-c, --config <path>', 'Configuration file (default: $RELAY_CONFIG or config/relay.yaml)')
  .action(async (options: { config?: string }) => {
    const path = configPath(options.config);
    try {
      const config = await loadConfigFile(path);
      console.log(chalk.green(`✅ ${path} is valid`));
      console.log(chalk.gray(`  pipelines: ${config.pipelines.map((pipeline) => pipeline.id).join(', ')}`));
    } catch (error) {
      if (error instanceof ConfigError) {
        printConfigError(error);
      } else {
        console.error(chalk.red(`❌ Unexpected error: ${error}`));
      }
      process.exit(1);
    }
  });

program
  .command('reload')
  .description('Ask a running relay to reload its configuration')
  .option('-e, --endpoint <url>', 'health_check endpoint of the relay', 'http://localhost:13133')
  .action(async (options: { endpoint: string }) => {
    const url = `${options.endpoint.replace(/\/+$/, '')}/-/reload`;
    try {
      const response = await axios.post<{ status?: string }>(url, undefined, { validateStatus: () => true, timeout: 10_000 });
      if (response.status === 200) {
        console.log(chalk.green(`✅ Reload ${response.data.status ?? 'done'}`));
        return;
      }
      console.error(chalk.red(`❌ Reload refused (HTTP ${response.status})`));
      console.error(chalk.gray(JSON.stringify(response.data, null, 2)));
      process.exit(1);
    } catch (error) {
      console.error(chalk.red(`❌ Could not reach ${url}: ${error instanceof Error ? error.message : String(error)}`));
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  logger.error('Fatal error', { error });
  process.exit(1);
});
