#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { existsSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import packageJson from '../package.json';
import { createConfigLoader, renderStarterConfig } from './config';
import { RunLogger } from './logging/run-logger';
import { createCheckPipeline, createPipeline, DeploymentOrchestrator, DeploymentPipeline } from './orchestration';
import { createToolchain } from './provisioning';
import { DeploymentMode, DeploymentResult, RunConfig } from './types';

interface RunOptions {
  config?: string;
  verbose?: boolean;
}

const program = new Command();

program
  .name('deploy-orchestrator')
  .description('Build, deploy and verify the multi-service application')
  .version(packageJson.version);

async function resolveRunConfig(mode: DeploymentMode, options: RunOptions): Promise<RunConfig> {
  const spinner = ora('Resolving run configuration...').start();
  try {
    const config = await createConfigLoader().load({
      mode,
      cwd: process.cwd(),
      env: process.env,
      configPath: options.config
    });
    spinner.succeed(`Configuration resolved (log file: ${config.logFile})`);
    return config;
  } catch (error) {
    spinner.fail('Configuration could not be resolved');
    throw error;
  }
}

function reportFailure(result: DeploymentResult): void {
  console.log(chalk.red('\n❌ Deployment failed'));
  for (const error of result.errors ?? []) {
    console.log(`  ${error.code} in ${error.stage}: ${error.message}`);
    if (error.remediation) {
      console.log(chalk.yellow(`  💡 ${error.remediation}`));
    }
  }
  console.log(chalk.gray(`\n📄 Log file: ${result.metadata.logFile}`));
}

async function execute(
  mode: DeploymentMode,
  options: RunOptions,
  build: (config: RunConfig, logger: RunLogger) => DeploymentPipeline
): Promise<void> {
  try {
    const config = await resolveRunConfig(mode, options);
    const logger = new RunLogger(config.logFile);
    const result = await new DeploymentOrchestrator(logger).deploy(build(config, logger));

    if (!result.success) {
      reportFailure(result);
      process.exit(1);
    }

    console.log(chalk.gray(`\n⏱️  Run took ${result.metadata.duration}ms (run ID ${result.metadata.runId})`));
    process.exit(0);
  } catch (error) {
    console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
    if (options.verbose) {
      console.error(error);
    }
    process.exit(1);
  }
}

program
  .command('compose')
  .description('Build and start every service with Docker Compose, then verify traffic')
  .option('-c, --config <path>', 'Path to configuration file (default: deploy.yml if present)')
  .option('-v, --verbose', 'Print stack traces on unexpected errors')
  .action(async (options: RunOptions) => {
    await execute('compose', options, (config, logger) =>
      createPipeline(config, createToolchain(config, process.env), logger)
    );
  });

program
  .command('cluster')
  .description('Build images into the local cluster, apply manifests in order and verify traffic')
  .option('-c, --config <path>', 'Path to configuration file (default: deploy.yml if present)')
  .option('-v, --verbose', 'Print stack traces on unexpected errors')
  .action(async (options: RunOptions) => {
    await execute('cluster', options, (config, logger) =>
      createPipeline(config, createToolchain(config, process.env), logger)
    );
  });

program
  .command('check')
  .description('Check required tools and ports without changing anything')
  .option('-m, --mode <mode>', 'Deployment mode to check for (compose|cluster)', 'compose')
  .option('-c, --config <path>', 'Path to configuration file (default: deploy.yml if present)')
  .option('-v, --verbose', 'Print stack traces on unexpected errors')
  .action(async (options: RunOptions & { mode: string }) => {
    if (options.mode !== 'compose' && options.mode !== 'cluster') {
      console.error(chalk.red(`❌ Unknown mode "${options.mode}". Use compose or cluster.`));
      process.exit(1);
    }
    await execute(options.mode, options, (config, logger) =>
      createCheckPipeline(config, createToolchain(config, process.env), logger)
    );
  });

program
  .command('init')
  .description('Write a starter configuration file with every default spelled out')
  .option('-o, --output <path>', 'Output configuration file path', 'deploy.yml')
  .option('-f, --force', 'Overwrite an existing file')
  .action((options: { output: string; force?: boolean }) => {
    const spinner = ora('Writing configuration file...').start();
    const target = resolve(process.cwd(), options.output);

    try {
      if (existsSync(target) && !options.force) {
        throw new Error(`${target} already exists (use --force to overwrite)`);
      }

      writeFileSync(target, renderStarterConfig());
      spinner.succeed(`Configuration file created: ${target}`);
      console.log(chalk.green('\n✅ Next steps:'));
      console.log('1. Review and customize the configuration file');
      console.log(`2. Run: ${chalk.cyan('deploy-orchestrator check')}`);
      console.log(`3. Run: ${chalk.cyan('deploy-orchestrator compose')} or ${chalk.cyan('deploy-orchestrator cluster')}`);
    } catch (error) {
      spinner.fail('Initialization failed');
      console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

program.on('command:*', () => {
  console.error(chalk.red('❌ Invalid command. See --help for available commands.'));
  process.exit(1);
});

if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync().catch((error: unknown) => {
    console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
