#!/usr/bin/env node
/**
 * Duet CLI
 *
 * Runs benchmark sessions with the planner/executor pair.
 */

import { Command, InvalidArgumentError } from 'commander';
import yaml from 'yaml';

import { VERSION } from '../index.js';
import { HttpBenchmarkClient } from '../api/client.js';
import { errorMessage } from '../api/errors.js';
import { HttpSessionClient } from '../api/session.js';
import { getProfile, listProfiles, resolveProfileSettings } from '../agent/profiles/registry.js';
import { runSession, runTask } from '../agent/orchestrator/task_runner.js';
import {
  getConfigPath,
  loadConfig,
  PROFILE_NAMES,
  readSecret,
  resolveBenchmark,
  type DuetConfig,
  type ProfileName,
} from '../core/config.js';
import { createLlmClient } from '../core/llm.js';
import { isLogLevel, Logger, type LogLevel } from '../core/logger.js';
import { installRunLogMirror } from '../core/unified-logging.js';

function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return Number(value);
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError('Expected one of: debug, info, warn, error.');
  }
  return value;
}

function parseProfile(value: string): ProfileName {
  const match = PROFILE_NAMES.find((name) => name === value);
  if (!match) {
    throw new InvalidArgumentError(`Expected one of: ${PROFILE_NAMES.join(', ')}.`);
  }
  return match;
}

interface RunOptions {
  config?: string;
  profile?: ProfileName;
  model?: string;
  maxTurns?: number;
  limit?: number;
  logLevel?: LogLevel;
}

function applyCliOverrides(config: DuetConfig, options: RunOptions): DuetConfig {
  return {
    ...config,
    profile: options.profile ?? config.profile,
    agent: {
      ...config.agent,
      model: options.model ?? config.agent.model,
      maxTurns: options.maxTurns ?? config.agent.maxTurns,
    },
    logging: {
      ...config.logging,
      level: options.logLevel ?? config.logging.level,
    },
  };
}

async function runCommand(options: RunOptions): Promise<void> {
  const config = applyCliOverrides(loadConfig(options.config), options);
  const logger = new Logger(config.logging.level);
  const mirror = config.logging.mirrorPath
    ? installRunLogMirror({ filePath: config.logging.mirrorPath })
    : null;

  try {
    const profile = getProfile(config.profile, config);
    const settings = resolveProfileSettings(profile, config);
    const apiKey = readSecret(config.api.apiKeyEnv);
    const benchmark = resolveBenchmark(config);
    const bootstrap = new HttpSessionClient(config.api.baseUrl, apiKey, config.api.timeoutMs);
    const deps = {
      config,
      profile,
      settings,
      plannerLlm: createLlmClient(config, 'planner'),
      executorLlm: createLlmClient(config, 'executor'),
      createClient: (task: { task_id: string }) =>
        new HttpBenchmarkClient({
          baseUrl: config.api.baseUrl,
          benchmark,
          taskId: task.task_id,
          apiKey,
          timeoutMs: config.api.timeoutMs,
        }),
      logger,
      ...(config.logging.echo && { echo: (line: string) => logger.info(line) }),
    };

    logger.info(`Initializing session (${profile.name} profile, model ${config.agent.model})...`);
    const report = await runSession({
      bootstrap,
      request: { ...config.session, benchmark },
      runTask: (task) => runTask(task, deps),
      logger,
      limit: options.limit,
    });

    const solved = report.tasks.filter((task) => task.score === 1).length;
    logger.info(`\n${solved}/${report.tasks.length} task(s) scored 1.0 in session ${report.sessionId}`);
  } finally {
    mirror?.uninstall();
  }
}

const program = new Command();

program.name('duet').description('Planner/executor harness for benchmark APIs').version(VERSION);

program
  .command('run')
  .description('Start a session and run every task in it')
  .option('-c, --config <path>', 'Config file path')
  .option('-p, --profile <name>', `Domain profile (${PROFILE_NAMES.join(' | ')})`, parseProfile)
  .option('-m, --model <id>', 'Model ID for planner and executor')
  .option('--max-turns <n>', 'Planner turns per task', parsePositiveInt)
  .option('--limit <n>', 'Run only the first N tasks', parsePositiveInt)
  .option('--log-level <level>', 'Console log level (debug | info | warn | error)', parseLogLevel)
  .action(async (options: RunOptions) => {
    try {
      await runCommand(options);
    } catch (error) {
      console.error(`Session failed: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  });

program
  .command('config')
  .description('Print the resolved configuration')
  .option('-c, --config <path>', 'Config file path')
  .action((options: { config?: string }) => {
    console.log(`# ${options.config ?? getConfigPath()}`);
    console.log(yaml.stringify(loadConfig(options.config)));
  });

program
  .command('profiles')
  .description('List domain profiles')
  .action(() => {
    for (const profile of listProfiles()) {
      console.log(`${profile.name.padEnd(10)} ${profile.description}`);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
