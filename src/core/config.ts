import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import yaml from 'yaml';
import { z } from 'zod';

import { ConfigError } from '../api/errors.js';

export const PROFILE_NAMES = ['store', 'assistant'] as const;
export type ProfileName = (typeof PROFILE_NAMES)[number];

/** Benchmark a session starts when `session.benchmark` is not set. */
export const DEFAULT_BENCHMARKS: Record<ProfileName, string> = {
  store: 'store',
  assistant: 'erc3-dev',
};

const ProfileOverridesSchema = z
  .object({
    maxTurns: z.number().int().positive().optional(),
    maxStepsPerTurn: z.number().int().positive().optional(),
    turnGranularity: z.enum(['single-step', 'combined']).optional(),
    verificationOwner: z.enum(['planner', 'executor']).optional(),
    contextExtraction: z.boolean().optional(),
  })
  .default({});

const ConfigSchema = z.object({
  profile: z.enum(PROFILE_NAMES).default('store'),
  agent: z
    .object({
      model: z.string().default('openai/gpt-oss-20b'),
      executorModel: z.string().optional(),
      temperature: z.number().min(0).max(2).default(0.2),
      maxTurns: z.number().int().positive().default(7),
      historyWindow: z.number().int().positive().default(4),
      maxStepsPerTurn: z.number().int().positive().default(2),
      profiles: z
        .object({
          store: ProfileOverridesSchema,
          assistant: ProfileOverridesSchema,
        })
        .default({}),
    })
    .default({}),
  contextExtractor: z
    .object({
      maxKeywords: z.number().int().min(1).max(10).default(5),
      minKeywordLength: z.number().int().min(2).default(5),
      rulesDocument: z.string().default('rulebook.md'),
    })
    .default({}),
  llm: z
    .object({
      baseUrl: z.string().url().default('https://api.openai.com/v1'),
      apiKeyEnv: z.string().default('DUET_LLM_API_KEY'),
      timeoutMs: z.number().int().positive().default(120_000),
    })
    .default({}),
  api: z
    .object({
      baseUrl: z.string().url().default('http://localhost:8080'),
      apiKeyEnv: z.string().default('DUET_API_KEY'),
      timeoutMs: z.number().int().positive().default(30_000),
    })
    .default({}),
  pagination: z
    .object({
      initialLimit: z.number().int().positive().default(10),
      maxRetriesPerPage: z.number().int().positive().default(5),
      maxPages: z.number().int().positive().default(200),
    })
    .default({}),
  retry: z
    .object({
      maxAttempts: z.number().int().positive().default(3),
      baseDelayMs: z.number().int().nonnegative().default(5_000),
    })
    .default({}),
  session: z
    .object({
      benchmark: z.string().min(1).optional(),
      workspace: z.string().default('my'),
      name: z.string().default('duet planner-executor'),
      architecture: z.string().default('Planner-Executor dual agent'),
    })
    .default({}),
  store: z
    .object({
      clearBasketOnStart: z.boolean().default(false),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      echo: z.boolean().default(true),
      mirrorPath: z.string().optional(),
    })
    .default({}),
});

export type DuetConfig = z.infer<typeof ConfigSchema>;
export type ProfileOverrides = z.infer<typeof ProfileOverridesSchema>;

export function getConfigPath(): string {
  return process.env.DUET_CONFIG_PATH ?? join(homedir(), '.duet', 'config.yaml');
}

function applyEnvOverrides(raw: Record<string, unknown>): Record<string, unknown> {
  const agent = isRecord(raw.agent) ? { ...raw.agent } : {};

  const maxTurns = process.env.DUET_MAX_TURNS;
  if (maxTurns && /^\d+$/.test(maxTurns.trim())) {
    agent.maxTurns = Number(maxTurns.trim());
  }
  const model = process.env.DUET_MODEL?.trim();
  if (model) {
    agent.model = model;
  }

  const next: Record<string, unknown> = { ...raw, agent };
  const profile = process.env.DUET_PROFILE?.trim();
  if (profile) {
    next.profile = profile;
  }
  return next;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse an already-loaded config object (YAML document or test fixture).
 */
export function parseConfig(raw: unknown): DuetConfig {
  const base = raw === null || raw === undefined ? {} : raw;
  if (!isRecord(base)) {
    throw new ConfigError('Config root must be a mapping');
  }
  const result = ConfigSchema.safeParse(applyEnvOverrides(base));
  if (!result.success) {
    throw new ConfigError(`Invalid config: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function loadConfig(configPath?: string): DuetConfig {
  const path = configPath ?? getConfigPath();
  if (!existsSync(path)) {
    if (configPath) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    return parseConfig({});
  }
  const text = readFileSync(path, 'utf-8');
  let doc: unknown;
  try {
    doc = yaml.parse(text);
  } catch (error) {
    throw new ConfigError(
      `Config file ${path} is not valid YAML: ${error instanceof Error ? error.message : 'Unknown'}`
    );
  }
  return parseConfig(doc);
}

export function resolveBenchmark(config: DuetConfig): string {
  return config.session.benchmark ?? DEFAULT_BENCHMARKS[config.profile];
}

export function readSecret(envName: string): string | undefined {
  const value = process.env[envName]?.trim();
  return value ? value : undefined;
}
