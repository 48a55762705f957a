/**
 * Domain profile types.
 *
 * A profile bundles everything that differs between benchmarks: the
 * knowledge text both agents read, the tool set, how the environment
 * snapshot is obtained and which executor output ends a task.
 */

import type { BenchmarkApiClient } from '../../api/client.js';
import type { ProfileName } from '../../core/config.js';
import type { CompletionMarker } from '../orchestrator/completion.js';
import type { ToolDefinition, ToolSetContext } from '../tools/types.js';

export type TurnGranularity = 'single-step' | 'combined';
export type VerificationOwner = 'planner' | 'executor';

/** Structured environment state shown to the planner each turn. */
export type Snapshot = Record<string, unknown>;

export interface ProfileDefaults {
  turnGranularity: TurnGranularity;
  verificationOwner: VerificationOwner;
  contextExtraction: boolean;
}

/**
 * Profile defaults merged with config overrides.
 */
export interface ProfileSettings extends ProfileDefaults {
  maxTurns: number;
  maxStepsPerTurn: number;
  historyWindow: number;
}

/**
 * Searchable document store consulted by the context extractor.
 */
export interface KnowledgeBase {
  /** Paths of documents matching a keyword. */
  search(keyword: string): Promise<string[]>;
  load(path: string): Promise<string>;
}

export interface DomainProfile {
  name: ProfileName;
  description: string;
  /** What the planner directs, e.g. "an autonomous e-commerce system". */
  system: string;
  /** Heading of the snapshot block in the planner prompt. */
  snapshotLabel: string;
  /** Noun used when a snapshot refresh fails. */
  snapshotSubject: string;
  knowledge: string;
  plannerDirectives: string[];
  executorRules: string[];
  completionMarkers: CompletionMarker[];
  defaults: ProfileDefaults;
  createTools(ctx: ToolSetContext): ToolDefinition[];
  prepareTask?(client: BenchmarkApiClient): Promise<void>;
  loadBaseline?(client: BenchmarkApiClient): Promise<Snapshot>;
  refreshSnapshot?(client: BenchmarkApiClient): Promise<Snapshot>;
  knowledgeBase?(client: BenchmarkApiClient): KnowledgeBase;
}
