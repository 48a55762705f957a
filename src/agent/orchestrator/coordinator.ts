/**
 * Coordinator
 *
 * Runs one task: INIT, then up to `maxTurns` planner/executor turns, then
 * DONE. A turn ends the task when its output carries a completion marker or
 * the completion latch has closed. Each turn clears the action log, refreshes the environment snapshot,
 * asks the planner for one instruction and hands it to a fresh executor.
 *
 * Planner failures and rate limits end the task by propagating; any other
 * executor failure is recorded and the loop goes on.
 */

import { EventEmitter } from 'eventemitter3';

import type { BenchmarkApiClient } from '../../api/client.js';
import { errorMessage } from '../../api/errors.js';
import type { LlmClient } from '../../core/llm.js';
import type { Logger } from '../../core/logger.js';
import { Executor } from '../executor/executor.js';
import { ActionLogger } from '../logging/action-logger.js';
import { runContextExtraction, type ContextExtractorOptions } from '../planning/context_extractor.js';
import { Planner } from '../planning/planner.js';
import type { DomainProfile, ProfileSettings, Snapshot } from '../profiles/types.js';
import type { PaginationOptions } from '../tools/pagination.js';
import { ToolRegistry } from '../tools/registry.js';
import { CompletionLatch, detectCompletion, type CompletionMarker } from './completion.js';
import { parsePlannerDecision, type PlannerDecision } from './decision.js';
import { isRateLimitError } from './retry_classifier.js';
import { renderHistory, type CoordinatorResult, type TurnRecord } from './state.js';

export interface CoordinatorEvents {
  'task:start': (task: string) => void;
  'turn:start': (turn: number) => void;
  snapshot: (turn: number, snapshot: Snapshot) => void;
  decision: (turn: number, decision: PlannerDecision) => void;
  'executor:output': (turn: number, output: string) => void;
  'turn:end': (record: TurnRecord) => void;
  completion: (turn: number, marker: CompletionMarker) => void;
  'task:end': (result: CoordinatorResult) => void;
}

export interface CoordinatorParams {
  task: string;
  profile: DomainProfile;
  settings: ProfileSettings;
  client: BenchmarkApiClient;
  plannerLlm: LlmClient;
  executorLlm?: LlmClient;
  logger: Logger;
  /** Live echo of tool log lines; omit to keep them silent. */
  echo?: (line: string) => void;
  pagination?: Partial<PaginationOptions>;
  contextExtractor?: ContextExtractorOptions;
  temperature?: number;
}

const ERROR_LINE_PATTERNS = ['[TOOL ERROR]', '[PARSE ERROR]'];

/**
 * Executor error lines to flag into the action log, skipping the request
 * and response lines that are already there.
 */
export function findErrorLines(output: string): string[] {
  return output
    .split('\n')
    .filter((line) => ERROR_LINE_PATTERNS.some((pattern) => line.includes(pattern)))
    .filter((line) => !line.includes('[REQ ->]') && !line.includes('[<- RESP'))
    .map((line) => `    [EXECUTOR ERROR] ${line.trim()}`);
}

export class Coordinator extends EventEmitter<CoordinatorEvents> {
  readonly actionLogger: ActionLogger;
  readonly latch = new CompletionLatch();
  readonly tools: ToolRegistry;
  private readonly planner: Planner;

  constructor(private readonly params: CoordinatorParams) {
    super();
    this.actionLogger = new ActionLogger(params.echo);
    this.tools = new ToolRegistry(
      params.profile.createTools({
        client: params.client,
        logger: this.actionLogger,
        latch: this.latch,
        pagination: params.pagination,
      })
    );
    this.planner = new Planner({
      llm: params.plannerLlm,
      task: params.task,
      profile: params.profile,
      settings: params.settings,
      temperature: params.temperature,
      logger: params.logger,
    });
  }

  async run(): Promise<CoordinatorResult> {
    const { task, settings, logger } = this.params;
    logger.info(`\n>>> COORDINATOR STARTING TASK: ${task}`);
    this.emit('task:start', task);

    const baseline = await this.initialize();
    const history: TurnRecord[] = [];
    let previous: PlannerDecision | undefined;

    for (let turn = 1; turn <= settings.maxTurns; turn++) {
      logger.info(`\n--- TURN ${turn} ---`);
      this.emit('turn:start', turn);
      this.actionLogger.clear();

      const snapshot = await this.refreshSnapshot(baseline);
      this.emit('snapshot', turn, snapshot);

      const raw = await this.planner.decideNextStep(renderHistory(history), snapshot, previous?.raw);
      const decision = parsePlannerDecision(raw);
      previous = decision;
      this.emit('decision', turn, decision);

      if (decision.decision === 'FINISH') {
        logger.info('>>> Planner decided to finish.');
        return this.finish({
          outcome: 'success',
          reason: 'planner_finish',
          turns: turn,
          history,
          lastDecision: decision,
        });
      }

      logger.info(`\n[Coordinator] GOAL: ${decision.instruction}`);
      const record = await this.executeTurn(turn, decision.instruction);
      history.push(record);
      this.emit('turn:end', record);

      const marker = detectCompletion(record.executorOutput, this.params.profile.completionMarkers);
      if (marker) {
        logger.info('>>> Task Completed.');
        this.emit('completion', turn, marker);
        return this.finish({
          outcome: 'success',
          reason: 'completion_marker',
          turns: turn,
          history,
          lastDecision: decision,
        });
      }

      // The terminal action went through even though its output was lost.
      if (this.latch.completed) {
        logger.info(`>>> Task Completed (${this.latch.completedBecause}).`);
        return this.finish({
          outcome: 'success',
          reason: 'completion_latch',
          turns: turn,
          history,
          lastDecision: decision,
        });
      }
    }

    return this.finish({
      outcome: 'max_turns',
      reason: 'max_turns',
      turns: settings.maxTurns,
      history,
      ...(previous && { lastDecision: previous }),
    });
  }

  /**
   * Task preparation, baseline snapshot and context extraction. Only rate
   * limits escape; anything else degrades to a smaller baseline.
   */
  private async initialize(): Promise<Snapshot> {
    const { profile, client, logger, settings } = this.params;

    if (profile.prepareTask) {
      try {
        await profile.prepareTask(client);
      } catch (error) {
        if (isRateLimitError(error)) throw error;
        logger.warn(`[Coordinator] Task preparation failed: ${errorMessage(error)}`);
      }
    }

    let baseline: Snapshot = {};
    if (profile.loadBaseline) {
      try {
        baseline = await profile.loadBaseline(client);
        logger.info(
          `[Coordinator] ${profile.snapshotSubject}: ${JSON.stringify(baseline.current_user ?? baseline)}`
        );
      } catch (error) {
        if (isRateLimitError(error)) throw error;
        logger.warn(`[Coordinator] Failed to fetch ${profile.snapshotSubject}: ${errorMessage(error)}`);
      }
    }

    const extractor = this.params.contextExtractor;
    if (settings.contextExtraction && profile.knowledgeBase && extractor) {
      try {
        const extraction = await runContextExtraction({
          llm: this.params.plannerLlm,
          knowledgeBase: profile.knowledgeBase(client),
          task: this.params.task,
          options: extractor,
          logger,
        });
        baseline = { ...baseline, knowledge: extraction.summary };
      } catch (error) {
        if (isRateLimitError(error)) throw error;
        logger.warn(`[Coordinator] Context extraction failed: ${errorMessage(error)}`);
      }
    }

    return baseline;
  }

  private async refreshSnapshot(baseline: Snapshot): Promise<Snapshot> {
    const { profile, client } = this.params;
    if (!profile.refreshSnapshot) return baseline;

    const knowledge = 'knowledge' in baseline ? { knowledge: baseline.knowledge } : {};
    try {
      return { ...(await profile.refreshSnapshot(client)), ...knowledge };
    } catch (error) {
      if (isRateLimitError(error)) throw error;
      return { error: `Failed to fetch ${profile.snapshotSubject}: ${errorMessage(error)}`, ...knowledge };
    }
  }

  private async executeTurn(turn: number, instruction: string): Promise<TurnRecord> {
    const { profile, settings, logger } = this.params;
    const executor = new Executor({
      llm: this.params.executorLlm ?? this.params.plannerLlm,
      tools: this.tools,
      actionLogger: this.actionLogger,
      knowledge: profile.knowledge,
      instruction,
      rules: profile.executorRules,
      maxSteps: settings.maxStepsPerTurn,
      verificationOwner: settings.verificationOwner,
      temperature: this.params.temperature,
    });

    try {
      const result = await executor.run();
      this.emit('executor:output', turn, result.output);
      const flagged = findErrorLines(result.output);
      for (const line of flagged) {
        this.actionLogger.logError(line);
      }
      return {
        turn,
        instruction,
        executorOutput: result.output,
        apiLog: this.actionLogger.getHistoryEntry(),
        flagged,
      };
    } catch (error) {
      if (isRateLimitError(error)) throw error;
      const message = errorMessage(error);
      logger.error(`Worker Error: ${message}`);
      return {
        turn,
        instruction,
        executorOutput: '',
        apiLog: this.actionLogger.getHistoryEntry(),
        flagged: [],
        error: message,
      };
    }
  }

  private finish(result: CoordinatorResult): CoordinatorResult {
    this.emit('task:end', result);
    return result;
  }
}
