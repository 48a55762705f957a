/**
 * Per-task coordinator state: turn records and the history the planner sees.
 */

import type { PlannerDecision } from './decision.js';

export interface TurnRecord {
  turn: number;
  instruction: string;
  /** Everything the executor produced this turn (empty on failure). */
  executorOutput: string;
  /** ActionLogger contents at the end of the turn. */
  apiLog: string;
  /** Error lines flagged into the log after the executor finished. */
  flagged: string[];
  error?: string;
}

export type TaskOutcome = 'success' | 'max_turns';
export type TaskEndReason = 'planner_finish' | 'completion_marker' | 'completion_latch' | 'max_turns';

export interface CoordinatorResult {
  outcome: TaskOutcome;
  reason: TaskEndReason;
  turns: number;
  history: TurnRecord[];
  lastDecision?: PlannerDecision;
}

/**
 * Render a turn as the two history entries the planner reads: the
 * instruction, then the executor's logs (or its error).
 */
export function renderTurn(record: TurnRecord): [string, string] {
  const instruction = `Evaluator Instruction: ${record.instruction}`;
  if (record.error !== undefined) {
    return [instruction, `Worker Error: ${record.error}`];
  }
  return [instruction, `Worker Execution Logs:\n${record.executorOutput}`];
}

export function renderHistory(records: readonly TurnRecord[]): string[] {
  return records.flatMap(renderTurn);
}

