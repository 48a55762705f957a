/**
 * Planner
 *
 * Proposes exactly one natural-language instruction per turn from the task,
 * the environment snapshot, its own previous answer and a short window of
 * execution history. It never calls tools.
 */

import type { LlmClient } from '../../core/llm.js';
import type { Logger } from '../../core/logger.js';
import type { DomainProfile, ProfileSettings, Snapshot } from '../profiles/types.js';

export const PLANNER_TASK_PROMPT = 'Determine the next step.';

function numbered(items: string[], from = 1): string {
  return items.map((item, index) => `${index + from}. ${item}`).join('\n');
}

function granularityDirective(settings: ProfileSettings): string {
  if (settings.turnGranularity === 'combined') {
    return `TURN EFFICIENCY: at most ${settings.maxTurns} turns. Combine steps that do not conflict into one instruction (e.g. "add the items AND apply the coupon").`;
  }
  return `ONE STEP PER TURN: at most ${settings.maxTurns} turns. Give exactly one step per instruction and wait for its result.`;
}

function verificationDirective(settings: ProfileSettings): string {
  if (settings.verificationOwner === 'executor') {
    return 'VERIFICATION: state the condition to check (e.g. "discount > 0") in the instruction; the executor checks it before acting.';
  }
  return 'VERIFICATION: judge success yourself from the logs and the snapshot. The executor only reports what happened.';
}

/**
 * System prompt for a profile: role, knowledge, directives, output format.
 */
export function buildPlannerSystemPrompt(profile: DomainProfile, settings: ProfileSettings): string {
  const directives = [
    'NO TOOL CALLS: define the plan. The executor performs it.',
    granularityDirective(settings),
    verificationDirective(settings),
    'FINALIZATION: a task is either fully done or impossible. Never settle for a partial result.',
    ...profile.plannerDirectives,
  ];

  return [
    `You are the Planner for ${profile.system}.`,
    'You direct an Executor that turns your instruction into tool calls.',
    '',
    profile.knowledge,
    '',
    '<DIRECTIVES>',
    numbered(directives),
    '</DIRECTIVES>',
    '',
    '<OUTPUT_FORMAT>',
    'Answer with exactly three labelled lines:',
    '',
    'THOUGHT: your reasoning. Did the last instruction succeed? What is missing?',
    'DECISION: PROCEED or FINISH. FINISH only after the terminal action succeeded or when the task is impossible.',
    'INSTRUCTION: one short, explicit instruction for the Executor with every parameter it needs. No code, no JSON.',
    '</OUTPUT_FORMAT>',
  ].join('\n');
}

export interface PlannerParams {
  llm: LlmClient;
  task: string;
  profile: DomainProfile;
  settings: ProfileSettings;
  temperature?: number;
  logger?: Logger;
}

export class Planner {
  private readonly systemPrompt: string;

  constructor(private readonly params: PlannerParams) {
    this.systemPrompt = buildPlannerSystemPrompt(params.profile, params.settings);
  }

  /**
   * The single user message sent to the model.
   */
  buildPrompt(history: string[], snapshot: Snapshot, previousDecision?: string): string {
    const { profile, task, settings } = this.params;
    const window = settings.historyWindow > 0 ? history.slice(-settings.historyWindow) : [];
    const sections = [
      this.systemPrompt,
      `MAIN TASK: ${task}`,
      `${profile.snapshotLabel}:\n${JSON.stringify(snapshot, null, 2)}`,
    ];
    if (previousDecision) {
      sections.push(`YOUR PREVIOUS DECISION:\n${previousDecision}`);
    }
    sections.push(`EXECUTION LOGS (Last 2 Steps):\n${window.join('\n')}`);
    sections.push(PLANNER_TASK_PROMPT);
    return sections.join('\n\n');
  }

  /**
   * Ask the model for the next step and return its raw answer. Model
   * failures propagate to the coordinator.
   */
  async decideNextStep(
    history: string[],
    snapshot: Snapshot,
    previousDecision?: string
  ): Promise<string> {
    const { llm, logger, temperature } = this.params;
    const prompt = this.buildPrompt(history, snapshot, previousDecision);

    logger?.info('... Planner is thinking ...');
    const response = await llm.complete([{ role: 'user', content: prompt }], { temperature });
    logger?.info(`\n[Planner] Decision:\n${response.content}`);
    return response.content;
  }
}
