/**
 * Business Assistant Profile
 *
 * Company API benchmark: directory, wiki and time tracking behind role-based
 * visibility. The task ends with `respond` followed by `finish_task`.
 */

import type { BenchmarkApiClient } from '../../api/client.js';
import { asRecord, pickRecords } from '../../api/schemas.js';
import { createAssistantTools, TASK_FINISHED_MARKER } from '../tools/adapters/assistant-tools.js';
import { loadKnowledge } from './knowledge.js';
import type { DomainProfile, KnowledgeBase } from './types.js';

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * The company wiki as a knowledge base. Reads go straight to the client so
 * they stay out of the turn log.
 */
export function createWikiKnowledgeBase(client: BenchmarkApiClient): KnowledgeBase {
  return {
    async search(keyword) {
      const body = await client.dispatch('/wiki/search', {
        query_regex: `(?i)${escapeRegex(keyword)}`,
      });
      return pickRecords(body, 'results').flatMap((hit) =>
        typeof hit.path === 'string' ? [hit.path] : []
      );
    },
    async load(path) {
      const body = asRecord(await client.dispatch('/wiki/load', { file: path }));
      return typeof body.content === 'string' ? body.content : '';
    },
  };
}

async function whoAmI(client: BenchmarkApiClient) {
  return asRecord(await client.dispatch('/whoami', {}));
}

const PLANNER_DIRECTIVES = [
  'STATE AWARENESS: the executor is stateless. Put every ID and piece of context it needs into the instruction.',
  'PRIVACY FIRST: read the user context. For a public user, never access or reveal internal data.',
  'CONTEXT MONITORING: watch wiki_sha1 in the user context. When it changes, company rules or entities may have changed.',
  'ENTITY LINKING: collect the IDs of every relevant project, customer and person for the final respond call.',
  'FINALIZATION: finish with respond, a clear message and all relevant links, then finish_task.',
];

const EXECUTOR_RULES = [
  'When filtering lists, check the list is not empty before picking an entry.',
  'If the GOAL is to answer the user, use the respond tool.',
  'Build respond links as [{"kind": "employee", "id": "..."}, ...].',
  'After respond, call finish_task with the reason.',
];

export function createAssistantProfile(): DomainProfile {
  return {
    name: 'assistant',
    description: 'Business assistant: employees, projects, customers, wiki and time tracking.',
    system: 'an AI business assistant',
    snapshotLabel: 'CURRENT USER CONTEXT',
    snapshotSubject: 'user context',
    knowledge: loadKnowledge('assistant'),
    plannerDirectives: PLANNER_DIRECTIVES,
    executorRules: EXECUTOR_RULES,
    completionMarkers: [[TASK_FINISHED_MARKER], ['/respond', 'Task Finished']],
    defaults: {
      turnGranularity: 'single-step',
      verificationOwner: 'planner',
      contextExtraction: true,
    },
    createTools: createAssistantTools,
    loadBaseline: whoAmI,
    knowledgeBase: createWikiKnowledgeBase,
  };
}
