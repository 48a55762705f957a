/**
 * Context Extractor
 *
 * Before the first turn, pull the facts a task depends on out of the
 * domain's knowledge base: keywords from the task, the documents they hit,
 * and a short model-written summary of what those documents say.
 */

import { errorMessage } from '../../api/errors.js';
import type { LlmClient } from '../../core/llm.js';
import type { Logger } from '../../core/logger.js';
import type { KnowledgeBase } from '../profiles/types.js';

export const NO_KNOWLEDGE_FOUND = 'No relevant information found in the knowledge base.';

export interface ContextExtractorOptions {
  maxKeywords: number;
  minKeywordLength: number;
  rulesDocument: string;
}

export interface KnowledgeDocument {
  path: string;
  content: string;
}

export interface ContextExtractionResult {
  keywords: string[];
  documents: string[];
  summary: string;
}

function dedupe(values: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    const key = value.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(value);
  }
  return out;
}

/**
 * Alphabetic tokens of at least `minKeywordLength` letters, lowercased, in
 * order of first appearance.
 */
export function heuristicKeywords(task: string, options: ContextExtractorOptions): string[] {
  const tokens = (task.match(/[A-Za-z]+/g) ?? [])
    .filter((token) => token.length >= options.minKeywordLength)
    .map((token) => token.toLowerCase());
  return dedupe(tokens).slice(0, options.maxKeywords);
}

export function parseKeywordList(text: string, maxKeywords: number): string[] {
  const keywords = text
    .split(/[,\n]/)
    .map((part) => part.replace(/^[\s\-*\d.]+/, '').replace(/["'`]/g, '').trim())
    .filter((part) => part.length > 0);
  return dedupe(keywords).slice(0, maxKeywords);
}

/**
 * Model-picked search keywords; falls back to the token heuristic when the
 * model fails or answers with nothing usable.
 */
export async function extractKeywords(
  llm: LlmClient,
  task: string,
  options: ContextExtractorOptions,
  logger?: Logger
): Promise<string[]> {
  try {
    const response = await llm.complete(
      [
        {
          role: 'user',
          content: [
            `List up to ${options.maxKeywords} search keywords for looking up company rules and records relevant to this task.`,
            'Answer with a comma-separated list only.',
            '',
            `TASK: ${task}`,
          ].join('\n'),
        },
      ],
      { temperature: 0 }
    );
    const keywords = parseKeywordList(response.content, options.maxKeywords);
    if (keywords.length > 0) return keywords;
  } catch (error) {
    logger?.warn(`Keyword extraction failed, using task tokens: ${errorMessage(error)}`);
  }
  return heuristicKeywords(task, options);
}

/**
 * The rules document followed by every search hit, without duplicates. A
 * failed search for one keyword does not affect the others.
 */
export async function discoverDocuments(
  knowledgeBase: KnowledgeBase,
  keywords: string[],
  options: ContextExtractorOptions,
  logger?: Logger
): Promise<string[]> {
  const paths = [options.rulesDocument];
  for (const keyword of keywords) {
    try {
      paths.push(...(await knowledgeBase.search(keyword)));
    } catch (error) {
      logger?.warn(`Knowledge search for "${keyword}" failed: ${errorMessage(error)}`);
    }
  }
  return [...new Set(paths)];
}

export async function fetchDocuments(
  knowledgeBase: KnowledgeBase,
  paths: string[],
  logger?: Logger
): Promise<KnowledgeDocument[]> {
  const documents: KnowledgeDocument[] = [];
  for (const path of paths) {
    try {
      const content = await knowledgeBase.load(path);
      if (content.trim()) {
        documents.push({ path, content });
      }
    } catch (error) {
      logger?.debug(`Skipping ${path}: ${errorMessage(error)}`);
    }
  }
  return documents;
}

export async function summarizeFacts(
  llm: LlmClient,
  task: string,
  documents: KnowledgeDocument[]
): Promise<string> {
  if (documents.length === 0) {
    return NO_KNOWLEDGE_FOUND;
  }

  const corpus = documents.map((doc) => `--- ${doc.path} ---\n${doc.content}`).join('\n\n');
  const response = await llm.complete(
    [
      {
        role: 'user',
        content: [
          'Extract the facts and rules from these documents that matter for the task.',
          'Quote exact names, IDs and numbers. Answer with a short bullet list.',
          'Do not decide whether the task is allowed or answer it; only state facts and rules.',
          '',
          `TASK: ${task}`,
          '',
          corpus,
        ].join('\n'),
      },
    ],
    { temperature: 0 }
  );
  return response.content.trim() || NO_KNOWLEDGE_FOUND;
}

export async function runContextExtraction(params: {
  llm: LlmClient;
  knowledgeBase: KnowledgeBase;
  task: string;
  options: ContextExtractorOptions;
  logger?: Logger;
}): Promise<ContextExtractionResult> {
  const { llm, knowledgeBase, task, options, logger } = params;
  const keywords = await extractKeywords(llm, task, options, logger);
  const paths = await discoverDocuments(knowledgeBase, keywords, options, logger);
  const documents = await fetchDocuments(knowledgeBase, paths, logger);
  const summary = await summarizeFacts(llm, task, documents);
  logger?.debug(`Context extraction read ${documents.length} document(s) for [${keywords.join(', ')}]`);
  return {
    keywords,
    documents: documents.map((doc) => doc.path),
    summary,
  };
}
