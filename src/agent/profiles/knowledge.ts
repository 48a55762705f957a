import { readFileSync } from 'node:fs';

import type { ProfileName } from '../../core/config.js';

const cache = new Map<ProfileName, string>();

/**
 * Domain knowledge shared by planner and executor, from `knowledge/<name>.md`.
 */
export function loadKnowledge(name: ProfileName): string {
  const cached = cache.get(name);
  if (cached !== undefined) return cached;
  const text = readFileSync(new URL(`../../../knowledge/${name}.md`, import.meta.url), 'utf-8').trim();
  cache.set(name, text);
  return text;
}
