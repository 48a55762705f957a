/**
 * Profile Registry
 *
 * Profile lookup and settings resolution.
 */

import type { DuetConfig, ProfileName } from '../../core/config.js';
import { createAssistantProfile } from './assistant.js';
import { createStoreProfile } from './store.js';
import type { DomainProfile, ProfileSettings } from './types.js';

export function getProfile(name: ProfileName, config?: DuetConfig): DomainProfile {
  switch (name) {
    case 'store':
      return createStoreProfile({ clearBasketOnStart: config?.store.clearBasketOnStart ?? false });
    case 'assistant':
      return createAssistantProfile();
  }
}

/**
 * Profile defaults, then global agent settings, then per-profile overrides
 * from `agent.profiles.<name>`.
 */
export function resolveProfileSettings(profile: DomainProfile, config: DuetConfig): ProfileSettings {
  const overrides = config.agent.profiles[profile.name];
  return {
    maxTurns: overrides.maxTurns ?? config.agent.maxTurns,
    maxStepsPerTurn: overrides.maxStepsPerTurn ?? config.agent.maxStepsPerTurn,
    historyWindow: config.agent.historyWindow,
    turnGranularity: overrides.turnGranularity ?? profile.defaults.turnGranularity,
    verificationOwner: overrides.verificationOwner ?? profile.defaults.verificationOwner,
    contextExtraction:
      profile.knowledgeBase !== undefined &&
      (overrides.contextExtraction ?? profile.defaults.contextExtraction),
  };
}

export function listProfiles(config?: DuetConfig): DomainProfile[] {
  return [getProfile('store', config), getProfile('assistant', config)];
}

export type { DomainProfile, ProfileSettings };
