/**
 * Store Profile
 *
 * Online store benchmark: catalog search, one persistent basket, coupons and
 * a checkout that is the only authoritative stock check.
 */

import type { BenchmarkApiClient } from '../../api/client.js';
import { asRecord, BasketSchema } from '../../api/schemas.js';
import { createStoreTools } from '../tools/adapters/store-tools.js';
import { loadKnowledge } from './knowledge.js';
import type { DomainProfile } from './types.js';

async function fetchBasket(client: BenchmarkApiClient) {
  return asRecord(await client.dispatch('/basket/get', {}));
}

/**
 * Remove everything a previous task left in the basket.
 */
async function clearBasket(client: BenchmarkApiClient): Promise<void> {
  const basket = BasketSchema.parse(await client.dispatch('/basket/get', {}));
  for (const item of basket.items ?? []) {
    await client.dispatch('/basket/remove', { sku: String(item.sku), quantity: item.quantity });
  }
}

const PLANNER_DIRECTIVES = [
  'STATE AWARENESS: the executor starts fresh every turn. Put every SKU, quantity and coupon it needs into the instruction.',
  'REUSE DATA: when the logs already hold the data you need, pass it on instead of asking for the same requests again.',
  'FAIL FAST: when an item or coupon fails, try a synonym or fallback right away ("Monitor" -> "Display", "Screen"). Never loop on the same error.',
  'EXHAUSTIVE SEARCH: when the task needs a brute-force comparison, list every option in one instruction, check the report covers all of them, and do not check out in that turn.',
  'BUY ALL: "buy all GPUs" means the available quantity of each, not 1.',
  'COUPONS: ignore coupon descriptions. Try every candidate and read the basket to see which one applies.',
  'EXCLUSIVE CONDITIONS: only one coupon can be active. A task demanding two at once is impossible; do not pick the better one.',
  'GHOST STOCK: when checkout fails on inventory, read the real limit from the error, have the executor remove the excess and do NOT check out in the same turn. If an essential item drops out entirely, the task is impossible.',
  'BUNDLE COUPONS: a coupon named like a pair ("COMBO", "PAIR") that gives no discount may need a cheap filler item in the basket.',
  'CAPABILITY: when no tool can satisfy the request, the task cannot be completed.',
];

const EXECUTOR_RULES = [
  'The basket discount can be null; treat null as 0.',
  'When filtering search results, check the list is not empty before picking an item.',
  'If the GOAL is just checkout, do not add or remove items first.',
  'If you handle an inventory error at checkout by removing items, do not check out again in this run. Report "Item removed due to stock. Waiting for further instructions." and finish.',
];

export function createStoreProfile(options: { clearBasketOnStart?: boolean } = {}): DomainProfile {
  return {
    name: 'store',
    description: 'Online store: catalog search, basket, coupons and checkout.',
    system: 'an autonomous e-commerce system',
    snapshotLabel: 'CURRENT BASKET STATE',
    snapshotSubject: 'basket',
    knowledge: loadKnowledge('store'),
    plannerDirectives: PLANNER_DIRECTIVES,
    executorRules: EXECUTOR_RULES,
    completionMarkers: [['/basket/checkout', 'Checkout Success']],
    defaults: {
      turnGranularity: 'combined',
      verificationOwner: 'planner',
      contextExtraction: false,
    },
    createTools: createStoreTools,
    ...(options.clearBasketOnStart && { prepareTask: clearBasket }),
    refreshSnapshot: fetchBasket,
  };
}
