/**
 * Store Tools Adapter
 *
 * Catalog search and basket operations against the store benchmark.
 * `checkout` is the terminal action: it closes the completion latch, and
 * every later mutation becomes a no-op.
 */

import { z } from 'zod';

import { errorMessage, isApiError } from '../../../api/errors.js';
import { BasketSchema, ProductPageSchema, type Product } from '../../../api/schemas.js';
import { createDispatcher } from '../dispatch.js';
import { fetchAllPages, type Page, type PaginationCursor } from '../pagination.js';
import { defineTool, type ToolDefinition, type ToolSetContext } from '../types.js';

export const TASK_COMPLETED_ERROR = 'Error: Task completed.';
export const ALREADY_CHECKED_OUT = 'Order already checked out.';
export const EMPTY_BASKET_ERROR = 'ERROR: Basket is empty!';

const COMPLETED_BASKET_VIEW = {
  items: null,
  subtotal: 0,
  total: 0,
  discount: 0,
  coupon: null,
  info: 'Task completed (Empty View).',
};

const SkuSchema = z
  .union([z.string(), z.number()])
  .transform((sku) => String(sku))
  .describe('The unique identifier (SKU) of the product');

const QuantitySchema = z
  .number()
  .int()
  .positive()
  .default(1)
  .describe('Number of items (default 1)');

export function createStoreTools(ctx: ToolSetContext): ToolDefinition[] {
  const { client, logger, latch } = ctx;
  const dispatch = createDispatcher({ client, logger });

  async function fetchProductPage(query: string, cursor: PaginationCursor): Promise<Page<Product>> {
    const body = await dispatch('/products/list', {
      query,
      offset: cursor.offset,
      limit: cursor.limit,
    });
    const page = ProductPageSchema.parse(body ?? {});
    return {
      items: page.products ?? page.items ?? [],
      nextOffset: page.next_offset,
    };
  }

  const searchProducts = defineTool({
    name: 'search_products',
    description:
      'Search the store catalog. Search is fuzzy ("laptop" also returns "laptop bag"): filter results by name. Pagination is handled automatically.',
    schema: z.object({
      query: z.string().min(1).describe("Search string, e.g. 'gpu' or 'soda'"),
    }),
    execute: async ({ query }) => {
      if (latch.completed) return [];
      logger.log(`  [Tool] Searching for '${query}'...`);
      return fetchAllPages((cursor) => fetchProductPage(query, cursor), {
        ...ctx.pagination,
        logger,
      });
    },
  });

  const getBasket = defineTool({
    name: 'get_basket',
    description:
      'Return the current basket (items, subtotal, total, discount, coupon). discount can be null.',
    schema: z.object({}),
    execute: async () => {
      if (latch.completed) return { ...COMPLETED_BASKET_VIEW };
      try {
        return await dispatch('/basket/get');
      } catch (error) {
        if (!isApiError(error)) throw error;
        logger.log(`  [Tool] Error checking basket: ${error.message}`);
        return { error: error.message };
      }
    },
  });

  const addToBasket = defineTool({
    name: 'add_to_basket',
    description: 'Add a product to the basket.',
    schema: z.object({ sku: SkuSchema, quantity: QuantitySchema }),
    execute: async ({ sku, quantity }) => {
      if (latch.completed) return TASK_COMPLETED_ERROR;
      try {
        await dispatch('/basket/add', { sku, quantity });
        return `Success: Added ${quantity} x SKU ${sku} to basket.`;
      } catch (error) {
        if (!isApiError(error)) throw error;
        return `Error adding to basket: ${error.message}`;
      }
    },
  });

  const removeFromBasket = defineTool({
    name: 'remove_from_basket',
    description: 'Remove a quantity of a product from the basket.',
    schema: z.object({ sku: SkuSchema, quantity: QuantitySchema }),
    execute: async ({ sku, quantity }) => {
      if (latch.completed) return TASK_COMPLETED_ERROR;
      try {
        await dispatch('/basket/remove', { sku, quantity });
        return `Success: Removed ${quantity} x SKU ${sku} from basket.`;
      } catch (error) {
        if (!isApiError(error)) throw error;
        return `Error removing from basket: ${error.message}`;
      }
    },
  });

  const applyCoupon = defineTool({
    name: 'apply_coupon',
    description:
      'Apply a coupon code. The API only confirms the request; read the basket to verify discount > 0.',
    schema: z.object({ coupon_code: z.string().min(1).describe('Coupon code to apply') }),
    execute: async ({ coupon_code }) => {
      if (latch.completed) return TASK_COMPLETED_ERROR;
      try {
        await dispatch('/coupon/apply', { coupon: coupon_code });
        return `Coupon '${coupon_code}' applied. CHECK BASKET TO VERIFY DISCOUNT.`;
      } catch (error) {
        if (!isApiError(error)) throw error;
        return `Error applying coupon: ${error.message}`;
      }
    },
  });

  const checkout = defineTool({
    name: 'checkout',
    description:
      'Finalize the order. The only authoritative stock check: an inventory failure carries the real limit in its message.',
    schema: z.object({}),
    execute: async () => {
      if (latch.completed) return ALREADY_CHECKED_OUT;

      // Unlogged pre-check so an empty basket never reaches the finalize call.
      try {
        const basket = BasketSchema.safeParse(await client.dispatch('/basket/get', {}));
        if (basket.success && !basket.data.items?.length) {
          return EMPTY_BASKET_ERROR;
        }
      } catch (error) {
        logger.logError(`  [Tool] Basket pre-check failed: ${errorMessage(error)}`);
      }

      try {
        const receipt = await dispatch('/basket/checkout');
        latch.complete('checkout');
        return `Checkout Success! Receipt: ${JSON.stringify(receipt ?? {})}`;
      } catch (error) {
        throw new Error(`Checkout Failed: ${errorMessage(error)}`, { cause: error });
      }
    },
  });

  return [searchProducts, getBasket, addToBasket, removeFromBasket, applyCoupon, checkout];
}
