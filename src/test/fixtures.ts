/**
 * Builders for catalog records used across the test suites.
 */

import type {
  ApprovalOutcome,
  CatalogCategory,
  CatalogItem,
  OrderEvent,
  ResolvedWindow,
} from "../catalog/types.js";
import type {
  CatalogGateway,
  FetchCategoriesOptions,
  FetchItemsOptions,
  FetchOrderEventsOptions,
} from "../connectors/types.js";
import { inWindow } from "../metrics/time-window.js";

export const JANUARY: ResolvedWindow = {
  label: "january",
  start: new Date("2026-01-01T00:00:00Z"),
  end: new Date("2026-02-01T00:00:00Z"),
};

export function item(id: string, overrides: Partial<CatalogItem> = {}): CatalogItem {
  return {
    id,
    name: "Catalog Item",
    shortDescription: `A well described catalog offering (${id})`,
    description: "Delivered by the service desk.",
    categoryId: "cat_a",
    active: true,
    order: 100,
    price: null,
    ...overrides,
  };
}

export function category(id: string, overrides: Partial<CatalogCategory> = {}): CatalogCategory {
  return {
    id,
    title: "Catalog Category",
    description: "",
    parentId: null,
    active: true,
    order: 100,
    ...overrides,
  };
}

export function ordered(
  itemId: string,
  at: string = "2026-01-15T12:00:00Z",
  fulfillmentHours: number | null = null,
  approval: ApprovalOutcome = "n/a"
): OrderEvent {
  return { itemId, timestamp: new Date(at), outcome: "ordered", fulfillmentHours, approval };
}

export function abandoned(itemId: string, at: string = "2026-01-15T12:00:00Z"): OrderEvent {
  return { itemId, timestamp: new Date(at), outcome: "abandoned", fulfillmentHours: null, approval: null };
}

export function times<T>(count: number, make: (index: number) => T): T[] {
  return Array.from({ length: count }, (_, index) => make(index));
}

/**
 * In-process gateway over fixed records, with switchable failures.
 */
export class FakeGateway implements CatalogGateway {
  calls = 0;
  lastSignal: AbortSignal | undefined;
  itemsError: Error | null = null;
  hangItems = false;
  sliceError: (window: ResolvedWindow) => Error | null = () => null;

  constructor(
    public items: CatalogItem[] = [],
    public categories: CatalogCategory[] = [],
    public events: OrderEvent[] = []
  ) {}

  fetchItems(options: FetchItemsOptions): Promise<CatalogItem[]> {
    this.calls++;
    this.lastSignal = options.signal;
    if (this.hangItems) {
      return new Promise((_, reject) => {
        options.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    }
    if (this.itemsError) return Promise.reject(this.itemsError);
    return Promise.resolve(this.items.filter((i) => options.includeInactive || i.active));
  }

  fetchCategories(options: FetchCategoriesOptions): Promise<CatalogCategory[]> {
    this.calls++;
    return Promise.resolve(this.categories.filter((c) => options.includeInactive || c.active));
  }

  fetchOrderEvents(options: FetchOrderEventsOptions): Promise<OrderEvent[]> {
    this.calls++;
    const error = this.sliceError(options.window);
    if (error) return Promise.reject(error);
    return Promise.resolve(this.events.filter((e) => inWindow(e.timestamp, options.window)));
  }
}
