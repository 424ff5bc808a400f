import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig, InventoryApiConfig } from '../config/app.config';
import { InventoryItemsPage, InventoryRecord } from '../inventory/inventory.types';

/** Failure talking to the inventory API. */
export class InventorySourceError extends Error {
  constructor(
    message: string,
    readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'InventorySourceError';
  }
}

@Injectable()
export class BoxHeroService {
  private readonly logger = new Logger(BoxHeroService.name);
  private readonly api: InventoryApiConfig;

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    this.api = config.inventoryApi;
  }

  /**
   * Walks `GET /v1/items` page by page and returns every record.
   * Nothing is returned until the last page has been read.
   */
  async fetchAllItems(locationIds: string[] = this.api.locationIds): Promise<InventoryRecord[]> {
    if (!this.api.apiToken) {
      throw new InventorySourceError('Missing inventory API token (BOXHERO_API_TOKEN)');
    }

    const items: InventoryRecord[] = [];
    let cursor: string | null = null;
    let page = 1;

    while (true) {
      this.logger.log(`Fetching page ${page}${cursor ? ` (cursor=${cursor})` : ''}`);

      const url = this.buildItemsUrl(locationIds, cursor);
      const payload = await this.withRetry(`items page ${page}`, () => this.getPage(url));
      items.push(...payload.items);

      this.logger.debug(`Page ${page}: ${payload.items.length} items, has_more=${payload.has_more}`);

      if (!payload.has_more || !payload.cursor) {
        break;
      }

      cursor = payload.cursor;
      page += 1;

      if (this.api.pageDelayMs > 0) {
        await this.delay(this.api.pageDelayMs);
      }
    }

    this.logger.log(`Fetched ${items.length} inventory items in ${page} page(s)`);
    return items;
  }

  private buildItemsUrl(locationIds: string[], cursor: string | null): string {
    const params = new URLSearchParams({ limit: String(this.api.pageSize) });
    locationIds.forEach((id) => params.append('location_ids', id));
    if (cursor) {
      params.set('cursor', cursor);
    }

    return `${this.api.baseUrl}/v1/items?${params.toString()}`;
  }

  private async getPage(url: string): Promise<InventoryItemsPage> {
    const response = await fetch(url, {
      method: 'GET',
      headers: {
        Authorization: `Bearer ${this.api.apiToken}`,
        Accept: 'application/json',
      },
      signal: AbortSignal.timeout(this.api.timeoutMs),
    });

    if (!response.ok) {
      const message = await response.text();
      throw new InventorySourceError(
        `Inventory API HTTP ${response.status}: ${message}`,
        response.status,
      );
    }

    return this.toPage(await response.json());
  }

  private toPage(body: unknown): InventoryItemsPage {
    if (typeof body !== 'object' || body == null || !('items' in body)) {
      throw new InventorySourceError('Inventory API response is missing "items"');
    }

    const { items } = body;
    if (!Array.isArray(items)) {
      throw new InventorySourceError('Inventory API response "items" is not a list');
    }

    const hasMore = 'has_more' in body && body.has_more === true;
    const cursor = 'cursor' in body && typeof body.cursor === 'string' ? body.cursor : null;

    return {
      items: items.filter((item): item is InventoryRecord => typeof item === 'object' && item != null),
      has_more: hasMore,
      cursor,
    };
  }

  private async withRetry<T>(label: string, operation: () => Promise<T>): Promise<T> {
    let attempt = 0;

    while (true) {
      attempt += 1;

      try {
        return await operation();
      } catch (error: unknown) {
        const shouldRetry =
          error instanceof InventorySourceError &&
          error.statusCode === 429 &&
          attempt <= this.api.maxRetries;

        if (!shouldRetry) {
          throw error;
        }

        const delayMs = this.api.retryBaseDelayMs * attempt;
        this.logger.warn(
          `Rate limit hit for ${label}. Retry ${attempt}/${this.api.maxRetries} in ${delayMs}ms`,
        );
        await this.delay(delayMs);
      }
    }
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => setTimeout(resolve, ms));
  }
}
