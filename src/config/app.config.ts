export interface InventoryApiConfig {
  baseUrl: string;
  apiToken: string;
  pageSize: number;
  pageDelayMs: number;
  locationIds: string[];
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
}

export interface AppConfig {
  port: number;
  openUiOnStart: boolean;
  inventoryApi: InventoryApiConfig;
}

export const APP_CONFIG = Symbol('APP_CONFIG');

type Env = Record<string, string | undefined>;

// Runtime configuration, resolved once from the environment.
export function loadAppConfig(env: Env = process.env): AppConfig {
  return {
    port: readInteger(env, 'PORT', 3000),
    openUiOnStart: readBoolean(env, 'OPEN_UI_ON_START', false),
    inventoryApi: {
      baseUrl: (env.BOXHERO_BASE_URL || 'https://rest.boxhero-app.com').replace(/\/+$/, ''),
      apiToken: env.BOXHERO_API_TOKEN || '',
      pageSize: readInteger(env, 'BOXHERO_PAGE_SIZE', 100),
      pageDelayMs: readInteger(env, 'BOXHERO_PAGE_DELAY_MS', 600),
      locationIds: parseIdList(env.BOXHERO_LOCATION_IDS),
      timeoutMs: readInteger(env, 'BOXHERO_TIMEOUT_MS', 15000),
      maxRetries: readInteger(env, 'BOXHERO_MAX_RETRIES', 3),
      retryBaseDelayMs: readInteger(env, 'BOXHERO_RETRY_BASE_DELAY_MS', 1000),
    },
  };
}

export function parseIdList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }

  return value
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id !== '');
}

function readInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  if (!/^\d+$/.test(raw)) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }

  return Number(raw);
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }

  return raw === 'true' || raw === '1' || raw === 'yes';
}
