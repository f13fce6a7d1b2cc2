export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: string;
  corsOrigin: string[] | true;
  api: {
    title: string;
    version: string;
    description: string;
    baseUrl?: string;
  };
  cart: {
    defaultName: string;
    taxRate: number;
  };
  cache: {
    cartTtlSeconds: number;
    apiTtlSeconds: number;
  };
  catalog: {
    pageSize: number;
  };
}

function parseIntOr(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseFloatOr(value: string | undefined, fallback: number): number {
  const parsed = parseFloat(value ?? '');
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = parseIntOr(env.PORT, 3000);
  const host = env.HOST || '0.0.0.0';

  return {
    port,
    host,
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: env.LOG_LEVEL || 'info',
    corsOrigin: env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',') : true,
    api: {
      title: env.API_TITLE || 'Storefront Cart Orchestration API',
      version: env.API_VERSION || '1.0.0',
      description:
        env.API_DESCRIPTION ||
        'Loads, mutates, re-prices and persists storefront carts on top of the cart, catalog, pricing and tax services',
      baseUrl: env.API_BASE_URL,
    },
    cart: {
      defaultName: env.DEFAULT_CART_NAME || 'default',
      taxRate: parseFloatOr(env.TAX_RATE, 0.09),
    },
    cache: {
      cartTtlSeconds: parseIntOr(env.CART_CACHE_TTL_SECONDS, 300),
      apiTtlSeconds: parseIntOr(env.API_CACHE_TTL_SECONDS, 60),
    },
    catalog: {
      pageSize: parseIntOr(env.CATALOG_PAGE_SIZE, 20),
    },
  };
}
