export const CacheRegions = {
  Cart: 'cart',
  Api: 'api',
} as const;

export interface ICacheManager {
  getOrCompute<T>(key: string, region: string, factory: () => Promise<T>): Promise<T>;
  invalidate(key: string, region: string): void;
  clearRegion(region: string): void;
}
