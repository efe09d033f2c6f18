import { ICacheService } from '../../../common/interfaces/cache.interface';

interface Entry {
  data: string;
  expiresAt: number | null;
}

/** In-process cache with Redis-like semantics: JSON values, TTL in seconds. */
export class MemoryCacheService implements ICacheService {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get<T>(key: string): Promise<T | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return JSON.parse(entry.data);
  }

  async set<T>(key: string, value: T, ttl?: number): Promise<void> {
    this.entries.set(key, {
      data: JSON.stringify(value),
      expiresAt: ttl ? this.now() + ttl * 1000 : null,
    });
  }
}
