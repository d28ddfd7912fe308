import { ConfigurationError } from "../exceptions/SimulationExceptions";

export interface CacheConfig {
  numSets: number;
  blocksPerSet: number;
}

export const DEFAULT_CACHE_CONFIG: Readonly<CacheConfig> = { numSets: 4, blocksPerSet: 2 };

export interface CacheBlock {
  tag: number;
  data: number;
  valid: boolean;
  lastUsed: number;
}

export interface CacheSetSnapshot {
  index: number;
  blocks: CacheBlock[];
}

export interface CacheStats {
  hits: number;
  misses: number;
  accessCounter: number;
}

export interface CacheReadResult {
  data: number;
  hit: boolean;
}

/**
 * Set-associative word cache with LRU replacement.
 *
 * Addresses are interleaved across sets: `set = addr mod numSets` and
 * `tag = floor(addr / numSets)`. A single access counter shared by the whole
 * cache serves as the recency clock; it advances on every read and write,
 * hit or miss. Only reads count towards hits and misses.
 */
export class Cache {
  private readonly config: CacheConfig;
  private readonly sets = new Map<number, CacheBlock[]>();
  private accessCounter = 0;
  private hits = 0;
  private misses = 0;

  constructor(config: CacheConfig = DEFAULT_CACHE_CONFIG) {
    if (!Number.isInteger(config.numSets) || !Number.isInteger(config.blocksPerSet)) {
      throw new ConfigurationError("Cache configuration values must be integers");
    }
    if (config.numSets <= 0 || config.blocksPerSet <= 0) {
      throw new ConfigurationError("Cache configuration values must be positive");
    }

    this.config = { numSets: config.numSets, blocksPerSet: config.blocksPerSet };
    this.reset();
  }

  reset(): void {
    this.sets.clear();
    for (let i = 0; i < this.config.numSets; i++) {
      this.sets.set(i, []);
    }
    this.accessCounter = 0;
    this.hits = 0;
    this.misses = 0;
  }

  /** Looks an address up. A miss leaves the cache contents untouched; filling is the caller's job. */
  read(address: number): CacheReadResult {
    this.accessCounter += 1;
    const { tag, setIndex } = this.indexAddress(address);
    const block = this.findBlock(this.sets.get(setIndex) ?? [], tag);

    if (block) {
      block.lastUsed = this.accessCounter;
      this.hits += 1;
      return { data: block.data, hit: true };
    }

    this.misses += 1;
    return { data: 0, hit: false };
  }

  write(address: number, data: number): void {
    this.accessCounter += 1;
    const { tag, setIndex } = this.indexAddress(address);
    const set = this.getOrCreateSet(setIndex);
    const value = data >>> 0;

    const existing = this.findBlock(set, tag);
    if (existing) {
      existing.data = value;
      existing.lastUsed = this.accessCounter;
      return;
    }

    const replacement: CacheBlock = { tag, data: value, valid: true, lastUsed: this.accessCounter };
    if (this.countValid(set) < this.config.blocksPerSet) {
      set.push(replacement);
      return;
    }

    set[this.selectVictim(set)] = replacement;
  }

  getHitRate(): number {
    const total = this.hits + this.misses;
    return total > 0 ? this.hits / total : 0;
  }

  getStats(): CacheStats {
    return { hits: this.hits, misses: this.misses, accessCounter: this.accessCounter };
  }

  getConfig(): CacheConfig {
    return { ...this.config };
  }

  getSets(): CacheSetSnapshot[] {
    return [...this.sets.entries()]
      .sort(([a], [b]) => a - b)
      .map(([index, blocks]) => ({ index, blocks: blocks.map((block) => ({ ...block })) }));
  }

  indexAddress(address: number): { tag: number; setIndex: number } {
    return {
      setIndex: address % this.config.numSets,
      tag: Math.floor(address / this.config.numSets),
    };
  }

  private getOrCreateSet(setIndex: number): CacheBlock[] {
    let set = this.sets.get(setIndex);
    if (!set) {
      set = [];
      this.sets.set(setIndex, set);
    }
    return set;
  }

  private findBlock(set: CacheBlock[], tag: number): CacheBlock | undefined {
    return set.find((block) => block.valid && block.tag === tag);
  }

  private countValid(set: CacheBlock[]): number {
    return set.reduce((count, block) => (block.valid ? count + 1 : count), 0);
  }

  // First block with the strictly smallest lastUsed wins ties.
  private selectVictim(set: CacheBlock[]): number {
    let victim = 0;
    let oldest = Number.POSITIVE_INFINITY;
    set.forEach((block, index) => {
      if (block.lastUsed < oldest) {
        oldest = block.lastUsed;
        victim = index;
      }
    });
    return victim;
  }
}
