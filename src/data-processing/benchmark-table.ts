// Benchmark Table: immutable (sector, region, scope) → YearSeries lookup
//
// Lookup order for a company's (sector, region):
//   1. the exact (sector, region) pair, if the benchmark publishes any scope for it
//   2. (sector, "Global")
//   3. nothing, the company is not covered

import { type BenchmarkScope, GLOBAL_REGION, type Scope } from '../constants';
import type { YearSeries } from '../types';

export interface BenchmarkEntry {
  sector: string;
  region: string;
  scope: BenchmarkScope;
  series: YearSeries;
}

function entryKey(sector: string, region: string, scope: BenchmarkScope): string {
  return `${sector}|${region}|${scope}`;
}

function pairKey(sector: string, region: string): string {
  return `${sector}|${region}`;
}

export class BenchmarkTable {
  private readonly entries = new Map<string, YearSeries>();
  /** Published scopes per (sector, region), in insertion order */
  private readonly scopesByPair = new Map<string, BenchmarkScope[]>();
  private readonly productionCentricScopes: ReadonlySet<BenchmarkScope>;

  constructor(entries: BenchmarkEntry[], productionCentricScopes: Iterable<BenchmarkScope> = []) {
    for (const entry of entries) {
      this.entries.set(entryKey(entry.sector, entry.region, entry.scope), entry.series);
      const pair = pairKey(entry.sector, entry.region);
      const scopes = this.scopesByPair.get(pair) ?? [];
      if (!scopes.includes(entry.scope)) scopes.push(entry.scope);
      this.scopesByPair.set(pair, scopes);
    }
    this.productionCentricScopes = new Set(productionCentricScopes);
  }

  /** Region the benchmark will use for (sector, region), or null when neither it nor Global is covered */
  resolveRegion(sector: string, region: string): string | null {
    if (this.scopesByPair.has(pairKey(sector, region))) return region;
    if (this.scopesByPair.has(pairKey(sector, GLOBAL_REGION))) return GLOBAL_REGION;
    return null;
  }

  /** Scopes published for (sector, region) after Global fallback; empty when not covered */
  scopesFor(sector: string, region: string): BenchmarkScope[] {
    const resolved = this.resolveRegion(sector, region);
    if (resolved === null) return [];
    return [...(this.scopesByPair.get(pairKey(sector, resolved)) ?? [])];
  }

  /** Series for (sector, region, scope) after Global fallback */
  lookup(sector: string, region: string, scope: BenchmarkScope): YearSeries | undefined {
    const resolved = this.resolveRegion(sector, region);
    if (resolved === null) return undefined;
    return this.entries.get(entryKey(sector, resolved, scope));
  }

  /** Whether any sector/region publishes `scope` */
  hasScope(scope: BenchmarkScope): boolean {
    for (const scopes of this.scopesByPair.values()) {
      if (scopes.includes(scope)) return true;
    }
    return false;
  }

  isProductionCentric(scope: Scope): boolean {
    return this.productionCentricScopes.has(scope);
  }

  get size(): number {
    return this.entries.size;
  }
}
