import { createLogger } from '@workspace/logger';
import { AlphabetPruner } from '../explorer/alphabet-pruner.js';
import {
  HOUSE_NUMBER_SEEDS,
  STREET_SEED_LETTERS,
} from '../explorer/alphabets.js';
import { PrefixExplorer } from '../explorer/prefix-explorer.js';
import { HouseNumberScope, StreetScope } from '../explorer/scopes.js';
import { HarvestMetrics } from '../observability/metrics.js';
import { ResultStore } from '../pipeline/result-store.js';
import type { SnapshotStore } from '../pipeline/snapshot-store.js';
import type { SuggestFn } from '../suggest/types.js';
import type { HarvestConfig, HarvestSummary } from './types.js';

const log = createLogger('Harvest');

const DEFAULT_CONFIG: HarvestConfig = {
  saveEvery: 50,
  truncationThreshold: 12,
  handleSignals: false,
};

/**
 * Runs a full harvest against one result store: retry what failed last
 * time, collect street names unless they are already known, then collect
 * house numbers street by street, saving along the way.
 */
export class HarvestOrchestrator {
  private readonly config: HarvestConfig;
  private readonly snapshots: SnapshotStore;
  private readonly store: ResultStore;
  private readonly explorer: PrefixExplorer;
  private readonly streetScope: StreetScope;
  private readonly metrics: HarvestMetrics;
  private shutdownRequested: boolean;

  constructor(
    suggest: SuggestFn,
    snapshots: SnapshotStore,
    config?: Partial<HarvestConfig>,
    store: ResultStore = new ResultStore(),
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.snapshots = snapshots;
    this.store = store;
    this.metrics = new HarvestMetrics();
    this.explorer = new PrefixExplorer(
      suggest,
      { truncationThreshold: this.config.truncationThreshold },
      this.metrics,
    );
    this.streetScope = new StreetScope(this.store, new AlphabetPruner());
    this.shutdownRequested = false;
  }

  requestShutdown(): void {
    this.shutdownRequested = true;
  }

  async run(): Promise<HarvestSummary> {
    this.loadSnapshot();

    const repairedQueries = await this.repairFailedQueries();

    if (this.store.streetCount === 0) {
      await this.collectStreets();
    } else {
      log.info(
        `Street names already collected (${this.store.streetCount}), skipping street search`,
      );
    }

    const interrupted = await this.collectHouseNumbers();

    this.save();
    this.metrics.log(log, 'harvest');

    const stats = this.store.stats();
    log.info('=== FINAL RESULTS ===');
    log.info(`Total unique streets: ${stats.streets}`);
    log.info(`Streets with house numbers: ${stats.processedStreets}`);
    log.info(`Total house numbers collected: ${stats.houseNumbers}`);
    if (stats.failedQueries > 0) {
      log.warn(
        `${stats.failedQueries} queries failed and will be retried on the next run`,
      );
    }

    return {
      ...stats,
      interrupted,
      repairedQueries,
      queries: this.metrics.count('queries.total'),
    };
  }

  private loadSnapshot(): void {
    const { snapshot, filesFound } = this.snapshots.load();
    if (filesFound.length === 0) {
      log.info('No previous snapshot found, starting fresh');
      return;
    }

    this.store.restore(snapshot);
    log.info(
      `Loaded ${snapshot.streetNames.length} street names, ` +
        `${snapshot.completedQueries.length} completed queries, ` +
        `${snapshot.failedQueries.length} failed queries and ` +
        `house numbers for ${Object.keys(snapshot.streetNumbers).length} streets`,
    );
  }

  private async repairFailedQueries(): Promise<number> {
    const plan = this.store.repairPlan();
    const before = this.store.stats().failedQueries;
    if (before === 0) {
      return 0;
    }

    log.info(`=== RETRYING ${before} FAILED QUERIES ===`);

    await this.explorer.exploreAll(this.streetScope, plan.streetPrefixes);

    for (const [street, prefixes] of plan.houseNumberPrefixes) {
      const scope = new HouseNumberScope(this.store, street);
      await this.explorer.exploreAll(scope, prefixes);
      scope.commit();
    }

    const repaired = before - this.store.stats().failedQueries;
    log.info(`Repaired ${repaired} of ${before} failed queries`);
    this.save();

    return repaired;
  }

  private async collectStreets(): Promise<void> {
    log.info('=== COLLECTING STREET NAMES ===');

    for (const letter of STREET_SEED_LETTERS) {
      log.info(`=== Starting collection for letter: ${letter} ===`);
      await this.explorer.explore(this.streetScope, letter);

      const stats = this.store.stats();
      log.info(
        `Current total: ${stats.streets} streets, ${stats.completedQueries} completed queries`,
      );
    }

    this.save();
    this.metrics.log(log, 'streets');
    log.info('=== STREET COLLECTION COMPLETE ===');
    log.info(`Total unique streets found: ${this.store.streetCount}`);
  }

  /** Returns true when a shutdown request cut the loop short. */
  private async collectHouseNumbers(): Promise<boolean> {
    const streets = this.store.sortedStreets();
    log.info('=== COLLECTING HOUSE NUMBERS ===');
    log.info(`Processing ${streets.length} streets...`);

    const onShutdown = () => {
      log.warn('Shutdown requested, stopping after the current street');
      this.requestShutdown();
    };

    if (this.config.handleSignals) {
      process.on('SIGINT', onShutdown);
      process.on('SIGTERM', onShutdown);
    }

    let processed = 0;
    let interrupted = false;

    try {
      for (const [index, street] of streets.entries()) {
        if (this.shutdownRequested) {
          interrupted = true;
          break;
        }

        const position = index + 1;
        if (this.store.isStreetProcessed(street)) {
          log.debug(`Street '${street}' already processed, skipping...`);
          continue;
        }

        log.info(`[${position}/${streets.length}] Processing street: ${street}`);

        const scope = new HouseNumberScope(this.store, street);
        await this.explorer.exploreAll(scope, HOUSE_NUMBER_SEEDS);
        scope.commit();
        processed += 1;

        if (processed % this.config.saveEvery === 0) {
          this.save();
          log.info(
            `Progress saved - processed ${position}/${streets.length} streets`,
          );
        }
      }
    } finally {
      if (this.config.handleSignals) {
        process.removeListener('SIGINT', onShutdown);
        process.removeListener('SIGTERM', onShutdown);
      }
    }

    return interrupted;
  }

  private save(): void {
    this.snapshots.save(this.store.snapshot());

    const stats = this.store.stats();
    log.info(
      `Saved ${stats.streets} streets, ${stats.completedQueries} completed queries, ` +
        `house numbers for ${stats.processedStreets} streets (${stats.houseNumbers} total)`,
    );
  }
}
