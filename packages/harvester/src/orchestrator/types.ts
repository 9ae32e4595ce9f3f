import type { HarvestStats } from '../pipeline/types.js';

type HarvestConfig = {
  /** Snapshot after this many newly processed streets. */
  saveEvery: number;
  truncationThreshold: number;
  /** Stop between streets on SIGINT/SIGTERM. */
  handleSignals: boolean;
};

type HarvestSummary = HarvestStats & {
  interrupted: boolean;
  repairedQueries: number;
  queries: number;
};

export type { HarvestConfig, HarvestSummary };
