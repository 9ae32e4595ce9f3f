/** Serializable view of a harvest, one field per persisted file. */
type HarvestSnapshot = {
  streetNames: string[];
  completedQueries: string[];
  failedQueries: string[];
  streetNumbers: Record<string, string[]>;
};

type HarvestStats = {
  streets: number;
  completedQueries: number;
  failedQueries: number;
  processedStreets: number;
  houseNumbers: number;
};

type RepairPlan = {
  streetPrefixes: string[];
  houseNumberPrefixes: Map<string, string[]>;
};

export type { HarvestSnapshot, HarvestStats, RepairPlan };
