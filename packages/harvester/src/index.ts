export {
  runHarvestAction,
  harvestArgsSchema,
  type HarvestArgs,
} from './actions/harvest.js';
export { AlphabetPruner, GERMAN_EXCLUSIONS } from './explorer/alphabet-pruner.js';
export {
  DIGIT_SYMBOLS,
  GERMAN_ALPHABET,
  HOUSE_NUMBER_SEEDS,
  STREET_SEED_LETTERS,
} from './explorer/alphabets.js';
export { PrefixExplorer } from './explorer/prefix-explorer.js';
export { HouseNumberScope, StreetScope } from './explorer/scopes.js';
export type { ExplorationScope, ExploreOutcome } from './explorer/types.js';
export { HarvestOrchestrator } from './orchestrator/harvest-orchestrator.js';
export type { HarvestConfig, HarvestSummary } from './orchestrator/types.js';
export { sortHouseNumbers } from './pipeline/natural-sort.js';
export { ResultStore } from './pipeline/result-store.js';
export { SnapshotStore } from './pipeline/snapshot-store.js';
export type { HarvestSnapshot } from './pipeline/types.js';
export { AutocompleteClient } from './suggest/autocomplete-client.js';
export type {
  SuggestFn,
  SuggestQuery,
  SuggestResult,
} from './suggest/types.js';
export { HarvestError, SnapshotError } from './errors.js';
