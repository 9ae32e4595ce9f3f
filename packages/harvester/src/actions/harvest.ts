import { log, setLogLevel } from '@workspace/logger';
import { z } from 'zod';
import { describeError, HarvestError } from '../errors.js';
import { HarvestOrchestrator } from '../orchestrator/harvest-orchestrator.js';
import { SnapshotStore } from '../pipeline/snapshot-store.js';
import {
  AutocompleteClient,
  DEFAULT_NUMBER_URL,
  DEFAULT_STREET_URL,
} from '../suggest/autocomplete-client.js';
import type { SuggestFn } from '../suggest/types.js';

const EXIT_INTERRUPTED = 130;

const trimmedStringSchema = (fallback: string) =>
  z.preprocess((value) => {
    if (value === undefined) {
      return fallback;
    }

    if (typeof value === 'string') {
      const trimmed = value.trim();
      return trimmed.length ? trimmed : fallback;
    }

    return value;
  }, z.string().min(1));

const positiveIntegerSchema = (fallback: number, message: string) =>
  z.preprocess(
    (value) => {
      if (value === undefined) {
        return fallback;
      }

      if (typeof value === 'string') {
        const parsedValue = Number(value);
        return Number.isFinite(parsedValue) ? parsedValue : value;
      }

      return value;
    },
    z.number({ invalid_type_error: message }).int(message).min(1, message),
  );

const harvestArgsSchema = z.object({
  dataDir: trimmedStringSchema('data'),
  streetUrl: trimmedStringSchema(DEFAULT_STREET_URL).pipe(
    z.string().url('Invalid --streetUrl. Provide an absolute URL.'),
  ),
  numberUrl: trimmedStringSchema(DEFAULT_NUMBER_URL).pipe(
    z.string().url('Invalid --numberUrl. Provide an absolute URL.'),
  ),
  saveEvery: positiveIntegerSchema(
    50,
    'Invalid --saveEvery. Provide a positive integer.',
  ),
  timeoutMs: positiveIntegerSchema(
    10_000,
    'Invalid --timeoutMs. Provide a positive integer.',
  ),
  logLevel: z
    .preprocess(
      (value) => (typeof value === 'string' ? value.toLowerCase() : value),
      z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace']),
    )
    .optional(),
});

type HarvestArgs = z.infer<typeof harvestArgsSchema>;

type HarvestActionDeps = {
  /** Replaces the HTTP autocomplete client. */
  suggest?: SuggestFn;
  handleSignals?: boolean;
};

function createSuggest(options: HarvestArgs): SuggestFn {
  const client = new AutocompleteClient({
    streetUrl: options.streetUrl,
    numberUrl: options.numberUrl,
    timeoutMs: options.timeoutMs,
  });

  return (query) => client.suggest(query);
}

export async function runHarvestAction(
  options: HarvestArgs,
  deps?: HarvestActionDeps,
): Promise<number> {
  if (options.logLevel) {
    setLogLevel(options.logLevel);
  }

  log.info('Starting harvest action', JSON.stringify(options));

  const suggest = deps?.suggest ?? createSuggest(options);

  const orchestrator = new HarvestOrchestrator(
    suggest,
    new SnapshotStore(options.dataDir),
    {
      saveEvery: options.saveEvery,
      handleSignals: deps?.handleSignals ?? true,
    },
  );

  try {
    const summary = await orchestrator.run();
    log.info(
      `Harvest finished after ${summary.queries} queries`,
      JSON.stringify(summary),
    );

    return summary.interrupted ? EXIT_INTERRUPTED : 0;
  } catch (error) {
    if (error instanceof HarvestError) {
      const cause =
        error.cause === undefined ? '' : ` (${describeError(error.cause)})`;
      log.error(`Harvest failed [${error.code}]: ${error.message}${cause}`);
    } else {
      log.error('Harvest failed:', describeError(error));
    }

    return 1;
  }
}

export { harvestArgsSchema, EXIT_INTERRUPTED };
export type { HarvestArgs, HarvestActionDeps };
