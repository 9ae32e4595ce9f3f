#!/usr/bin/env node
import { z } from 'zod';
import { harvestArgsSchema, runHarvestAction } from './actions/harvest.js';

type ParsedArgs = {
  command: string;
  options: Record<string, string>;
};

const cliInputSchema = z.discriminatedUnion('command', [
  z.object({
    command: z.literal('help'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('harvest'),
    options: z.record(z.string(), z.string()),
  }),
]);

function parseArgs(argv: string[]): ParsedArgs {
  const [rawCommand, ...remaining] = argv;
  // Running without a command, or with options only, means a full harvest
  const rest =
    rawCommand?.startsWith('--') && !isHelpFlag(rawCommand)
      ? argv
      : remaining;
  const command = normalizeCommand(rawCommand);
  const options: Record<string, string> = {};

  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index];
    if (!arg?.startsWith('--')) {
      continue;
    }

    const [key, maybeValue] = arg.slice(2).split('=', 2);
    if (!key) {
      continue;
    }

    if (maybeValue !== undefined) {
      options[key] = maybeValue;
      continue;
    }

    const next = rest[index + 1];
    if (next && !next.startsWith('--')) {
      options[key] = next;
      index += 1;
      continue;
    }

    options[key] = 'true';
  }

  return { command, options };
}

function isHelpFlag(arg: string): boolean {
  return arg === '--help' || arg === '-h';
}

function normalizeCommand(command?: string): string {
  if (command === 'help' || (command !== undefined && isHelpFlag(command))) {
    return 'help';
  }

  if (!command || command.startsWith('--')) {
    return 'harvest';
  }

  return command;
}

function printHelp(): void {
  console.log(`address-harvester CLI

Usage:
  cli
  cli harvest
  cli harvest --dataDir="./tmp/stuttgart"
  cli harvest --saveEvery=20 --timeoutMs=15000
  cli harvest --streetUrl="https://example.org/streets" --numberUrl="https://example.org/numbers"
  cli harvest --logLevel=debug
  cli help

Commands:
  harvest  Collect every street name, then every house number per street (default)
  help     Show this help message

Harvest options:
  --dataDir    Directory holding the JSON snapshots (default: ./data).
               Existing snapshots are loaded and the harvest resumes from them.
  --streetUrl  Street-name autocomplete endpoint (default: Stuttgart city service).
  --numberUrl  House-number autocomplete endpoint (default: Stuttgart city service).
  --saveEvery  Save a snapshot after this many processed streets (default: 50).
  --timeoutMs  Per-request timeout in milliseconds (default: 10000).
  --logLevel   One of: silent, fatal, error, warn, info, debug, trace.
               Overrides LOG_LEVEL.

Exit codes:
  0    Harvest finished
  1    Harvest failed (invalid arguments, unreadable snapshot, failed save)
  130  Interrupted by SIGINT/SIGTERM after saving a snapshot
`);
}

async function main(): Promise<number> {
  const { command, options } = parseArgs(process.argv.slice(2));
  const parsedCliInput = cliInputSchema.safeParse({ command, options });

  if (!parsedCliInput.success) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  if (parsedCliInput.data.command === 'help') {
    printHelp();
    return 0;
  }

  const parsedHarvestArgs = harvestArgsSchema.safeParse(
    parsedCliInput.data.options,
  );
  if (!parsedHarvestArgs.success) {
    console.error(
      parsedHarvestArgs.error.issues[0]?.message ?? 'Invalid arguments',
    );
    printHelp();
    return 1;
  }

  return runHarvestAction(parsedHarvestArgs.data);
}

const exitCode = await main();
process.exitCode = exitCode;
