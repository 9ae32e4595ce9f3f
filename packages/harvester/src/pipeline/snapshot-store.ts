import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { HarvestError, SnapshotError } from '../errors.js';
import type { HarvestSnapshot } from './types.js';

const SNAPSHOT_FILES = {
  streetNames: 'street_names.json',
  completedQueries: 'completed_queries.json',
  failedQueries: 'failed_queries.json',
  streetNumbers: 'street_numbers.json',
} as const;

type SnapshotFile = keyof typeof SNAPSHOT_FILES;

const stringListSchema = z.array(z.string());
const streetNumbersSchema = z.record(z.string(), z.array(z.string()));

type LoadedSnapshot = {
  snapshot: HarvestSnapshot;
  filesFound: SnapshotFile[];
};

/**
 * Keeps a harvest snapshot as plain JSON files in one directory. Every save
 * rewrites all files; each goes through a `.tmp` sibling and a rename.
 */
export class SnapshotStore {
  private readonly dataDir: string;

  constructor(dataDir: string) {
    this.dataDir = dataDir;
  }

  pathOf(file: SnapshotFile): string {
    return join(this.dataDir, SNAPSHOT_FILES[file]);
  }

  load(): LoadedSnapshot {
    const filesFound: SnapshotFile[] = [];

    const readList = (file: SnapshotFile): string[] => {
      const content = this.readJson(file);
      if (content === undefined) {
        return [];
      }

      filesFound.push(file);
      return this.validate(file, stringListSchema, content);
    };

    const streetNames = readList('streetNames');
    const completedQueries = readList('completedQueries');
    const failedQueries = readList('failedQueries');

    let streetNumbers: Record<string, string[]> = {};
    const numbersContent = this.readJson('streetNumbers');
    if (numbersContent !== undefined) {
      filesFound.push('streetNumbers');
      streetNumbers = this.validate(
        'streetNumbers',
        streetNumbersSchema,
        numbersContent,
      );
    }

    return {
      snapshot: { streetNames, completedQueries, failedQueries, streetNumbers },
      filesFound,
    };
  }

  save(snapshot: HarvestSnapshot): void {
    try {
      if (!existsSync(this.dataDir)) {
        mkdirSync(this.dataDir, { recursive: true });
      }

      this.writeJson('streetNames', snapshot.streetNames);
      this.writeJson('completedQueries', snapshot.completedQueries);
      this.writeJson('failedQueries', snapshot.failedQueries);
      this.writeJson('streetNumbers', snapshot.streetNumbers);
    } catch (error) {
      throw new HarvestError(
        `Failed to save snapshot to ${this.dataDir}`,
        'persistence',
        { cause: error },
      );
    }
  }

  private readJson(file: SnapshotFile): unknown {
    const filePath = this.pathOf(file);
    if (!existsSync(filePath)) {
      return undefined;
    }

    const content = readFileSync(filePath, 'utf-8');

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      throw new SnapshotError(filePath, 'not valid JSON', { cause: error });
    }
  }

  private validate<T>(
    file: SnapshotFile,
    schema: z.ZodType<T>,
    content: unknown,
  ): T {
    const parsed = schema.safeParse(content);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.length ? ` at ${issue.path.join('.')}` : '';
      throw new SnapshotError(
        this.pathOf(file),
        `${issue?.message ?? 'unexpected shape'}${where}`,
      );
    }

    return parsed.data;
  }

  private writeJson(file: SnapshotFile, value: unknown): void {
    const filePath = this.pathOf(file);
    const tmpPath = `${filePath}.tmp`;

    writeFileSync(tmpPath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
    renameSync(tmpPath, filePath);
  }
}

export { SNAPSHOT_FILES };
export type { LoadedSnapshot, SnapshotFile };
