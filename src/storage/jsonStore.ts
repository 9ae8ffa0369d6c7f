import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import {
  storedAttendanceSchema,
  storedDepartmentSchema,
  storedDistrictSchema,
  storedEmployeeSchema,
} from '../schemas';
import type { CollectionMap, CollectionName } from '../types';

type RecordSchemas = {
  [K in CollectionName]: z.ZodType<CollectionMap[K], z.ZodTypeDef, unknown>;
};

const recordSchemas: RecordSchemas = {
  districts: storedDistrictSchema,
  departments: storedDepartmentSchema,
  employees: storedEmployeeSchema,
  attendance: storedAttendanceSchema,
};

async function fileExists(p: string) {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * One collection persisted as a pretty-printed JSON array. There is no
 * locking: concurrent writers race and the last `save` wins.
 */
export class JsonCollection<K extends CollectionName> {
  private readonly schema: z.ZodType<CollectionMap[K], z.ZodTypeDef, unknown>;

  constructor(readonly name: K, readonly filePath: string) {
    this.schema = recordSchemas[name];
  }

  exists(): Promise<boolean> {
    return fileExists(this.filePath);
  }

  /**
   * Records in file order. A missing file, unreadable file or content that is
   * not a JSON array reads as empty.
   */
  async load(): Promise<CollectionMap[K][]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return [];
      console.error(`Error loading JSON from ${this.filePath}:`, describe(err));
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      console.error(`Error loading JSON from ${this.filePath}:`, describe(err));
      return [];
    }

    if (!Array.isArray(parsed)) {
      console.error(`Error loading JSON from ${this.filePath}: expected an array`);
      return [];
    }

    // Entries that are not records at all (strings, arrays, ...) are skipped
    // and will be missing from the next save.
    const records: CollectionMap[K][] = [];
    parsed.forEach((entry: unknown, index) => {
      const result = this.schema.safeParse(entry);
      if (result.success) {
        records.push(result.data);
        return;
      }
      const issue = result.error.issues[0];
      console.error(
        `Skipping ${this.name}[${index}] in ${this.filePath}: ${issue.path.join('.') || '<root>'} ${issue.message}`,
      );
    });
    return records;
  }

  async save(records: CollectionMap[K][]): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(records, null, 2), 'utf8');
    } catch (err) {
      console.error(`Error saving JSON to ${this.filePath}:`, describe(err));
      throw err;
    }
  }
}

export class JsonStore {
  constructor(readonly dataDir: string) {}

  collection<K extends CollectionName>(name: K): JsonCollection<K> {
    return new JsonCollection(name, path.join(this.dataDir, `${name}.json`));
  }
}

function isMissingFile(err: unknown) {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function describe(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}
