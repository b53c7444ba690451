import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import { MalformedDataError, NotFoundError } from '../errors/metric-errors';
import { RawRecord } from '../types/tables';
import { TableDefinition } from './table-schemas';

/**
 * Where raw tables come from.
 *
 * Implementations return every record of one table, or throw
 * NotFoundError when the table does not exist in the backing dataset.
 */
export interface TableSource {
  readonly kind: string;
  read<Row>(definition: TableDefinition<Row>): Promise<RawRecord[]>;
  describe(): string;
}

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Directory of CSV files, one per table (races.csv, results.csv, ...)
 */
export class CsvTableSource implements TableSource {
  readonly kind = 'csv';

  constructor(private readonly datasetDir: string) {}

  async read<Row>(definition: TableDefinition<Row>): Promise<RawRecord[]> {
    const filepath = path.join(this.datasetDir, definition.file);

    let content: string;
    try {
      content = await fs.promises.readFile(filepath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        throw new NotFoundError(definition.name, `dataset file not found: ${filepath}`);
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = parse(content, {
        columns: true,
        skip_empty_lines: true,
        trim: true,
        bom: true,
      });
    } catch (err) {
      throw new MalformedDataError(definition.name, err instanceof Error ? err.message : String(err));
    }

    if (!Array.isArray(parsed)) {
      throw new MalformedDataError(definition.name, 'csv parser did not return rows');
    }

    return parsed.filter(isRecord);
  }

  describe(): string {
    return `csv:${this.datasetDir}`;
  }
}

/**
 * In-memory source, used by tests and by callers that already hold the data
 */
export class InMemoryTableSource implements TableSource {
  readonly kind = 'memory';
  readonly reads: string[] = [];

  constructor(private readonly tables: Partial<Record<string, RawRecord[]>>) {}

  async read<Row>(definition: TableDefinition<Row>): Promise<RawRecord[]> {
    this.reads.push(definition.name);
    const records = this.tables[definition.name];
    if (!records) {
      throw new NotFoundError(definition.name);
    }
    return records.map(record => ({ ...record }));
  }

  describe(): string {
    return 'memory';
  }
}
