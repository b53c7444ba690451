import { serviceMetrics } from '../observability/metrics';
import { RawTable, TABLE_NAMES, TableName, TableRowMap } from '../types/tables';
import { parseTable, TABLE_DEFINITIONS } from './table-schemas';
import { TableSource } from './table-source';

type LoadedTables = { [K in TableName]?: Promise<RawTable<TableRowMap[K]>> };

/**
 * Table Store
 *
 * Loads raw tables from a TableSource, parses them through their schema and
 * keeps them for the life of the process. The first load of a table is
 * shared by every concurrent caller; a failed load is forgotten so the next
 * call retries.
 */
export class TableStore {
  private tables: LoadedTables = {};

  constructor(private readonly source: TableSource) {}

  load<K extends TableName>(name: K): Promise<RawTable<TableRowMap[K]>> {
    const cached: LoadedTables[K] = this.tables[name];
    if (cached) {
      return cached;
    }

    const pending = this.read(name);
    const tables: { [P in K]?: Promise<RawTable<TableRowMap[P]>> } = this.tables;
    tables[name] = pending;

    pending.catch(() => {
      // only evict if nothing replaced it (clear() + reload)
      if (this.tables[name] === pending) {
        delete this.tables[name];
      }
    });

    return pending;
  }

  /**
   * Rows of a table, without the load metadata
   */
  async rows<K extends TableName>(name: K): Promise<readonly TableRowMap[K][]> {
    const table = await this.load(name);
    return table.rows;
  }

  clear(): void {
    const count = Object.keys(this.tables).length;
    this.tables = {};
    console.log(`[TableStore] Cleared ${count} cached tables`);
  }

  loadedTables(): TableName[] {
    return TABLE_NAMES.filter(name => this.tables[name] !== undefined);
  }

  describeSource(): string {
    return this.source.describe();
  }

  private async read<K extends TableName>(name: K): Promise<RawTable<TableRowMap[K]>> {
    const startTime = Date.now();
    const definition = TABLE_DEFINITIONS[name];

    try {
      const records = await this.source.read(definition);
      const rows = parseTable(name, records);

      serviceMetrics.incrementTableLoad(name);
      console.log(`[TableStore] Loaded ${name}: ${rows.length} rows from ${this.source.kind} (${Date.now() - startTime}ms)`);

      return { name, rows, loadedAt: new Date() };
    } catch (err) {
      console.error(`[TableStore] Failed to load ${name}:`, err instanceof Error ? err.message : err);
      throw err;
    }
  }
}
