import { Pool } from 'pg';
import { NotFoundError } from '../errors/metric-errors';
import { RawRecord } from '../types/tables';
import { TableDefinition } from './table-schemas';
import { TableSource } from './table-source';

/** SQLSTATE for "relation does not exist" */
const UNDEFINED_TABLE = '42P01';

function isUndefinedTableError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === UNDEFINED_TABLE;
}

/**
 * Tables loaded from PostgreSQL, one SQL table per raw table
 * (races, results, qualifying, ...), columns named as in the CSV dataset.
 */
export class PostgresTableSource implements TableSource {
  readonly kind = 'postgres';

  constructor(private readonly pool: Pool, private readonly schema: string = 'public') {}

  async read<Row>(definition: TableDefinition<Row>): Promise<RawRecord[]> {
    // identifiers come from TABLE_DEFINITIONS, never from callers
    const sql = `SELECT * FROM "${this.schema}"."${definition.name}"`;

    try {
      const result = await this.pool.query<RawRecord>(sql);
      return result.rows;
    } catch (err) {
      if (isUndefinedTableError(err)) {
        throw new NotFoundError(definition.name, `table ${this.schema}.${definition.name} does not exist`);
      }
      throw err;
    }
  }

  describe(): string {
    return `postgres:${this.schema}`;
  }
}
