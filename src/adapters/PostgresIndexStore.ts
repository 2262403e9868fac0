import { Pool } from 'pg';
import { IndexStore } from '../ports/IndexStore';
import { IndexSnapshot, decodeSnapshot, parseSnapshot } from '../core/index-snapshot';

export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<{ rows: Record<string, unknown>[]; rowCount: number | null }>;
  end(): Promise<void>;
}

export function poolExecutor(pool: Pool): SqlExecutor {
  return {
    query: (text, values) => pool.query(text, values),
    end: () => pool.end(),
  };
}

export function createPool(connectionString: string): Pool {
  return new Pool({
    connectionString,
    max: 5,
    idleTimeoutMillis: 30000, // Close idle clients after 30 seconds
    connectionTimeoutMillis: 2000, // Return an error after 2 seconds if no connection is available
  });
}

/**
 * Keeps each named index as one jsonb row. The table is created on first use.
 */
export class PostgresIndexStore implements IndexStore {
  readonly location: string;
  private schemaReady = false;

  constructor(
    private readonly db: SqlExecutor,
    private readonly name: string = 'default',
    private readonly table: string = 'policy_indexes'
  ) {
    if (!/^[a-z_][a-z0-9_]*$/i.test(table)) {
      throw new Error(`Invalid table name: ${table}`);
    }
    this.location = `postgres table ${table} (index "${name}")`;
  }

  private async ensureSchema(): Promise<void> {
    if (this.schemaReady) return;
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        name TEXT PRIMARY KEY,
        payload JSONB NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `);
    this.schemaReady = true;
  }

  async exists(): Promise<boolean> {
    await this.ensureSchema();
    const result = await this.db.query(`SELECT 1 FROM ${this.table} WHERE name = $1`, [this.name]);
    return result.rows.length > 0;
  }

  async load(): Promise<IndexSnapshot> {
    await this.ensureSchema();
    const result = await this.db.query(`SELECT payload FROM ${this.table} WHERE name = $1`, [this.name]);
    const payload = result.rows[0]?.payload;
    // pg parses jsonb unless its type parser was overridden
    return typeof payload === 'string' ? decodeSnapshot(payload, this.location) : parseSnapshot(payload, this.location);
  }

  async save(snapshot: IndexSnapshot): Promise<void> {
    await this.ensureSchema();
    await this.db.query(
      `
        INSERT INTO ${this.table} (name, payload, updated_at)
        VALUES ($1, $2, now())
        ON CONFLICT (name) DO UPDATE SET payload = EXCLUDED.payload, updated_at = now()
      `,
      [this.name, JSON.stringify(snapshot)]
    );
  }

  async delete(): Promise<void> {
    await this.ensureSchema();
    await this.db.query(`DELETE FROM ${this.table} WHERE name = $1`, [this.name]);
  }

  async close(): Promise<void> {
    await this.db.end();
  }
}
