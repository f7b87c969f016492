import pg from 'pg'
import type { PoolConfig } from 'pg'
import type { Logger } from 'pino'
import type { CredentialBundle } from '../config/schema'
import { Dataset, type Row } from '../dataset/dataset'
import { ConnectorIOError } from '../errors'
import { Observability } from '../observability'
import type { Acknowledgement, Connector, ConnectorLocation } from './connector'
import type { RetryPolicy } from '../config/schema'

/**
 * The slice of a pg client the connector uses
 */
export interface PgClientLike {
  query(text: string, values?: unknown[]): Promise<{ rows: Row[]; fields: { name: string }[] }>
  release(): void
}

export interface PgPoolLike {
  connect(): Promise<PgClientLike>
  end(): Promise<void>
}

export type PgPoolFactory = (credentials: CredentialBundle) => PgPoolLike

function text(bundle: CredentialBundle, key: string): string | undefined {
  const value = bundle[key]
  return typeof value === 'string' ? value : undefined
}

function toPoolConfig(bundle: CredentialBundle): PoolConfig {
  const port = bundle.port
  return {
    connectionString: text(bundle, 'connectionString'),
    host: text(bundle, 'host'),
    port: typeof port === 'number' ? port : typeof port === 'string' ? Number(port) : undefined,
    user: text(bundle, 'user'),
    password: text(bundle, 'password'),
    database: text(bundle, 'database'),
    ssl: bundle.ssl === true ? { rejectUnauthorized: bundle.rejectUnauthorized !== false } : undefined,
    max: 1,
  }
}

export const createPgPool: PgPoolFactory = credentials => {
  const pool = new pg.Pool(toPoolConfig(credentials))
  return {
    async connect() {
      const client = await pool.connect()
      return {
        async query(sql: string, values?: unknown[]) {
          const result = await client.query(sql, values)
          return { rows: result.rows, fields: result.fields.map(field => ({ name: field.name })) }
        },
        release: () => client.release(),
      }
    },
    end: () => pool.end(),
  }
}

export type PgWriteMode = 'append' | 'truncate'

export interface PgHandle {
  pool: PgPoolLike
  client: PgClientLike
  table?: string
  query?: string
  params: unknown[]
  mode: PgWriteMode
  batchSize: number
}

/**
 * Quote a possibly schema-qualified identifier
 */
export function quoteIdentifier(name: string): string {
  return name
    .split('.')
    .map(part => `"${part.replace(/"/g, '""')}"`)
    .join('.')
}

function sqlValue(value: unknown): unknown {
  if (value === undefined) return null
  if (typeof value === 'object' && value !== null && !(value instanceof Date)) return JSON.stringify(value)
  return value
}

/**
 * PostgresConnector - relational tables over a pg pool
 *
 * Location keys: `table` or `query` (read), `params` (query parameters),
 * `mode` (`append` | `truncate`), `batch_size`. Credentials are a pg pool
 * bundle: `connectionString` or `host`/`port`/`user`/`password`/`database`.
 */
export class PostgresConnector implements Connector<PgHandle> {
  readonly name = 'postgres'

  constructor(
    private createPool: PgPoolFactory = createPgPool,
    readonly retryPolicy?: RetryPolicy,
    private logger?: Logger
  ) {}

  describe(location: ConnectorLocation): string {
    if (typeof location.table === 'string') return `postgres table ${location.table}`
    return 'postgres query'
  }

  async open(location: ConnectorLocation, credentials: CredentialBundle = {}): Promise<PgHandle> {
    const pool = this.createPool(credentials)
    let client: PgClientLike
    try {
      client = await pool.connect()
    } catch (error) {
      await pool.end()
      throw error
    }
    return {
      pool,
      client,
      table: typeof location.table === 'string' ? location.table : undefined,
      query: typeof location.query === 'string' ? location.query : undefined,
      params: Array.isArray(location.params) ? location.params : [],
      mode: location.mode === 'truncate' ? 'truncate' : 'append',
      batchSize: typeof location.batch_size === 'number' ? location.batch_size : 500,
    }
  }

  async read(handle: PgHandle): Promise<Dataset> {
    const sql = handle.query ?? (handle.table ? `SELECT * FROM ${quoteIdentifier(handle.table)}` : undefined)
    if (!sql) {
      throw new ConnectorIOError('postgres read requires a table or query', this.name, 'postgres')
    }
    const result = await handle.client.query(sql, handle.params)
    return Dataset.fromRecords(result.rows, result.fields.map(field => field.name))
  }

  async write(handle: PgHandle, dataset: Dataset): Promise<Acknowledgement> {
    const { client, table } = handle
    if (!table) {
      throw new ConnectorIOError('postgres write requires a table', this.name, 'postgres')
    }
    const target = quoteIdentifier(table)
    const columnList = dataset.columns.map(quoteIdentifier).join(', ')

    await client.query('BEGIN')
    let batchStart = 0
    try {
      if (handle.mode === 'truncate') {
        await client.query(`TRUNCATE ${target}`)
      }
      for (; batchStart < dataset.rowCount; batchStart += handle.batchSize) {
        const batch = dataset.rows.slice(batchStart, batchStart + handle.batchSize)
        const values: unknown[] = []
        const tuples = batch.map(row => {
          const placeholders = dataset.columns.map(column => {
            values.push(sqlValue(row[column]))
            return `$${values.length}`
          })
          return `(${placeholders.join(', ')})`
        })
        await client.query(`INSERT INTO ${target} (${columnList}) VALUES ${tuples.join(', ')}`, values)
      }
      await client.query('COMMIT')
    } catch (error) {
      try {
        await client.query('ROLLBACK')
      } catch (rollbackError) {
        // The insert failure is the one reported
        const logger = this.logger ?? Observability.getInstance().logger
        logger.warn({ err: rollbackError, table }, 'postgres rollback failed')
      }
      throw new ConnectorIOError(
        `postgres write to ${table} failed: ${error instanceof Error ? error.message : String(error)}`,
        this.name,
        `postgres table ${table}`,
        { start: batchStart, end: Math.min(batchStart + handle.batchSize, dataset.rowCount) },
        { cause: error }
      )
    }

    return {
      connector: this.name,
      location: `postgres table ${table}`,
      rowsWritten: dataset.rowCount,
      details: { mode: handle.mode },
    }
  }

  async close(handle: PgHandle): Promise<void> {
    handle.client.release()
    await handle.pool.end()
  }
}
