/**
 * Read and write kinds backed by connectors
 *
 * A connector kind's configuration is its location plus an optional
 * `credentials` key naming a run-scoped bundle (default: the connector name).
 * Nothing is opened until the step runs.
 */

import { readFrom, writeTo, type Connector, type ConnectorLocation } from '../connectors/connector'
import { BlobConnector, type BlobContainerFactory } from '../connectors/blob-connector'
import { FileConnector } from '../connectors/file-connector'
import { InferenceConnector, type FetchLike } from '../connectors/inference-connector'
import { MemoryConnector, MemoryStore, generateRows } from '../connectors/memory-connector'
import { PostgresConnector, type PgPoolFactory } from '../connectors/postgres-connector'
import type { RetryPolicy } from '../config/schema'
import type { Dataset } from '../dataset/dataset'
import { concatenate, join, union, type JoinHow } from '../dataset/merge'
import { DatasetError } from '../errors'
import { oneOf, optionalNumber, optionalRecord, optionalString, stringList } from '../registry/config-values'
import type { StepRegistry } from '../registry/step-registry'
import type { PropertySchema, ReadStep, StepContext, StepKindDefinition, StepSchema, WriteStep } from '../registry/types'

export interface IoDependencies {
  memoryStore: MemoryStore
  /** Directory relative file names resolve against */
  baseDir?: string
  fetch?: FetchLike
  createPgPool?: PgPoolFactory
  createBlobContainer?: BlobContainerFactory
}

const CREDENTIALS: PropertySchema = {
  type: 'string',
  description: 'Name of the credential bundle in the run configuration',
}

const FORMAT: PropertySchema = { type: 'string', enum: ['csv', 'json', 'jsonl', 'yaml'] }

function locationOf(config: Record<string, unknown>): ConnectorLocation {
  const { credentials: _credentials, ...location } = config
  return location
}

function connectorRead<THandle>(connector: Connector<THandle>, config: Record<string, unknown>): ReadStep {
  const location = locationOf(config)
  const bundle = optionalString(config, 'credentials') ?? connector.name
  return {
    type: 'read',
    read: ctx => readFrom(connector, location, ctx.credentials(bundle), { logger: ctx.logger, signal: ctx.signal }),
  }
}

function connectorWrite<THandle>(connector: Connector<THandle>, config: Record<string, unknown>): WriteStep {
  const location = locationOf(config)
  const bundle = optionalString(config, 'credentials') ?? connector.name
  return {
    type: 'write',
    write: (dataset, ctx) =>
      writeTo(connector, location, dataset, ctx.credentials(bundle), { logger: ctx.logger, signal: ctx.signal }),
  }
}

interface ConnectorKind {
  kind: string
  description: string
  schema: StepSchema
  shorthand?: string
  read?: (retry: RetryPolicy) => Connector<unknown>
  write?: (retry: RetryPolicy) => Connector<unknown>
}

function connectorKinds(deps: IoDependencies): ConnectorKind[] {
  const baseDir = deps.baseDir ?? process.cwd()
  return [
    {
      kind: 'file',
      description: 'Local csv, json, jsonl or yaml file',
      shorthand: 'name',
      schema: {
        type: 'object',
        properties: {
          name: { type: 'string', description: 'File path' },
          format: FORMAT,
          delimiter: { type: 'string' },
        },
        required: ['name'],
        additionalProperties: false,
      },
      read: retry => new FileConnector('read', baseDir, retry),
      write: retry => new FileConnector('write', baseDir, retry),
    },
    {
      kind: 'memory',
      description: 'Named in-process table',
      shorthand: 'table',
      schema: {
        type: 'object',
        properties: {
          table: { type: 'string' },
          append: { type: 'boolean', default: false },
        },
        required: ['table'],
        additionalProperties: false,
      },
      read: () => new MemoryConnector(deps.memoryStore),
      write: () => new MemoryConnector(deps.memoryStore),
    },
    {
      kind: 'postgres',
      description: 'PostgreSQL table or query',
      schema: {
        type: 'object',
        properties: {
          table: { type: 'string' },
          query: { type: 'string' },
          params: { type: 'array' },
          mode: { type: 'string', enum: ['append', 'truncate'], default: 'append' },
          batch_size: { type: 'integer', minimum: 1 },
          credentials: CREDENTIALS,
        },
        anyOf: [{ required: ['table'] }, { required: ['query'] }],
        additionalProperties: false,
      },
      read: retry => new PostgresConnector(deps.createPgPool, retry),
      write: retry => new PostgresConnector(deps.createPgPool, retry),
    },
    {
      kind: 'blob',
      description: 'File in Azure Blob Storage',
      schema: {
        type: 'object',
        properties: {
          container: { type: 'string' },
          path: { type: 'string' },
          format: FORMAT,
          delimiter: { type: 'string' },
          credentials: CREDENTIALS,
        },
        required: ['container', 'path'],
        additionalProperties: false,
      },
      read: retry => new BlobConnector(deps.createBlobContainer, retry),
      write: retry => new BlobConnector(deps.createBlobContainer, retry),
    },
    {
      kind: 'inference',
      description: 'Model endpoint: reference data on read, training data on write',
      schema: {
        type: 'object',
        properties: {
          endpoint: { type: 'string' },
          model_id: { type: 'string' },
          name: { type: 'string' },
          task: { type: 'string', enum: ['classify', 'extract', 'standardize'] },
          credentials: CREDENTIALS,
        },
        additionalProperties: false,
      },
      read: retry => new InferenceConnector(deps.fetch, retry),
      write: retry => new InferenceConnector(deps.fetch, retry),
    },
  ]
}

function sourcesSchema(description: string): StepSchema {
  return {
    type: 'object',
    description,
    properties: {
      sources: { type: 'array', minItems: 1, description: 'Read steps to combine' },
    },
    required: ['sources'],
    additionalProperties: false,
  }
}

async function readAll(steps: ReadStep[], ctx: StepContext): Promise<Dataset[]> {
  const datasets: Dataset[] = []
  for (const step of steps) {
    datasets.push(await step.read(ctx))
  }
  return datasets
}

const JOIN_HOW: readonly JoinHow[] = ['inner', 'left', 'right', 'outer']

const KEY_COLUMNS: PropertySchema = { anyOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }] }

/**
 * Reads that combine nested reads explicitly
 */
function aggregateKinds(): StepKindDefinition[] {
  return [
    {
      section: 'read',
      kind: 'union',
      description: 'Append the rows of every source; columns are the union of theirs',
      schema: sourcesSchema('Row-wise union of sources'),
      children: 'sources',
      childSection: 'read',
      create: async (_config, ctx) => {
        const sources = await ctx.readChildren()
        return { type: 'read', read: async readCtx => union(await readAll(sources, readCtx)) }
      },
    },
    {
      section: 'read',
      kind: 'concatenate',
      description: 'Place sources side by side; row counts must match',
      schema: sourcesSchema('Column-wise concatenation of sources'),
      children: 'sources',
      childSection: 'read',
      create: async (_config, ctx) => {
        const sources = await ctx.readChildren()
        return { type: 'read', read: async readCtx => concatenate(await readAll(sources, readCtx)) }
      },
    },
    {
      section: 'read',
      kind: 'join',
      description: 'Join exactly two sources on key columns',
      schema: {
        type: 'object',
        description: 'Join of two sources',
        properties: {
          sources: { type: 'array', minItems: 2, maxItems: 2, description: 'Left and right read steps' },
          how: { type: 'string', enum: JOIN_HOW, default: 'inner' },
          on: KEY_COLUMNS,
          left_on: KEY_COLUMNS,
          right_on: KEY_COLUMNS,
        },
        required: ['sources'],
        anyOf: [{ required: ['on'] }, { required: ['left_on', 'right_on'] }],
        additionalProperties: false,
      },
      children: 'sources',
      childSection: 'read',
      create: async (config, ctx) => {
        const sources = await ctx.readChildren()
        if (sources.length !== 2) {
          throw new DatasetError(`join takes exactly two sources, got ${sources.length}`)
        }
        const on = stringList(config, 'on')
        const leftOn = stringList(config, 'left_on') ?? on
        const rightOn = stringList(config, 'right_on') ?? on
        if (!leftOn || !rightOn) {
          throw new DatasetError('join requires on, or left_on and right_on')
        }
        const how = oneOf(config, 'how', JOIN_HOW, 'inner')
        return {
          type: 'read',
          read: async readCtx => {
            const [left, right] = await readAll(sources, readCtx)
            return join(left, right, { how, leftOn, rightOn })
          },
        }
      },
    },
    {
      section: 'read',
      kind: 'test',
      description: 'Generate rows copies of a values row',
      schema: {
        type: 'object',
        properties: {
          rows: { type: 'integer', minimum: 0, default: 1 },
          values: { type: 'object' },
        },
        required: ['values'],
        additionalProperties: false,
      },
      create: config => {
        const dataset = generateRows(optionalNumber(config, 'rows') ?? 1, optionalRecord(config, 'values') ?? {})
        return { type: 'read', read: async () => dataset }
      },
    },
  ]
}

/**
 * Register connector-backed read and write kinds and the aggregating reads
 */
export function registerIoSteps(registry: StepRegistry, deps: IoDependencies): void {
  for (const entry of connectorKinds(deps)) {
    const { read, write } = entry
    if (read) {
      registry.register({
        section: 'read',
        kind: entry.kind,
        description: entry.description,
        schema: entry.schema,
        shorthand: entry.shorthand,
        create: (config, ctx) => connectorRead(read(ctx.connectorRetry), config),
      })
    }
    if (write) {
      registry.register({
        section: 'write',
        kind: entry.kind,
        description: entry.description,
        schema: entry.schema,
        shorthand: entry.shorthand,
        create: (config, ctx) => connectorWrite(write(ctx.connectorRetry), config),
      })
    }
  }

  for (const definition of aggregateKinds()) {
    registry.register(definition)
  }
}
