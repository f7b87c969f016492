import { describe, it, expect, beforeEach } from 'vitest'
import { MemoryStore } from '../../connectors/memory-connector'
import { Dataset, type Row } from '../../dataset/dataset'
import { InMemoryMetrics } from '../../observability'
import { PipelineExecutor, project } from '../../pipeline/pipeline-executor'
import type { RecipeDocument } from '../../recipe/types'
import { StepRegistry } from '../../registry/step-registry'
import type { StepKindDefinition } from '../../registry/types'
import { registerBuiltinSteps } from '../../steps/builtins'
import { silentLogger, steppingClock } from '../utils/test-helpers'

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

/** Row step failing on rows whose `value` is "bad" */
const check: StepKindDefinition = {
  section: 'wrangles',
  kind: 'check',
  schema: { type: 'object', properties: { concurrency: { type: 'integer' } }, additionalProperties: false },
  granularity: 'row',
  errorIsolation: ['skip_row', 'skip_step'],
  create: config => ({
    type: 'wrangle',
    granularity: 'row',
    concurrency: typeof config.concurrency === 'number' ? config.concurrency : 1,
    applyRow: async (row, index) => {
      // Later rows finish first
      await delay((10 - index) * 2)
      if (row.value === 'bad') throw new Error('bad value')
      return row
    },
  }),
}

/** Write kind whose calls are counted and which can be made to fail */
function countingWrite(state: { calls: number; fail: boolean }): StepKindDefinition {
  return {
    section: 'write',
    kind: 'counting',
    schema: { type: 'object', properties: {}, additionalProperties: false },
    create: () => ({
      type: 'write',
      write: async dataset => {
        state.calls++
        if (state.fail) throw new Error('destination rejected the batch')
        return { connector: 'counting', location: 'counting', rowsWritten: dataset.rowCount }
      },
    }),
  }
}

/** Promises an output column it never produces */
const forgetful: StepKindDefinition = {
  section: 'wrangles',
  kind: 'forgetful',
  schema: { type: 'object', properties: { output: { type: 'string' } }, additionalProperties: false },
  columns: { output: ['output'] },
  create: () => ({ type: 'wrangle', granularity: 'dataset', apply: dataset => dataset }),
}

function rows(count: number, bad: number[] = []): Row[] {
  return Array.from({ length: count }, (_, id) => ({ id, value: bad.includes(id) ? 'bad' : 'ok' }))
}

describe('PipelineExecutor', () => {
  let store: MemoryStore
  let metrics: InMemoryMetrics
  let writes: { calls: number; fail: boolean }
  let executor: PipelineExecutor

  beforeEach(() => {
    store = new MemoryStore()
    metrics = new InMemoryMetrics()
    writes = { calls: 0, fail: false }
    const registry = registerBuiltinSteps(new StepRegistry(), { memoryStore: store })
    registry.register(check)
    registry.register(forgetful)
    registry.register(countingWrite(writes))
    registry.freeze()
    executor = new PipelineExecutor({ registry, logger: silentLogger(), metrics, clock: steppingClock(), rowConcurrency: 2 })
  })

  function run(document: RecipeDocument, options: Parameters<PipelineExecutor['run']>[1] = {}) {
    return executor.run(document, { runId: 'run-1', ...options })
  }

  describe('ordering and states', () => {
    it('runs reads, wrangles and writes in declaration order', async () => {
      store.setRecords('in', [{ name: 'ada' }, { name: 'bob' }])

      const summary = await run({
        read: [{ memory: 'in' }],
        wrangles: [{ uppercase: { column: 'name' } }, { prefix: { column: 'name', value: 'x-' } }],
        write: [{ memory: 'out' }, { memory: { table: 'copy' } }],
      })

      expect(summary.status).toBe('completed')
      expect(summary.runId).toBe('run-1')
      expect(summary.states).toEqual(['loaded', 'validated', 'reading', 'transforming', 'writing', 'completed'])
      expect(summary.records.map(r => `${r.path}:${r.kind}:${r.status}`)).toEqual([
        'read[0]:memory:succeeded',
        'wrangles[0]:uppercase:succeeded',
        'wrangles[1]:prefix:succeeded',
        'write[0]:memory:succeeded',
        'write[1]:memory:succeeded',
      ])
      expect(store.get('out')?.column('name')).toEqual(['x-ADA', 'x-BOB'])
      expect(summary.writes).toEqual([
        { connector: 'memory', location: 'memory://out', rowsWritten: 2 },
        { connector: 'memory', location: 'memory://copy', rowsWritten: 2 },
      ])
      expect(summary.dataset?.rowCount).toBe(2)
    })

    it('freezes the summary', async () => {
      const summary = await run({ read: [{ test: { rows: 1, values: { a: 1 } } }] })

      expect(Object.isFrozen(summary)).toBe(true)
      expect(Object.isFrozen(summary.records[0])).toBe(true)
    })

    it('starts from a supplied dataset', async () => {
      const summary = await run(
        { wrangles: [{ lowercase: { column: 'name' } }], write: [{ memory: 'out' }] },
        { dataset: Dataset.fromRecords([{ name: 'ADA' }]) }
      )

      expect(summary.status).toBe('completed')
      expect(store.get('out')?.rows).toEqual([{ name: 'ada' }])
    })

    it('counts step outcomes', async () => {
      await run({ read: [{ test: { values: { name: 'a' } } }], wrangles: [{ uppercase: { column: 'name' } }] })

      expect(metrics.getCounter('run.completed')).toBe(1)
      expect(metrics.getCounter('steps.succeeded', { section: 'wrangles', kind: 'uppercase' })).toBe(1)
    })
  })

  describe('validation', () => {
    it('fails before any I/O when the recipe is invalid', async () => {
      const summary = await run({ wrangles: [{ frobnicate: {} }], write: [{ counting: {} }] })

      expect(summary.status).toBe('failed')
      expect(summary.states).toEqual(['loaded', 'failed'])
      expect(summary.error?.code).toBe('SCHEMA_VIOLATION')
      expect(summary.violations?.map(v => v.rule)).toEqual(['unknown_kind'])
      expect(summary.records).toEqual([])
      expect(writes.calls).toBe(0)
      expect(metrics.getCounter('run.failed')).toBe(1)
    })
  })

  describe('row errors', () => {
    it('drops failing rows under skip_row and reports them', async () => {
      store.setRecords('in', rows(10, [4]))

      const summary = await run({
        read: [{ memory: 'in' }],
        wrangles: [{ check: { on_error: 'skip_row' } }],
        write: [{ memory: 'out' }],
      })

      expect(summary.status).toBe('completed')
      expect(store.get('out')?.column('id')).toEqual([0, 1, 2, 3, 5, 6, 7, 8, 9])
      const record = summary.records.find(r => r.kind === 'check')
      expect(record?.status).toBe('succeeded')
      expect(record?.skippedRows).toBe(1)
      expect(record?.rowErrors).toEqual([{ rowIndex: 4, message: 'bad value' }])
    })

    it('fails the run on a row error by default and writes nothing', async () => {
      store.setRecords('in', rows(10, [4]))

      const summary = await run({
        read: [{ memory: 'in' }],
        wrangles: [{ check: {} }],
        write: [{ counting: {} }, { memory: 'out' }],
      })

      expect(summary.status).toBe('failed')
      expect(summary.states).toEqual(['loaded', 'validated', 'reading', 'transforming', 'failed'])
      expect(summary.error).toMatchObject({
        name: 'StepExecutionError',
        code: 'STEP_EXECUTION',
        message: 'check at wrangles[0] failed on row 4: bad value',
        details: { path: 'wrangles[0]', stepIndex: 0, kind: 'check', rowIndex: 4 },
      })
      expect(writes.calls).toBe(0)
      expect(store.has('out')).toBe(false)
      expect(summary.writes).toEqual([])
    })

    it('reports the lowest failing row when rows run concurrently', async () => {
      store.setRecords('in', rows(10, [2, 7]))

      const summary = await run({ read: [{ memory: 'in' }], wrangles: [{ check: { concurrency: 4 } }] })

      expect(summary.error?.details?.rowIndex).toBe(2)
    })

    it('keeps row order under concurrency', async () => {
      store.setRecords('in', rows(8))

      await run({ read: [{ memory: 'in' }], wrangles: [{ check: { concurrency: 8 } }], write: [{ memory: 'out' }] })

      expect(store.get('out')?.column('id')).toEqual([0, 1, 2, 3, 4, 5, 6, 7])
    })
  })

  describe('step errors', () => {
    it('reports a configuration error from a nested step with its location, before any I/O', async () => {
      const summary = await run({
        read: [{ test: { values: { a: 'x' } } }],
        wrangles: [{ group: { wrangles: [{ 'extract.regex': { input: 'a', output: 'b', find: '(' } }] } }],
        write: [{ counting: {} }],
      })

      expect(summary.states).toEqual(['loaded', 'validated', 'failed'])
      expect(summary.error?.code).toBe('STEP_EXECUTION')
      expect(summary.error?.message).toMatch(
        /^Cannot build step extract\.regex at wrangles\[0\]\.wrangles\[0\]: Invalid regular expression \(/
      )
      expect(summary.error?.details).toEqual({ path: 'wrangles[0].wrangles[0]', stepIndex: 0, kind: 'extract.regex' })
      expect(summary.records).toEqual([])
      expect(writes.calls).toBe(0)
    })

    it('refuses a step whose granularity differs from the one its kind declares', async () => {
      const registry = registerBuiltinSteps(new StepRegistry(), { memoryStore: store })
      registry.register({
        section: 'wrangles',
        kind: 'lying',
        schema: { type: 'object', properties: {}, additionalProperties: false },
        granularity: 'row',
        errorIsolation: ['skip_row'],
        create: () => ({ type: 'wrangle', granularity: 'dataset', apply: dataset => dataset }),
      })
      const strict = new PipelineExecutor({ registry: registry.freeze(), logger: silentLogger(), metrics })

      const summary = await strict.run({
        read: [{ test: { values: { a: 1 } } }],
        wrangles: [{ lying: { on_error: 'skip_row' } }],
      })

      expect(summary.states).toEqual(['loaded', 'validated', 'failed'])
      expect(summary.error?.message).toBe(
        'Cannot build step lying at wrangles[0]: factory for lying built a dataset step but the kind declares row'
      )
    })

    it('skips a failing step under skip_step and continues with its input', async () => {
      store.setRecords('in', [{ name: 'ada' }])

      const summary = await run({
        read: [{ memory: 'in' }],
        wrangles: [{ uppercase: { column: 'missing', on_error: 'skip_step' } }, { prefix: { column: 'name', value: '>' } }],
        write: [{ memory: 'out' }],
      })

      expect(summary.status).toBe('completed')
      expect(summary.records[1]).toMatchObject({ kind: 'uppercase', status: 'skipped' })
      expect(summary.records[1].error?.message).toBe('uppercase at wrangles[0] failed: Column missing does not exist')
      expect(store.get('out')?.rows).toEqual([{ name: '>ada' }])
    })

    it('fails when a step does not produce its declared output', async () => {
      const summary = await run({ read: [{ test: { values: { a: 1 } } }], wrangles: [{ forgetful: { output: 'total' } }] })

      expect(summary.error?.message).toBe('forgetful at wrangles[0] did not produce column total')
    })

    it('refuses to merge reads with different columns implicitly', async () => {
      const summary = await run({ read: [{ test: { values: { a: 1 } } }, { test: { values: { b: 2 } } }] })

      expect(summary.status).toBe('failed')
      expect(summary.error?.code).toBe('DATASET')
      expect(summary.records.map(r => r.status)).toEqual(['succeeded', 'failed'])
    })

    it('appends reads with the same columns', async () => {
      const summary = await run({
        read: [{ test: { rows: 2, values: { a: 1, b: 'x' } } }, { test: { values: { b: 'y', a: 2 } } }],
      })

      expect(summary.dataset?.column('a')).toEqual([1, 1, 2])
    })
  })

  describe('writes', () => {
    it('leaves earlier writes in place when a later one fails', async () => {
      writes.fail = true

      const summary = await run({ read: [{ test: { values: { a: 1 } } }], write: [{ memory: 'first' }, { counting: {} }] })

      expect(summary.status).toBe('failed')
      expect(store.has('first')).toBe(true)
      expect(summary.writes.map(ack => ack.location)).toEqual(['memory://first'])
      expect(summary.error?.message).toBe('counting at write[1] failed: destination rejected the batch')
    })

    it('records a best-effort failure and carries on', async () => {
      writes.fail = true

      const summary = await run({
        read: [{ test: { values: { a: 1 } } }],
        write: [{ counting: { best_effort: true } }, { memory: 'after' }],
      })

      expect(summary.status).toBe('completed')
      expect(summary.records.map(r => `${r.kind}:${r.status}`)).toEqual(['test:succeeded', 'counting:failed', 'memory:succeeded'])
      expect(store.has('after')).toBe(true)
    })

    it('projects columns for each write', async () => {
      await run({
        read: [{ test: { values: { a: 1, b: 2, c: 3 } } }],
        write: [{ memory: { table: 'narrow', columns: ['c', 'a'] } }, { memory: { table: 'rest', not_columns: 'a' } }],
      })

      expect(store.get('narrow')?.columns).toEqual(['c', 'a'])
      expect(store.get('rest')?.columns).toEqual(['b', 'c'])
    })

    it('opens no connector when the recipe has no writes', async () => {
      const summary = await run({ read: [{ test: { values: { a: 1 } } }] })

      expect(summary.writes).toEqual([])
      expect(writes.calls).toBe(0)
      expect(store.names()).toEqual([])
    })
  })

  describe('conditions', () => {
    it('skips steps whose condition is false', async () => {
      const summary = await run(
        {
          read: [{ test: { rows: 2, values: { name: 'a' } } }],
          wrangles: [
            { uppercase: { column: 'name', if: '$.variables.env == "prod"' } },
            { prefix: { column: 'name', value: '#', if: '$.variables.env == "dev"' } },
          ],
          write: [{ memory: { table: 'big', if: '$.dataset.rowCount > 5' } }, { memory: 'out' }],
        },
        { variables: { env: 'prod' } }
      )

      expect(summary.records.map(r => `${r.kind}:${r.status}`)).toEqual([
        'test:succeeded',
        'uppercase:succeeded',
        'prefix:skipped',
        'memory:skipped',
        'memory:succeeded',
      ])
      expect(summary.records[3].reason).toBe('condition $.dataset.rowCount > 5 is false')
      expect(store.has('big')).toBe(false)
      expect(store.get('out')?.column('name')).toEqual(['A', 'A'])
    })
  })

  describe('cancellation', () => {
    it('stops before reading when already cancelled', async () => {
      const controller = new AbortController()
      controller.abort()

      const summary = await run({ read: [{ test: { values: { a: 1 } } }], write: [{ counting: {} }] }, { signal: controller.signal })

      expect(summary.status).toBe('failed')
      expect(summary.error?.code).toBe('RUN_CANCELLED')
      expect(summary.error?.message).toBe('Run cancelled while validated')
      expect(writes.calls).toBe(0)
    })

    it('stops between steps and never reaches the writes', async () => {
      const controller = new AbortController()
      const registry = registerBuiltinSteps(new StepRegistry(), { memoryStore: store })
      registry.register({
        section: 'wrangles',
        kind: 'cancel',
        schema: { type: 'object', properties: {}, additionalProperties: false },
        errorIsolation: ['skip_step'],
        create: () => ({
          type: 'wrangle',
          granularity: 'dataset',
          apply: dataset => {
            controller.abort()
            return dataset
          },
        }),
      })
      const cancelling = new PipelineExecutor({ registry: registry.freeze(), logger: silentLogger(), metrics })

      const summary = await cancelling.run(
        {
          read: [{ test: { values: { a: 'x' } } }],
          wrangles: [{ cancel: {} }, { uppercase: { column: 'a', on_error: 'skip_step' } }],
          write: [{ memory: 'out' }],
        },
        { signal: controller.signal }
      )

      expect(summary.error?.message).toBe('Run cancelled while transforming')
      expect(summary.records.map(r => r.kind)).toEqual(['test', 'cancel'])
      expect(store.has('out')).toBe(false)
    })
  })

  describe('nested steps', () => {
    beforeEach(() => {
      store.setRecords('items', [
        { name: 'cable', category: 'a', qty: '5' },
        { name: 'plug', category: 'b', qty: '1' },
        { name: 'lamp', category: 'a', qty: '0' },
      ])
    })

    it('runs where children on matching rows only, keeping row order', async () => {
      const summary = await run({
        read: [{ memory: 'items' }],
        wrangles: [{ where: { condition: '$.row.category == "a"', wrangles: [{ uppercase: { column: 'name' } }] } }],
        write: [{ memory: 'out' }],
      })

      expect(summary.status).toBe('completed')
      expect(store.get('out')?.column('name')).toEqual(['CABLE', 'plug', 'LAMP'])
      expect(store.get('out')?.columns).toEqual(['name', 'category', 'qty'])
      expect(summary.records.map(r => r.path)).toEqual(['read[0]', 'wrangles[0].wrangles[0]', 'wrangles[0]', 'write[0]'])
    })

    it('lets where children drop rows', async () => {
      await run({
        read: [{ memory: 'items' }],
        wrangles: [{ where: { condition: '$.row.category == "a"', wrangles: [{ filter: { condition: '$.row.qty > 0' } }] } }],
        write: [{ memory: 'out' }],
      })

      expect(store.get('out')?.column('name')).toEqual(['cable', 'plug'])
    })

    it('runs group children in order', async () => {
      await run({
        read: [{ memory: 'items' }],
        wrangles: [{ group: { wrangles: [{ filter: { column: 'category', equal: 'b' } }, { suffix: { column: 'name', value: '!' } }] } }],
        write: [{ memory: 'out' }],
      })

      expect(store.get('out')?.rows).toEqual([{ name: 'plug!', category: 'b', qty: '1' }])
    })
  })

  describe('reads', () => {
    it('applies read projections and ordering', async () => {
      store.setRecords('people', [
        { name: 'ada', age: 36, city: 'x' },
        { name: 'bob', age: 41, city: 'y' },
      ])

      const summary = await run({ read: [{ memory: { table: 'people', not_columns: 'city', order_by: 'age DESC' } }] })

      expect(summary.dataset?.columns).toEqual(['name', 'age'])
      expect(summary.dataset?.column('name')).toEqual(['bob', 'ada'])
    })

    it('combines sources explicitly with union and join', async () => {
      store.setRecords('left', [{ id: 1, name: 'ada' }])
      store.setRecords('right', [{ id: 1, score: 9 }])

      const unioned = await run({ read: [{ union: { sources: [{ memory: 'left' }, { memory: 'right' }] } }] })
      const joined = await run({
        read: [{ join: { how: 'inner', on: 'id', sources: [{ memory: 'left' }, { memory: { table: 'right', columns: ['id', 'score'] } }] } }],
      })

      expect(unioned.dataset?.columns).toEqual(['id', 'name', 'score'])
      expect(unioned.dataset?.rowCount).toBe(2)
      expect(joined.dataset?.rows).toEqual([{ id: 1, name: 'ada', score: 9 }])
    })

    it('rejects a join without exactly two sources during validation', async () => {
      store.setRecords('left', [{ id: 1 }])

      const summary = await run({ read: [{ join: { on: 'id', sources: [{ memory: 'left' }] } }] })

      expect(summary.error?.code).toBe('SCHEMA_VIOLATION')
      expect(summary.states).toEqual(['loaded', 'failed'])
      expect(summary.violations).toEqual([
        {
          section: 'read',
          path: 'read[0]',
          stepIndex: 0,
          kind: 'join',
          rule: 'invalid_value',
          key: 'sources',
          message: 'sources must NOT have fewer than 2 items',
        },
      ])
    })
  })
})

describe('project', () => {
  it('selects, drops, then orders', () => {
    const dataset = Dataset.fromRecords([
      { a: 2, b: 'x', c: true },
      { a: 1, b: 'y', c: false },
    ])

    const projected = project(dataset, { columns: ['a', 'b'], notColumns: ['b'], orderBy: 'a', onError: 'fail', bestEffort: false })

    expect(projected.rows).toEqual([{ a: 1 }, { a: 2 }])
  })
})
