import { describe, it, expect } from 'vitest'
import { Dataset } from '../../dataset/dataset'
import { StepExecutionError } from '../../errors'
import { ResultReporter } from '../../reporting/result-reporter'
import { steppingClock } from '../utils/test-helpers'

const step = { stepIndex: 0, path: 'wrangles[0]', section: 'wrangles' as const, kind: 'uppercase' }

describe('ResultReporter', () => {
  it('times each step with the injected clock', () => {
    const reporter = new ResultReporter('run-1', steppingClock(5))
    reporter.transition('loaded')

    const record = reporter.begin(step).finish({ status: 'succeeded' })

    expect(record).toEqual({
      stepIndex: 0,
      path: 'wrangles[0]',
      section: 'wrangles',
      kind: 'uppercase',
      status: 'succeeded',
      startedAt: '2024-01-01T00:00:00.005Z',
      durationMs: 5,
    })
  })

  it('refuses to finish a record twice', () => {
    const pending = new ResultReporter('run-1', steppingClock()).begin(step)
    pending.finish({ status: 'skipped', reason: 'condition false' })

    expect(() => pending.finish({ status: 'failed' })).toThrow('Execution record for wrangles[0] already finalised')
  })

  it('summarises a completed run with its dataset', () => {
    const reporter = new ResultReporter('run-1', steppingClock(5))
    reporter.transition('loaded')
    reporter.transition('completed')
    reporter.recordWrite({ connector: 'memory', location: 'memory://out', rowsWritten: 1 })
    const dataset = Dataset.fromRecords([{ a: 1 }])

    const summary = reporter.summarize({ dataset })

    expect(summary.status).toBe('completed')
    expect(summary.states).toEqual(['loaded', 'completed'])
    expect(summary.durationMs).toBe(5)
    expect(summary.dataset).toBe(dataset)
    expect(summary.writes).toEqual([{ connector: 'memory', location: 'memory://out', rowsWritten: 1 }])
    expect(Object.isFrozen(summary.writes[0])).toBe(true)
  })

  it('serialises the failure and leaves the dataset out', () => {
    const reporter = new ResultReporter('run-1', steppingClock())
    const error = new StepExecutionError('uppercase at wrangles[0] failed: boom', {
      path: 'wrangles[0]',
      stepIndex: 0,
      kind: 'uppercase',
    })
    reporter.begin(step).finish({ status: 'failed', error })

    const summary = reporter.summarize({ error, dataset: Dataset.empty() })

    expect(summary.status).toBe('failed')
    expect(summary.dataset).toBeUndefined()
    expect(summary.error).toEqual({
      name: 'StepExecutionError',
      code: 'STEP_EXECUTION',
      message: 'uppercase at wrangles[0] failed: boom',
      details: { path: 'wrangles[0]', stepIndex: 0, kind: 'uppercase' },
    })
    expect(summary.records[0].error?.code).toBe('STEP_EXECUTION')
  })
})
