/**
 * Result Reporter - per-step execution records and the final run summary
 *
 * Records are appended in execution order and frozen when finalised. The
 * summary is deep-frozen; presenting it is left to the caller.
 */

import type { Acknowledgement } from '../connectors/connector'
import type { Dataset } from '../dataset/dataset'
import type { RecipeSection, SchemaViolation, SerializedError } from '../errors'
import { serializeError } from '../errors'

export type StepStatus = 'succeeded' | 'failed' | 'skipped'

export type PipelineState = 'loaded' | 'validated' | 'reading' | 'transforming' | 'writing' | 'completed' | 'failed'

export interface RowError {
  rowIndex: number
  message: string
}

export interface ExecutionRecord {
  stepIndex: number
  path: string
  section: RecipeSection
  kind: string
  status: StepStatus
  startedAt: string
  durationMs: number
  error?: SerializedError
  /** Why a step was skipped without an error, e.g. its condition was false */
  reason?: string
  skippedRows?: number
  rowErrors?: RowError[]
}

export interface RunSummary {
  runId: string
  status: 'completed' | 'failed'
  states: PipelineState[]
  startedAt: string
  finishedAt: string
  durationMs: number
  records: ExecutionRecord[]
  /** Final dataset on success */
  dataset?: Dataset
  writes: Acknowledgement[]
  error?: SerializedError
  violations?: SchemaViolation[]
}

export interface RecordOutcome {
  status: StepStatus
  error?: unknown
  reason?: string
  skippedRows?: number
  rowErrors?: RowError[]
}

/**
 * Handle for a step in progress
 */
export interface PendingRecord {
  finish(outcome: RecordOutcome): ExecutionRecord
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) deepFreeze(child)
  }
  return value
}

export class ResultReporter {
  private records: ExecutionRecord[] = []
  private writes: Acknowledgement[] = []
  private states: PipelineState[] = []
  private readonly startedAt: Date

  constructor(
    private runId: string,
    private clock: () => Date = () => new Date()
  ) {
    this.startedAt = this.clock()
  }

  transition(state: PipelineState): void {
    this.states.push(state)
  }

  get currentState(): PipelineState | undefined {
    return this.states[this.states.length - 1]
  }

  /**
   * Open a record when a step begins; it joins the log when finished
   */
  begin(step: { stepIndex: number; path: string; section: RecipeSection; kind: string }): PendingRecord {
    const started = this.clock()
    let finished = false
    return {
      finish: outcome => {
        if (finished) {
          throw new Error(`Execution record for ${step.path} already finalised`)
        }
        finished = true
        const record: ExecutionRecord = {
          stepIndex: step.stepIndex,
          path: step.path,
          section: step.section,
          kind: step.kind,
          status: outcome.status,
          startedAt: started.toISOString(),
          durationMs: this.clock().getTime() - started.getTime(),
          ...(outcome.error !== undefined && { error: serializeError(outcome.error) }),
          ...(outcome.reason !== undefined && { reason: outcome.reason }),
          ...(outcome.skippedRows !== undefined && { skippedRows: outcome.skippedRows }),
          ...(outcome.rowErrors !== undefined && { rowErrors: outcome.rowErrors }),
        }
        this.records.push(Object.freeze(record))
        return record
      },
    }
  }

  recordWrite(ack: Acknowledgement): void {
    this.writes.push(ack)
  }

  get executionRecords(): readonly ExecutionRecord[] {
    return this.records
  }

  /**
   * Produce the immutable run summary
   */
  summarize(result: { dataset?: Dataset; error?: unknown; violations?: SchemaViolation[] }): RunSummary {
    const finished = this.clock()
    const failed = result.error !== undefined
    // Dataset is already immutable; keep it out of the deep freeze walk
    const summary: RunSummary = {
      runId: this.runId,
      status: failed ? 'failed' : 'completed',
      states: [...this.states],
      startedAt: this.startedAt.toISOString(),
      finishedAt: finished.toISOString(),
      durationMs: finished.getTime() - this.startedAt.getTime(),
      records: [...this.records],
      writes: this.writes.map(ack => ({ ...ack })),
      ...(failed && { error: serializeError(result.error) }),
      ...(result.violations && { violations: result.violations.map(v => ({ ...v })) }),
    }
    deepFreeze(summary)
    return !failed && result.dataset ? Object.freeze({ ...summary, dataset: result.dataset }) : summary
  }
}
