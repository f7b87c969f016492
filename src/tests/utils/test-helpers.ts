import pino from 'pino'
import type { Logger } from 'pino'
import { mkdtempSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { InMemoryMetrics } from '../../observability'
import { Dataset, type Row } from '../../dataset/dataset'
import { PipelineExecutor, type RunOptions } from '../../pipeline/pipeline-executor'
import type { RecipeDocument } from '../../recipe/types'
import type { StepRegistryView } from '../../registry/step-registry'
import type { RunSummary } from '../../reporting/result-reporter'

export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}

/**
 * Logger keeping every entry as a parsed object
 */
export function capturingLogger(): { logger: Logger; entries: Record<string, unknown>[] } {
  const entries: Record<string, unknown>[] = []
  const logger = pino(
    { level: 'debug' },
    {
      write: (line: string) => {
        const entry: unknown = JSON.parse(line)
        if (typeof entry === 'object' && entry !== null) entries.push({ ...entry })
      },
    }
  )
  return { logger, entries }
}

/**
 * Clock advancing by `stepMs` on every read, starting at a fixed instant
 */
export function steppingClock(stepMs = 5, start = Date.UTC(2024, 0, 1)): () => Date {
  let now = start
  return () => {
    const current = new Date(now)
    now += stepMs
    return current
  }
}

export function freshMetrics(): InMemoryMetrics {
  return new InMemoryMetrics()
}

export interface TempDir {
  path: string
  file(name: string): string
  cleanup(): void
}

export function createTempDir(prefix = 'recipeflow-test-'): TempDir {
  const path = mkdtempSync(join(tmpdir(), prefix))
  return {
    path,
    file: name => join(path, name),
    cleanup: () => rmSync(path, { recursive: true, force: true }),
  }
}

/**
 * Run a wrangle list over in-memory rows with no reads or writes
 */
export async function runWrangles(
  registry: StepRegistryView,
  records: Row[],
  wrangles: unknown[],
  options: RunOptions = {}
): Promise<RunSummary> {
  const executor = new PipelineExecutor({ registry, logger: silentLogger(), metrics: freshMetrics() })
  return executor.run({ wrangles }, { dataset: Dataset.fromRecords(records), ...options })
}

/**
 * Run a whole recipe document against a registry
 */
export async function runRecipe(
  registry: StepRegistryView,
  document: RecipeDocument,
  options: RunOptions = {}
): Promise<RunSummary> {
  const executor = new PipelineExecutor({ registry, logger: silentLogger(), metrics: freshMetrics() })
  return executor.run(document, options)
}
