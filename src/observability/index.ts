import pino from 'pino'
import type { Logger } from 'pino'

/**
 * Observability - structured logging and run metrics
 *
 * - Structured JSON logging via Pino
 * - Run ID propagation through child loggers
 * - Step counters and timings
 */

export type { Logger }

export interface Metrics {
  increment(name: string, value?: number, labels?: Record<string, string>): void
  gauge(name: string, value: number, labels?: Record<string, string>): void
  timing(name: string, durationMs: number, labels?: Record<string, string>): void
}

export class InMemoryMetrics implements Metrics {
  private counters = new Map<string, number>()
  private gauges = new Map<string, number>()

  increment(name: string, value: number = 1, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels)
    this.counters.set(key, (this.counters.get(key) || 0) + value)
  }

  gauge(name: string, value: number, labels?: Record<string, string>): void {
    this.gauges.set(this.makeKey(name, labels), value)
  }

  timing(name: string, durationMs: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels)
    this.counters.set(key, (this.counters.get(key) || 0) + durationMs)
  }

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels) return name
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',')
    return `${name}{${labelStr}}`
  }

  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, labels)) || 0
  }

  getGauge(name: string, labels?: Record<string, string>): number {
    return this.gauges.get(this.makeKey(name, labels)) || 0
  }

  reset(): void {
    this.counters.clear()
    this.gauges.clear()
  }
}

export interface ObservabilityOptions {
  pretty?: boolean
  level?: string
}

/**
 * Observability singleton - global logger and metrics
 */
export class Observability {
  private static instance: Observability | undefined

  public logger: Logger
  public metrics: InMemoryMetrics

  private constructor(options?: ObservabilityOptions) {
    this.logger = pino({
      name: 'recipeflow',
      level: options?.level || process.env.RECIPEFLOW_LOG_LEVEL || 'info',
      ...(options?.pretty && {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
      }),
    })

    this.metrics = new InMemoryMetrics()
  }

  static getInstance(options?: ObservabilityOptions): Observability {
    if (!Observability.instance) {
      Observability.instance = new Observability(options)
    } else if (options?.level) {
      Observability.instance.logger.level = options.level
    }
    return Observability.instance
  }

  getMetrics(): InMemoryMetrics {
    return this.metrics
  }
}
