/**
 * Inference Connector
 * Model-hosting endpoint over HTTP: reference data, training and prediction
 */

import type { CredentialBundle } from '../config/schema'
import { Dataset, type Row } from '../dataset/dataset'
import type { Acknowledgement, Connector, ConnectorLocation } from './connector'
import type { RetryPolicy } from '../config/schema'

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export class HttpError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message)
    this.name = 'HttpError'
  }
}

export type TrainingTask = 'classify' | 'extract' | 'standardize'

export interface InferenceHandle {
  endpoint: string
  apiKey?: string
  modelId?: string
  name?: string
  task: TrainingTask
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function rowsOf(payload: unknown): Row[] {
  const list = isRecord(payload) && Array.isArray(payload.rows) ? payload.rows : payload
  if (!Array.isArray(list)) {
    throw new Error('Inference endpoint returned no rows')
  }
  return list.filter(isRecord)
}

/**
 * InferenceConnector - ML model endpoint
 *
 * Location keys: `endpoint` (or credentials.endpoint), `model_id`, `name`,
 * `task`. Credentials: `apiKey`.
 *
 * - read: the model's reference data
 * - write: submit rows as training data
 * - predict: one prediction per input, used row by row by the predict wrangle
 */
export class InferenceConnector implements Connector<InferenceHandle> {
  readonly name = 'inference'

  constructor(
    private fetchImpl: FetchLike = (input, init) => fetch(input, init),
    readonly retryPolicy?: RetryPolicy
  ) {}

  describe(location: ConnectorLocation): string {
    const endpoint = typeof location.endpoint === 'string' ? location.endpoint.replace(/\/+$/, '') : '<endpoint>'
    return typeof location.model_id === 'string' ? `${endpoint}/models/${location.model_id}` : endpoint
  }

  private async request(handle: InferenceHandle, method: string, path: string, body?: unknown): Promise<unknown> {
    const response = await this.fetchImpl(`${handle.endpoint}${path}`, {
      method,
      headers: {
        'Content-Type': 'application/json',
        ...(handle.apiKey && { Authorization: `Bearer ${handle.apiKey}` }),
      },
      ...(body !== undefined && { body: JSON.stringify(body) }),
    })

    if (!response.ok) {
      const detail = await response.text()
      throw new HttpError(response.status, `Inference API error: ${response.status} - ${detail}`)
    }

    return response.json()
  }

  async open(location: ConnectorLocation, credentials: CredentialBundle = {}): Promise<InferenceHandle> {
    const endpoint = typeof location.endpoint === 'string' ? location.endpoint : credentials.endpoint
    if (typeof endpoint !== 'string' || endpoint === '') {
      throw new Error('inference connector requires an endpoint')
    }
    const handle: InferenceHandle = {
      endpoint: endpoint.replace(/\/+$/, ''),
      apiKey: typeof credentials.apiKey === 'string' ? credentials.apiKey : undefined,
      modelId: typeof location.model_id === 'string' ? location.model_id : undefined,
      name: typeof location.name === 'string' ? location.name : undefined,
      task:
        location.task === 'extract' || location.task === 'standardize' ? location.task : 'classify',
    }

    // Confirms the endpoint is reachable and the model exists
    if (handle.modelId) {
      await this.request(handle, 'GET', `/models/${encodeURIComponent(handle.modelId)}`)
    }
    return handle
  }

  async read(handle: InferenceHandle): Promise<Dataset> {
    if (!handle.modelId) {
      throw new Error('inference read requires a model_id')
    }
    const payload = await this.request(handle, 'GET', `/models/${encodeURIComponent(handle.modelId)}/data`)
    return Dataset.fromRecords(rowsOf(payload))
  }

  async write(handle: InferenceHandle, dataset: Dataset): Promise<Acknowledgement> {
    const path = handle.modelId ? `/models/${encodeURIComponent(handle.modelId)}/train` : '/models'
    const payload = await this.request(handle, 'POST', path, {
      task: handle.task,
      name: handle.name,
      columns: dataset.columns,
      rows: dataset.rows.map(row => dataset.columns.map(column => row[column])),
    })
    const modelId = isRecord(payload) && typeof payload.model_id === 'string' ? payload.model_id : handle.modelId
    return {
      connector: this.name,
      location: `${handle.endpoint}/models/${modelId ?? ''}`,
      rowsWritten: dataset.rowCount,
      details: { task: handle.task, modelId },
    }
  }

  async predict(handle: InferenceHandle, input: unknown): Promise<unknown> {
    if (!handle.modelId) {
      throw new Error('inference predict requires a model_id')
    }
    const payload = await this.request(handle, 'POST', `/models/${encodeURIComponent(handle.modelId)}/predict`, {
      inputs: [input],
    })
    if (!isRecord(payload) || !Array.isArray(payload.outputs) || payload.outputs.length !== 1) {
      throw new Error('Inference endpoint returned a malformed prediction')
    }
    return payload.outputs[0]
  }

  async close(): Promise<void> {
    // Stateless HTTP
  }
}
