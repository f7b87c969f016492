/**
 * Connector capability - uniform read/write over external systems
 *
 * Files, databases, object stores and inference endpoints all implement the
 * same four operations. Steps reach them only through `withConnection`, which
 * guarantees `close` runs exactly once per opened handle.
 */

import type { Logger } from 'pino'
import type { CredentialBundle, RetryPolicy } from '../config/schema'
import type { Dataset } from '../dataset/dataset'
import { ConnectionError, ConnectorIOError, RecipeError } from '../errors'
import { NO_RETRY, RetryExhaustedError, isTransientError, withRetry } from './retry'

export type ConnectorLocation = Readonly<Record<string, unknown>>

export interface Acknowledgement {
  connector: string
  location: string
  rowsWritten: number
  details?: Record<string, unknown>
}

export interface Connector<THandle> {
  readonly name: string
  /** Retry policy applied to `open`; none when absent */
  readonly retryPolicy?: RetryPolicy
  isRetryable?(error: unknown): boolean
  /** Human-readable location for diagnostics; must not include credentials */
  describe(location: ConnectorLocation): string
  open(location: ConnectorLocation, credentials?: CredentialBundle): Promise<THandle>
  read(handle: THandle): Promise<Dataset>
  write(handle: THandle, dataset: Dataset): Promise<Acknowledgement>
  close(handle: THandle): Promise<void>
}

export interface ConnectionOptions {
  logger?: Logger
  signal?: AbortSignal
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

async function openHandle<THandle>(
  connector: Connector<THandle>,
  location: ConnectorLocation,
  credentials: CredentialBundle | undefined,
  options: ConnectionOptions
): Promise<THandle> {
  const where = connector.describe(location)
  try {
    const { value, attempts } = await withRetry(
      () => connector.open(location, credentials),
      connector.retryPolicy ?? NO_RETRY,
      error => (connector.isRetryable ? connector.isRetryable(error) : isTransientError(error)),
      options.signal
    )
    if (attempts > 1) {
      options.logger?.info({ connector: connector.name, location: where, attempts }, 'Connection opened after retries')
    }
    return value
  } catch (error) {
    const attempts = error instanceof RetryExhaustedError ? error.attempts : 1
    const cause = error instanceof RetryExhaustedError ? error.lastError : error
    if (cause instanceof ConnectionError) throw cause
    throw new ConnectionError(
      `Could not open ${connector.name} connection to ${where} after ${attempts} attempt(s): ${messageOf(cause)}`,
      connector.name,
      attempts,
      { cause }
    )
  }
}

function toIOError(error: unknown, connector: string, where: string): RecipeError {
  if (error instanceof RecipeError) return error
  return new ConnectorIOError(`${connector} I/O failed at ${where}: ${messageOf(error)}`, connector, where, undefined, {
    cause: error,
  })
}

/**
 * Scoped acquisition: open (with the connector's retry policy), use, close.
 *
 * - open failures surface as one terminal ConnectionError
 * - failures inside `use` surface as ConnectorIOError unless already typed
 * - `close` runs exactly once whenever `open` succeeded; a close failure
 *   after a successful `use` fails the operation, after a failed one it is
 *   logged and the original error wins
 */
export async function withConnection<THandle, T>(
  connector: Connector<THandle>,
  location: ConnectorLocation,
  credentials: CredentialBundle | undefined,
  use: (handle: THandle) => Promise<T>,
  options: ConnectionOptions = {}
): Promise<T> {
  const where = connector.describe(location)
  const handle = await openHandle(connector, location, credentials, options)

  let result: T
  try {
    result = await use(handle)
  } catch (error) {
    try {
      await connector.close(handle)
    } catch (closeError) {
      options.logger?.warn(
        { connector: connector.name, location: where, err: closeError },
        'Close failed after an I/O error'
      )
    }
    throw toIOError(error, connector.name, where)
  }

  try {
    await connector.close(handle)
  } catch (closeError) {
    throw new ConnectorIOError(
      `${connector.name} close failed at ${where}: ${messageOf(closeError)}`,
      connector.name,
      where,
      undefined,
      { cause: closeError }
    )
  }
  return result
}

export interface ConnectionLease<THandle> {
  readonly handle: THandle
  /** Run an operation on the handle; its failures surface as ConnectorIOError */
  use<T>(operation: (handle: THandle) => Promise<T>): Promise<T>
  /** Close the handle; later calls do nothing */
  release(): Promise<void>
}

/**
 * Acquisition for handles that outlive a single call, such as a row-granular
 * step holding one connection across its rows. The holder must call
 * `release`, normally from a `finally`.
 */
export async function acquireConnection<THandle>(
  connector: Connector<THandle>,
  location: ConnectorLocation,
  credentials: CredentialBundle | undefined,
  options: ConnectionOptions = {}
): Promise<ConnectionLease<THandle>> {
  const where = connector.describe(location)
  const handle = await openHandle(connector, location, credentials, options)
  let released = false
  return {
    handle,
    async use(operation) {
      try {
        return await operation(handle)
      } catch (error) {
        throw toIOError(error, connector.name, where)
      }
    },
    async release() {
      if (released) return
      released = true
      try {
        await connector.close(handle)
      } catch (closeError) {
        throw new ConnectorIOError(
          `${connector.name} close failed at ${where}: ${messageOf(closeError)}`,
          connector.name,
          where,
          undefined,
          { cause: closeError }
        )
      }
    },
  }
}

export function readFrom<THandle>(
  connector: Connector<THandle>,
  location: ConnectorLocation,
  credentials: CredentialBundle | undefined,
  options: ConnectionOptions = {}
): Promise<Dataset> {
  return withConnection(connector, location, credentials, handle => connector.read(handle), options)
}

export function writeTo<THandle>(
  connector: Connector<THandle>,
  location: ConnectorLocation,
  dataset: Dataset,
  credentials: CredentialBundle | undefined,
  options: ConnectionOptions = {}
): Promise<Acknowledgement> {
  return withConnection(connector, location, credentials, handle => connector.write(handle, dataset), options)
}
