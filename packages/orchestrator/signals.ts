/**
 * Checkpoint on interruption
 *
 * SIGINT/SIGTERM during an enrichment run write one last best-effort
 * checkpoint, then exit with status 130.
 */

import type { CheckpointHandle } from '../core/types.js'

export const STOP_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM']

/** Exit status after an interrupted run */
export const INTERRUPTED_EXIT_CODE = 130

export interface Checkpointer {
  checkpoint(reason?: string): Promise<CheckpointHandle | null>
}

/** Where stop signals are received; `process` unless given */
export interface SignalSource {
  once(signal: NodeJS.Signals, listener: () => void): unknown
  off(signal: NodeJS.Signals, listener: () => void): unknown
}

export interface CheckpointOnSignalOptions {
  log?: (message: string) => void
  exit?: (code: number) => void
  source?: SignalSource
}

/**
 * Install one-shot stop signal handlers
 * @returns Function removing the handlers that have not fired
 */
export function checkpointOnSignal(coordinator: Checkpointer, options: CheckpointOnSignalOptions = {}): () => void {
  const source = options.source ?? process
  const exit = options.exit ?? ((code: number) => process.exit(code))

  const installed = STOP_SIGNALS.map(signal => {
    const handler = (): void => {
      options.log?.(`Received ${signal}, writing checkpoint before exit`)
      void coordinator.checkpoint(signal).finally(() => exit(INTERRUPTED_EXIT_CODE))
    }
    source.once(signal, handler)
    return { signal, handler }
  })

  return () => {
    for (const { signal, handler } of installed) source.off(signal, handler)
  }
}
