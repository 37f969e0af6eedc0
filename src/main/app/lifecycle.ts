import { logger } from '@infra/logging'
import type { SecurityCore } from './bootstrap'

type SignalListener = (signal: NodeJS.Signals) => void

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: SignalListener): unknown
  off(signal: NodeJS.Signals, listener: SignalListener): unknown
}

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']

export function registerProcessSignalHandlers(
  core: Pick<SecurityCore, 'close'>,
  source: SignalSource = process
): () => void {
  const handleSignal = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, shutting down`)
    core.close().catch((error: unknown) => {
      logger.error('Error closing security core during shutdown', error)
    })
  }

  for (const signal of SHUTDOWN_SIGNALS) source.on(signal, handleSignal)

  return () => {
    for (const signal of SHUTDOWN_SIGNALS) source.off(signal, handleSignal)
  }
}
