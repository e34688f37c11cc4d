import { type Attributes, type Counter, metrics } from '@opentelemetry/api'

import { componentLogger } from '~/server/logger'

export type WriteOperation = 'create' | 'update' | 'delete'

const log = componentLogger('metrics')

let writesCounter: Counter | null = null

const getWritesCounter = () => {
  if (writesCounter) return writesCounter
  const meter = metrics.getMeter('flowcontrol-bootstrap')
  writesCounter = meter.createCounter('flowcontrol_bootstrap_writes_total', {
    description: 'Count of bootstrap configuration writes issued against the API server.',
  })
  return writesCounter
}

export const recordWrite = (type: string, operation: WriteOperation, strategy?: string) => {
  const attributes: Attributes = { type, operation }
  if (strategy) attributes.strategy = strategy
  try {
    getWritesCounter().add(1, attributes)
  } catch (error) {
    log.debug({ err: error, type, operation }, 'failed to record write metric')
  }
}
