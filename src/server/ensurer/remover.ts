import { componentLogger } from '~/server/logger'
import { recordWrite } from '~/server/metrics'
import type { ConfigurationObject } from '~/server/flowcontrol/types'

import { readAutoUpdate } from './auto-update'
import type { ConfigurationAccess } from './configuration-access'
import { describeError, NotFoundError, ReconcileError } from './errors'

export type Remover = {
  /**
   * Deletes each named object that still has auto-update enabled and returns the names actually
   * deleted. Missing objects count as removed; a failed precondition is surfaced, never retried.
   */
  removeAutoUpdateEnabledObjects: (names: readonly string[]) => Promise<string[]>
}

export const createRemover = <T extends ConfigurationObject>(access: ConfigurationAccess<T>): Remover => {
  const typeName = access.typeName()
  const log = componentLogger('remover', { type: typeName })

  const removeObject = async (name: string) => {
    let current: T
    try {
      current = await access.get(name)
    } catch (error) {
      if (error instanceof NotFoundError) return false
      throw error
    }

    const setting = readAutoUpdate(current)
    if (setting === 'disabled') {
      log.info({ name }, `skipping deletion of ${typeName}: auto-update is disabled`)
      return false
    }
    if (setting === 'invalid') {
      log.warn({ name }, `skipping deletion of ${typeName}: auto-update annotation is not a boolean`)
      return false
    }

    try {
      await access.delete(name, {
        uid: current.metadata.uid,
        resourceVersion: current.metadata.resourceVersion,
      })
    } catch (error) {
      if (error instanceof NotFoundError) return false
      throw error
    }
    recordWrite(typeName, 'delete')
    log.info({ name }, `deleted ${typeName}`)
    return true
  }

  return {
    removeAutoUpdateEnabledObjects: async (names) => {
      const removed: string[] = []
      for (const name of names) {
        try {
          if (await removeObject(name)) removed.push(name)
        } catch (error) {
          throw new ReconcileError(
            `failed to delete ${typeName} name="${name}", will retry later: ${describeError(error)}`,
            typeName,
            name,
            { cause: error },
          )
        }
      }
      return removed
    },
  }
}
