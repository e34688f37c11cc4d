import { componentLogger } from '~/server/logger'
import { recordWrite } from '~/server/metrics'
import type { ConfigurationObject } from '~/server/flowcontrol/types'

import { setAutoUpdate } from './auto-update'
import type { BootstrapObject } from './bootstrap-object'
import type { ConfigurationAccess } from './configuration-access'
import { AlreadyExistsError, ConflictError, describeError, NotFoundError, ReconcileError } from './errors'
import { createMandatoryEnsureStrategy, createSuggestedEnsureStrategy, type EnsureStrategy } from './strategy'

// A conflicting update is re-read and re-evaluated this many times before the conflict is surfaced.
// Later passes provide eventual convergence.
export const UPDATE_CONFLICT_RETRIES = 1

export type EnsureOutcome = 'created' | 'updated' | 'unchanged' | 'skipped'

export type EnsureResult = {
  name: string
  outcome: EnsureOutcome
}

export type Ensurer<T extends ConfigurationObject> = {
  /**
   * Reconciles the batch in order. The first failure stops the pass and is rethrown as a
   * ReconcileError; objects after it are left for the next call.
   */
  ensure: (bootstrap: readonly BootstrapObject<T>[]) => Promise<EnsureResult[]>
}

export const createEnsurer = <T extends ConfigurationObject>(
  access: ConfigurationAccess<T>,
  strategy: EnsureStrategy<T>,
): Ensurer<T> => {
  const typeName = access.typeName()
  const log = componentLogger('ensurer', { type: typeName, strategy: strategy.name })

  const readCurrent = async (name: string) => {
    try {
      return await access.get(name)
    } catch (error) {
      if (error instanceof NotFoundError) return null
      throw error
    }
  }

  const createMissing = async (bootstrap: T, name: string) => {
    const desired = structuredClone(bootstrap)
    setAutoUpdate(desired, true)
    try {
      await access.create(desired)
    } catch (error) {
      if (error instanceof AlreadyExistsError) {
        log.debug({ name }, 'object appeared after cache read; re-reading')
        return access.get(name)
      }
      throw error
    }
    recordWrite(typeName, 'create', strategy.name)
    log.info({ name }, `created ${typeName}`)
    return null
  }

  const ensureObject = async (bootstrap: T, name: string): Promise<EnsureOutcome> => {
    let current = await readCurrent(name)
    if (!current) {
      current = await createMissing(bootstrap, name)
      if (!current) return 'created'
    }

    for (let attempt = 0; ; attempt += 1) {
      const decision = strategy.reviseIfNeeded(current, bootstrap)
      if (decision.action === 'none') {
        log.debug({ name, reason: decision.reason }, 'no update required')
        return decision.reason === 'auto-update-disabled' ? 'skipped' : 'unchanged'
      }
      try {
        await access.update(decision.object)
        recordWrite(typeName, 'update', strategy.name)
        log.info({ name, specChanged: decision.specChanged }, `updated ${typeName}`)
        return 'updated'
      } catch (error) {
        if (!(error instanceof ConflictError) || attempt >= UPDATE_CONFLICT_RETRIES) {
          throw error
        }
        log.debug({ name, attempt }, 'update conflicted; re-reading')
        current = await access.get(name)
      }
    }
  }

  return {
    ensure: async (batch) => {
      const results: EnsureResult[] = []
      for (const item of batch) {
        try {
          // object() is a fresh deep copy; nothing downstream can touch the template
          const outcome = await ensureObject(item.object(), item.name)
          results.push({ name: item.name, outcome })
        } catch (error) {
          throw new ReconcileError(
            `failed to ensure ${typeName} type=${strategy.name} name="${item.name}": ${describeError(error)}`,
            typeName,
            item.name,
            { cause: error },
          )
        }
      }
      return results
    },
  }
}

export const createSuggestedEnsurer = <T extends ConfigurationObject>(access: ConfigurationAccess<T>) =>
  createEnsurer(access, createSuggestedEnsureStrategy(access))

export const createMandatoryEnsurer = <T extends ConfigurationObject>(access: ConfigurationAccess<T>) =>
  createEnsurer(access, createMandatoryEnsureStrategy(access))
