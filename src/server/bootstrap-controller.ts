import type { BootstrapObject } from '~/server/ensurer/bootstrap-object'
import { createConfigurationAccess } from '~/server/ensurer/configuration-access'
import { getRemoveCandidates } from '~/server/ensurer/dangling'
import { createMandatoryEnsurer, createSuggestedEnsurer, type EnsureResult } from '~/server/ensurer/ensurer'
import { describeError } from '~/server/ensurer/errors'
import { createRemover } from '~/server/ensurer/remover'
import type { ObjectStore } from '~/server/ensurer/store'
import type { BootstrapConfiguration } from '~/server/flowcontrol/bootstrap-table'
import { flowSchemaKind, priorityLevelConfigurationKind } from '~/server/flowcontrol/kinds'
import type { ConfigurationKind, ConfigurationObject } from '~/server/flowcontrol/types'
import { componentLogger } from '~/server/logger'

export type FlowcontrolStores<S extends ObjectStore = ObjectStore> = {
  flowSchemas: S
  priorityLevelConfigurations: S
}

export type KindSummary = {
  created: number
  updated: number
  unchanged: number
  skipped: number
  deleted: number
}

export type ReconcileSummary = {
  flowSchemas: KindSummary
  priorityLevelConfigurations: KindSummary
}

export type BootstrapReconciler = {
  /** One pass over both kinds; the first failure aborts the pass. */
  reconcile: () => Promise<ReconcileSummary>
}

const emptySummary = (): KindSummary => ({ created: 0, updated: 0, unchanged: 0, skipped: 0, deleted: 0 })

const tally = (summary: KindSummary, results: EnsureResult[]) => {
  for (const result of results) {
    summary[result.outcome] += 1
  }
}

const createKindReconciler = <T extends ConfigurationObject>(
  kind: ConfigurationKind<T>,
  store: ObjectStore,
  removeDangling: boolean,
) => {
  const access = createConfigurationAccess(kind, store)
  const mandatory = createMandatoryEnsurer(access)
  const suggested = createSuggestedEnsurer(access)
  const remover = createRemover(access)

  return {
    ensure: async (
      sets: { mandatory: readonly BootstrapObject<T>[]; suggested: readonly BootstrapObject<T>[] },
      summary: KindSummary,
    ) => {
      tally(summary, await mandatory.ensure(sets.mandatory))
      tally(summary, await suggested.ensure(sets.suggested))
    },
    removeDangling: async (bootstrap: readonly BootstrapObject<T>[], summary: KindSummary) => {
      if (!removeDangling) return
      const candidates = getRemoveCandidates(store.lister, kind.typeName, bootstrap)
      if (candidates.length === 0) return
      const removed = await remover.removeAutoUpdateEnabledObjects(candidates)
      summary.deleted += removed.length
    },
  }
}

export const createBootstrapReconciler = (deps: {
  stores: FlowcontrolStores
  configuration: BootstrapConfiguration
  removeDangling: boolean
}): BootstrapReconciler => {
  const { configuration } = deps
  const priorityLevels = createKindReconciler(
    priorityLevelConfigurationKind,
    deps.stores.priorityLevelConfigurations,
    deps.removeDangling,
  )
  const flowSchemas = createKindReconciler(flowSchemaKind, deps.stores.flowSchemas, deps.removeDangling)

  return {
    reconcile: async () => {
      const summary: ReconcileSummary = {
        flowSchemas: emptySummary(),
        priorityLevelConfigurations: emptySummary(),
      }

      // Priority levels first so flow schemas never reference a missing level.
      await priorityLevels.ensure(
        {
          mandatory: configuration.mandatory.priorityLevelConfigurations,
          suggested: configuration.suggested.priorityLevelConfigurations,
        },
        summary.priorityLevelConfigurations,
      )
      await flowSchemas.ensure(
        { mandatory: configuration.mandatory.flowSchemas, suggested: configuration.suggested.flowSchemas },
        summary.flowSchemas,
      )

      await flowSchemas.removeDangling(
        [...configuration.mandatory.flowSchemas, ...configuration.suggested.flowSchemas],
        summary.flowSchemas,
      )
      await priorityLevels.removeDangling(
        [
          ...configuration.mandatory.priorityLevelConfigurations,
          ...configuration.suggested.priorityLevelConfigurations,
        ],
        summary.priorityLevelConfigurations,
      )

      return summary
    },
  }
}

const log = componentLogger('controller')

export type BootstrapLoopHandle = {
  stop: () => void
}

export const startBootstrapConfigurationLoop = (options: {
  reconcile: () => Promise<ReconcileSummary>
  intervalSeconds: number
}): BootstrapLoopHandle => {
  let stopped = false
  let timeout: ReturnType<typeof setTimeout> | null = null

  const tick = async () => {
    if (stopped) return
    try {
      const summary = await options.reconcile()
      log.info({ summary }, 'bootstrap configuration reconciled')
    } catch (error) {
      log.error({ err: error }, `bootstrap configuration pass failed: ${describeError(error)}`)
    }
    if (stopped) return
    timeout = setTimeout(tick, options.intervalSeconds * 1000)
  }

  void tick()

  return {
    stop: () => {
      stopped = true
      if (timeout) clearTimeout(timeout)
      timeout = null
    },
  }
}
