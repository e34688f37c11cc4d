import { Context, Duration, Effect, Layer, pipe } from 'effect'

import {
  type BootstrapReconciler,
  createBootstrapReconciler,
  type FlowcontrolStores,
  type ReconcileSummary,
} from '~/server/bootstrap-controller'
import type { BootstrapSettings } from '~/server/config'
import type { ManagedObjectStore } from '~/server/ensurer/store'
import type { BootstrapConfiguration } from '~/server/flowcontrol/bootstrap-table'
import { componentLogger } from '~/server/logger'

export type BootstrapConfigurationService = {
  reconcile: () => Effect.Effect<ReconcileSummary, Error>
}

export class BootstrapConfigurationReconciler extends Context.Tag('BootstrapConfigurationReconciler')<
  BootstrapConfigurationReconciler,
  BootstrapConfigurationService
>() {}

const normalizeError = (message: string, error: unknown) =>
  new Error(`${message}: ${error instanceof Error ? error.message : String(error)}`, { cause: error })

export const makeBootstrapConfigurationLayer = (options: {
  stores: FlowcontrolStores<ManagedObjectStore>
  configuration: BootstrapConfiguration
  settings: Pick<BootstrapSettings, 'removeDangling' | 'cacheSyncTimeoutSeconds'>
}) =>
  Layer.scoped(
    BootstrapConfigurationReconciler,
    Effect.gen(function* () {
      const stores = [options.stores.priorityLevelConfigurations, options.stores.flowSchemas]

      yield* Effect.addFinalizer(() =>
        pipe(
          Effect.tryPromise({
            try: () => Promise.all(stores.map((store) => store.stop())),
            catch: (error) => normalizeError('stop informer caches', error),
          }),
          Effect.catchAll((error) => {
            componentLogger('informer').warn({ err: error }, 'failed to stop informer caches')
            return Effect.void
          }),
        ),
      )

      const timeoutSeconds = options.settings.cacheSyncTimeoutSeconds
      yield* pipe(
        Effect.tryPromise({
          try: () => Promise.all(stores.map((store) => store.start())),
          catch: (error) => normalizeError('informer caches failed to sync', error),
        }),
        Effect.timeoutFail({
          duration: Duration.seconds(timeoutSeconds),
          onTimeout: () => new Error(`informer caches did not sync within ${timeoutSeconds}s`),
        }),
      )

      const reconciler: BootstrapReconciler = createBootstrapReconciler({
        stores: options.stores,
        configuration: options.configuration,
        removeDangling: options.settings.removeDangling,
      })

      const service: BootstrapConfigurationService = {
        reconcile: () =>
          Effect.tryPromise({
            try: () => reconciler.reconcile(),
            catch: (error) => (error instanceof Error ? error : new Error(String(error))),
          }),
      }

      return service
    }),
  )
