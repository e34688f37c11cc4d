import { Effect, pipe } from 'effect'

import { startBootstrapConfigurationLoop } from '~/server/bootstrap-controller'
import { resolveBootstrapSettings } from '~/server/config'
import { loadBootstrapConfiguration } from '~/server/flowcontrol/bootstrap-table'
import { createFlowcontrolStores } from '~/server/kube'
import { logger } from '~/server/logger'
import { BootstrapConfigurationReconciler, makeBootstrapConfigurationLayer } from '~/server/service'

const settings = resolveBootstrapSettings()

const program = Effect.gen(function* () {
  const service = yield* BootstrapConfigurationReconciler
  const loop = startBootstrapConfigurationLoop({
    reconcile: () => Effect.runPromise(service.reconcile()),
    intervalSeconds: settings.intervalSeconds,
  })

  yield* Effect.async<void>((resume) => {
    const shutdown = (signal: NodeJS.Signals) => {
      logger.info({ signal }, 'stopping bootstrap configuration loop')
      loop.stop()
      resume(Effect.void)
    }
    process.once('SIGTERM', shutdown)
    process.once('SIGINT', shutdown)
  })
})

const main = async () => {
  if (!settings.enabled) {
    logger.info('bootstrap configuration reconciliation is disabled')
    return
  }
  const layer = makeBootstrapConfigurationLayer({
    stores: createFlowcontrolStores(),
    configuration: loadBootstrapConfiguration(),
    settings,
  })
  await Effect.runPromise(pipe(program, Effect.provide(layer)))
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'flowcontrol bootstrap failed')
  process.exitCode = 1
})
