import { Effect, Either, pipe } from 'effect'
import { beforeEach, describe, expect, it } from 'vitest'

import { loadBootstrapConfiguration } from '~/server/flowcontrol/bootstrap-table'
import { flowSchemaKind, priorityLevelConfigurationKind } from '~/server/flowcontrol/kinds'
import type { FlowSchema, PriorityLevelConfiguration } from '~/server/flowcontrol/types'
import { BootstrapConfigurationReconciler, makeBootstrapConfigurationLayer } from '~/server/service'

import { createFakeStore, type FakeStore } from './fake-store'
import { testTable } from './test-table'

describe('bootstrap configuration layer', () => {
  let flowSchemas: FakeStore<FlowSchema>
  let priorityLevels: FakeStore<PriorityLevelConfiguration>

  const run = (cacheSyncTimeoutSeconds = 30) =>
    Effect.runPromise(
      pipe(
        Effect.flatMap(BootstrapConfigurationReconciler, (service) => service.reconcile()),
        Effect.provide(
          makeBootstrapConfigurationLayer({
            stores: { flowSchemas, priorityLevelConfigurations: priorityLevels },
            configuration: loadBootstrapConfiguration(testTable),
            settings: { removeDangling: true, cacheSyncTimeoutSeconds },
          }),
        ),
        Effect.either,
      ),
    )

  beforeEach(() => {
    flowSchemas = createFakeStore(flowSchemaKind)
    priorityLevels = createFakeStore(priorityLevelConfigurationKind)
  })

  it('starts the caches, reconciles and stops the caches', async () => {
    const result = await run()

    expect(Either.isRight(result)).toBe(true)
    if (Either.isRight(result)) {
      expect(result.right.flowSchemas.created).toBe(2)
      expect(result.right.priorityLevelConfigurations.created).toBe(2)
    }
    expect(flowSchemas.start).toHaveBeenCalledTimes(1)
    expect(priorityLevels.start).toHaveBeenCalledTimes(1)
    expect(flowSchemas.stop).toHaveBeenCalledTimes(1)
    expect(priorityLevels.stop).toHaveBeenCalledTimes(1)
  })

  it('fails when a cache cannot start and still stops the caches', async () => {
    flowSchemas.start.mockRejectedValueOnce(new Error('forbidden'))

    const result = await run()

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.message).toBe('informer caches failed to sync: forbidden')
    }
    expect(flowSchemas.stop).toHaveBeenCalledTimes(1)
    expect(priorityLevels.client.create).not.toHaveBeenCalled()
  })

  it('fails when the caches do not sync in time', async () => {
    flowSchemas.start.mockImplementationOnce(() => new Promise<void>(() => undefined))

    const result = await run(1)

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.message).toBe('informer caches did not sync within 1s')
    }
  })

  it('surfaces reconcile failures as typed errors', async () => {
    priorityLevels.client.create.mockRejectedValueOnce(new Error('connection reset'))

    const result = await run()

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.name).toBe('ReconcileError')
    }
    expect(priorityLevels.stop).toHaveBeenCalledTimes(1)
  })
})
