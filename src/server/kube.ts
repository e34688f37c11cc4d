import { KubeConfig, type KubernetesObject, KubernetesObjectApi, makeInformer } from '@kubernetes/client-node'

import {
  AlreadyExistsError,
  ConflictError,
  NotFoundError,
  StoreUnavailableError,
} from '~/server/ensurer/errors'
import type { ManagedObjectStore } from '~/server/ensurer/store'
import { flowSchemaKind, priorityLevelConfigurationKind } from '~/server/flowcontrol/kinds'
import type { ConfigurationKind, ConfigurationObject } from '~/server/flowcontrol/types'
import { componentLogger } from '~/server/logger'
import { asRecord, asString } from '~/server/records'

const INFORMER_RESTART_DELAY_MS = 2_000

type KindHeader = Pick<ConfigurationKind<ConfigurationObject>, 'apiVersion' | 'kind' | 'typeName' | 'plural'>

export const getKubeStatusCode = (error: unknown): number | null => {
  if (!(error instanceof Error)) return null
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode
  if ('response' in error) {
    const statusCode = asRecord(error.response)?.statusCode
    if (typeof statusCode === 'number') return statusCode
  }
  return null
}

const getKubeStatusReason = (error: unknown) => {
  if (!(error instanceof Error) || !('body' in error)) return null
  return asString(asRecord(error.body)?.reason)
}

const formatKubeError = (error: unknown) => {
  if (!(error instanceof Error)) return String(error)
  const status = getKubeStatusCode(error)
  if (status) return `${error.message} (status=${status})`
  return error.message
}

/** Maps an API server failure onto the reconciler's error taxonomy. */
export const toStoreError = (error: unknown, typeName: string, name: string): Error => {
  const status = getKubeStatusCode(error)
  if (status === 404) return new NotFoundError(typeName, name, { cause: error })
  if (status === 409) {
    if (getKubeStatusReason(error) === 'AlreadyExists') return new AlreadyExistsError(typeName, name, { cause: error })
    return new ConflictError(typeName, name, { cause: error })
  }
  return new StoreUnavailableError(`${typeName} "${name}" request failed: ${formatKubeError(error)}`, { cause: error })
}

export const loadKubeConfig = () => {
  const kubeConfig = new KubeConfig()
  kubeConfig.loadFromDefault()
  return kubeConfig
}

/**
 * Writes go straight to the API server; reads are served by an informer cache that is populated
 * by `start()` and kept current by a watch.
 */
export const createKubeObjectStore = (
  kubeConfig: KubeConfig,
  api: KubernetesObjectApi,
  kind: KindHeader,
): ManagedObjectStore => {
  const log = componentLogger('informer', { type: kind.typeName })
  const informer = makeInformer(kubeConfig, `/apis/${kind.apiVersion}/${kind.plural}`, () =>
    api.list(kind.apiVersion, kind.kind),
  )
  let stopped = false
  let restartTimer: NodeJS.Timeout | null = null

  // List items arrive without apiVersion/kind.
  const withTypeMeta = (object: KubernetesObject): KubernetesObject => ({
    ...object,
    apiVersion: kind.apiVersion,
    kind: kind.kind,
  })

  const header = (name: string): KubernetesObject => ({
    apiVersion: kind.apiVersion,
    kind: kind.kind,
    metadata: { name },
  })

  const nameOf = (object: KubernetesObject) => object.metadata?.name ?? ''

  informer.on('error', (error: unknown) => {
    if (stopped) return
    log.warn({ err: error }, `${kind.typeName} informer failed; restarting`)
    if (restartTimer) clearTimeout(restartTimer)
    restartTimer = setTimeout(() => {
      restartTimer = null
      if (stopped) return
      informer.start().catch((restartError: unknown) => {
        log.error({ err: restartError }, `${kind.typeName} informer restart failed`)
      })
    }, INFORMER_RESTART_DELAY_MS)
  })

  return {
    client: {
      create: async (object, fieldManager) => {
        try {
          const { body } = await api.create(object, undefined, undefined, fieldManager)
          return body
        } catch (error) {
          throw toStoreError(error, kind.typeName, nameOf(object))
        }
      },
      replace: async (object, fieldManager) => {
        try {
          const { body } = await api.replace(object, undefined, undefined, fieldManager)
          return body
        } catch (error) {
          throw toStoreError(error, kind.typeName, nameOf(object))
        }
      },
      delete: async (name, preconditions) => {
        try {
          await api.delete(header(name), undefined, undefined, undefined, undefined, undefined, { preconditions })
        } catch (error) {
          throw toStoreError(error, kind.typeName, name)
        }
      },
    },
    lister: {
      get: (name) => {
        const cached = informer.get(name)
        return cached ? withTypeMeta(cached) : undefined
      },
      list: () => informer.list().map(withTypeMeta),
    },
    start: async () => {
      stopped = false
      await informer.start()
    },
    stop: async () => {
      stopped = true
      if (restartTimer) clearTimeout(restartTimer)
      restartTimer = null
      await informer.stop()
    },
  }
}

export const createFlowcontrolStores = (kubeConfig: KubeConfig = loadKubeConfig()) => {
  const api = KubernetesObjectApi.makeApiClient(kubeConfig)
  return {
    flowSchemas: createKubeObjectStore(kubeConfig, api, flowSchemaKind),
    priorityLevelConfigurations: createKubeObjectStore(kubeConfig, api, priorityLevelConfigurationKind),
  }
}
