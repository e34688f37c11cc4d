import type { KubernetesObject } from '@kubernetes/client-node'

export type DeletePreconditions = {
  uid?: string
  resourceVersion?: string
}

/**
 * Write path of the object store. Implementations map store failures onto NotFoundError,
 * AlreadyExistsError, ConflictError and StoreUnavailableError.
 */
export type ObjectClient = {
  create: (object: KubernetesObject, fieldManager: string) => Promise<KubernetesObject>
  replace: (object: KubernetesObject, fieldManager: string) => Promise<KubernetesObject>
  delete: (name: string, preconditions: DeletePreconditions) => Promise<void>
}

// Read path, served from a local cache that may lag recent writes.
export type ObjectLister = {
  get: (name: string) => KubernetesObject | undefined
  list: () => readonly KubernetesObject[]
}

export type ObjectStore = {
  client: ObjectClient
  lister: ObjectLister
}

export type ManagedObjectStore = ObjectStore & {
  start: () => Promise<void>
  stop: () => Promise<void>
}
