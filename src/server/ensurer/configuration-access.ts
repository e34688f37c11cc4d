import { semanticEqual } from '~/server/canonical-json'
import {
  type ConfigurationKind,
  type ConfigurationObject,
  describeKind,
  FIELD_MANAGER,
} from '~/server/flowcontrol/types'

import { KindMismatchError, NotFoundError } from './errors'
import type { DeletePreconditions, ObjectStore } from './store'

/**
 * Capability set the reconciler uses to manipulate one kind of configuration object without
 * knowing its schema. Methods taking objects reject any other kind with KindMismatchError.
 */
export type ConfigurationAccess<T extends ConfigurationObject> = {
  typeName: () => string
  create: (object: ConfigurationObject) => Promise<T>
  /** Optimistic: `object.metadata.resourceVersion` must be the version that was read. */
  update: (object: ConfigurationObject) => Promise<T>
  /** Reads through the cache and returns a private copy. */
  get: (name: string) => Promise<T>
  delete: (name: string, preconditions: DeletePreconditions) => Promise<void>
  copySpec: (bootstrap: ConfigurationObject, current: ConfigurationObject) => void
  hasSpecChanged: (bootstrap: ConfigurationObject, current: ConfigurationObject) => boolean
}

export const createConfigurationAccess = <T extends ConfigurationObject>(
  kind: ConfigurationKind<T>,
  store: ObjectStore,
): ConfigurationAccess<T> => {
  const expectKind = (value: unknown): T => {
    if (!kind.is(value)) {
      throw new KindMismatchError(kind.typeName, describeKind(value))
    }
    return value
  }

  return {
    typeName: () => kind.typeName,
    create: async (object) => expectKind(await store.client.create(expectKind(object), FIELD_MANAGER)),
    update: async (object) => expectKind(await store.client.replace(expectKind(object), FIELD_MANAGER)),
    get: async (name) => {
      const cached = store.lister.get(name)
      if (!cached) {
        throw new NotFoundError(kind.typeName, name)
      }
      return structuredClone(expectKind(cached))
    },
    delete: (name, preconditions) => store.client.delete(name, preconditions),
    copySpec: (bootstrap, current) => {
      const source = expectKind(bootstrap)
      const target = expectKind(current)
      target.spec = structuredClone(source.spec)
    },
    hasSpecChanged: (bootstrap, current) => {
      const expected = kind.defaultSpec(structuredClone(expectKind(bootstrap).spec))
      return !semanticEqual(expected, expectKind(current).spec)
    },
  }
}
