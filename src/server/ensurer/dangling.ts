import type { KubernetesObject } from '@kubernetes/client-node'

import { type ConfigurationObject, FIELD_MANAGER } from '~/server/flowcontrol/types'

import { hasAutoUpdateAnnotation } from './auto-update'
import { type BootstrapObject, bootstrapNames } from './bootstrap-object'
import type { ObjectLister } from './store'

export const isSystemOwned = (object: KubernetesObject) => {
  if (hasAutoUpdateAnnotation(object)) return true
  return (object.metadata?.managedFields ?? []).some((entry) => entry.manager === FIELD_MANAGER)
}

/**
 * Names of system-owned live objects that are no longer part of the bootstrap set, in the order
 * the live objects were given.
 */
export const computeDanglingObjectNames = (
  liveObjects: readonly KubernetesObject[],
  names: ReadonlySet<string>,
): string[] => {
  const candidates: string[] = []
  for (const object of liveObjects) {
    const name = object.metadata?.name
    if (!name || names.has(name)) continue
    if (!isSystemOwned(object)) continue
    candidates.push(name)
  }
  return candidates
}

export const getRemoveCandidates = <T extends ConfigurationObject>(
  lister: ObjectLister,
  typeName: string,
  bootstrap: readonly BootstrapObject<T>[],
) => {
  let liveObjects: readonly KubernetesObject[]
  try {
    liveObjects = lister.list()
  } catch (error) {
    throw new Error(`failed to list ${typeName}`, { cause: error })
  }
  return computeDanglingObjectNames(liveObjects, bootstrapNames(bootstrap))
}
