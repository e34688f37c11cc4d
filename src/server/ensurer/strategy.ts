import type { ConfigurationObject } from '~/server/flowcontrol/types'

import { readAutoUpdate, setAutoUpdate } from './auto-update'
import type { ConfigurationAccess } from './configuration-access'

export type EnsureStrategyName = 'suggested' | 'mandatory'

export type EnsureDecision<T extends ConfigurationObject> =
  | { action: 'none'; reason: 'auto-update-disabled' | 'up-to-date' }
  | { action: 'update'; object: T; specChanged: boolean }

/**
 * Decides, for one live object and its bootstrap counterpart, whether the live object must be
 * rewritten. Stateless: everything it needs is on the two objects.
 */
export type EnsureStrategy<T extends ConfigurationObject> = {
  name: EnsureStrategyName
  reviseIfNeeded: (current: T, bootstrap: T) => EnsureDecision<T>
}

// Respects operator intent: an explicit "false" annotation freezes the object.
export const createSuggestedEnsureStrategy = <T extends ConfigurationObject>(
  access: ConfigurationAccess<T>,
): EnsureStrategy<T> => ({
  name: 'suggested',
  reviseIfNeeded: (current, bootstrap) => {
    if (readAutoUpdate(current) === 'disabled') {
      return { action: 'none', reason: 'auto-update-disabled' }
    }
    if (!access.hasSpecChanged(bootstrap, current)) {
      return { action: 'none', reason: 'up-to-date' }
    }
    const revised = structuredClone(current)
    access.copySpec(bootstrap, revised)
    setAutoUpdate(revised, true)
    return { action: 'update', object: revised, specChanged: true }
  },
})

// Spec and annotation are forced back on every pass, whatever the annotation says.
export const createMandatoryEnsureStrategy = <T extends ConfigurationObject>(
  access: ConfigurationAccess<T>,
): EnsureStrategy<T> => ({
  name: 'mandatory',
  reviseIfNeeded: (current, bootstrap) => {
    const revised = structuredClone(current)
    const specChanged = access.hasSpecChanged(bootstrap, current)
    if (specChanged) {
      access.copySpec(bootstrap, revised)
    }
    // Absent counts as not enabled, so an unannotated mandatory object is stamped "true" once.
    const annotationChanged = readAutoUpdate(current) !== 'enabled'
    if (annotationChanged) {
      setAutoUpdate(revised, true)
    }
    if (!specChanged && !annotationChanged) {
      return { action: 'none', reason: 'up-to-date' }
    }
    return { action: 'update', object: revised, specChanged }
  },
})
