import type { KubernetesObject } from '@kubernetes/client-node'

import { AUTO_UPDATE_ANNOTATION_KEY, type ConfigurationObject } from '~/server/flowcontrol/types'

export type AutoUpdateSetting = 'enabled' | 'disabled' | 'absent' | 'invalid'

export const readAutoUpdate = (object: KubernetesObject): AutoUpdateSetting => {
  const value = object.metadata?.annotations?.[AUTO_UPDATE_ANNOTATION_KEY]
  if (value === undefined) return 'absent'
  const normalized = value.trim().toLowerCase()
  if (normalized === 'true') return 'enabled'
  if (normalized === 'false') return 'disabled'
  return 'invalid'
}

export const hasAutoUpdateAnnotation = (object: KubernetesObject) =>
  object.metadata?.annotations?.[AUTO_UPDATE_ANNOTATION_KEY] !== undefined

/** Mutates `object`; callers pass their own copy. */
export const setAutoUpdate = (object: ConfigurationObject, enabled: boolean) => {
  object.metadata.annotations = {
    ...(object.metadata.annotations ?? {}),
    [AUTO_UPDATE_ANNOTATION_KEY]: String(enabled),
  }
}
