import type { ConfigurationObject } from '~/server/flowcontrol/types'

/**
 * Built-in default held for the lifetime of the process. `object()` hands out an independent deep
 * copy on every call, so defaulting or metadata changes made downstream never reach the template.
 */
export type BootstrapObject<T extends ConfigurationObject> = {
  readonly name: string
  object: () => T
}

export const createBootstrapObject = <T extends ConfigurationObject>(template: T): BootstrapObject<T> => {
  const name = template.metadata.name?.trim()
  if (!name) {
    throw new Error(`bootstrap ${template.kind} requires metadata.name`)
  }
  const snapshot = structuredClone(template)
  return {
    name,
    object: () => structuredClone(snapshot),
  }
}

export const bootstrapNames = <T extends ConfigurationObject>(objects: readonly BootstrapObject<T>[]) =>
  new Set(objects.map((object) => object.name))
