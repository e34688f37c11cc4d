import { z } from 'zod'

import { type BootstrapObject, createBootstrapObject } from '~/server/ensurer/bootstrap-object'

import rawTable from './bootstrap-configuration.json'
import {
  AUTO_UPDATE_ANNOTATION_KEY,
  FLOWCONTROL_API_VERSION,
  type FlowSchema,
  type FlowSchemaSpec,
  flowSchemaSpecSchema,
  type PriorityLevelConfiguration,
  type PriorityLevelConfigurationSpec,
  priorityLevelConfigurationSpecSchema,
} from './types'

const nameSchema = z
  .string()
  .trim()
  .min(1, 'name is required')
  .max(253)
  .regex(/^[a-z0-9]([-a-z0-9.]*[a-z0-9])?$/, 'name must be a DNS subdomain')

const objectSetSchema = z.object({
  priorityLevelConfigurations: z.array(z.object({ name: nameSchema, spec: priorityLevelConfigurationSpecSchema })),
  flowSchemas: z.array(z.object({ name: nameSchema, spec: flowSchemaSpecSchema })),
})

const bootstrapTableSchema = z.object({
  mandatory: objectSetSchema,
  suggested: objectSetSchema,
})

export type BootstrapObjectSet = {
  priorityLevelConfigurations: BootstrapObject<PriorityLevelConfiguration>[]
  flowSchemas: BootstrapObject<FlowSchema>[]
}

export type BootstrapConfiguration = {
  mandatory: BootstrapObjectSet
  suggested: BootstrapObjectSet
}

const bootstrapMetadata = (name: string) => ({
  name,
  annotations: { [AUTO_UPDATE_ANNOTATION_KEY]: 'true' },
})

export const makeFlowSchema = (name: string, spec: FlowSchemaSpec): FlowSchema => ({
  apiVersion: FLOWCONTROL_API_VERSION,
  kind: 'FlowSchema',
  metadata: bootstrapMetadata(name),
  spec,
})

export const makePriorityLevelConfiguration = (
  name: string,
  spec: PriorityLevelConfigurationSpec,
): PriorityLevelConfiguration => ({
  apiVersion: FLOWCONTROL_API_VERSION,
  kind: 'PriorityLevelConfiguration',
  metadata: bootstrapMetadata(name),
  spec,
})

const assertUniqueNames = (typeName: string, names: string[]) => {
  const seen = new Set<string>()
  for (const name of names) {
    if (seen.has(name)) {
      throw new Error(`bootstrap configuration lists ${typeName} "${name}" more than once`)
    }
    seen.add(name)
  }
}

export const loadBootstrapConfiguration = (raw: unknown = rawTable): BootstrapConfiguration => {
  const parsed = bootstrapTableSchema.safeParse(raw)
  if (!parsed.success) {
    throw new Error(`invalid bootstrap configuration: ${parsed.error.message}`)
  }
  const { mandatory, suggested } = parsed.data

  assertUniqueNames('PriorityLevelConfiguration', [
    ...mandatory.priorityLevelConfigurations.map((entry) => entry.name),
    ...suggested.priorityLevelConfigurations.map((entry) => entry.name),
  ])
  assertUniqueNames('FlowSchema', [
    ...mandatory.flowSchemas.map((entry) => entry.name),
    ...suggested.flowSchemas.map((entry) => entry.name),
  ])

  const toObjectSet = (set: z.infer<typeof objectSetSchema>): BootstrapObjectSet => ({
    priorityLevelConfigurations: set.priorityLevelConfigurations.map((entry) =>
      createBootstrapObject(makePriorityLevelConfiguration(entry.name, entry.spec)),
    ),
    flowSchemas: set.flowSchemas.map((entry) => createBootstrapObject(makeFlowSchema(entry.name, entry.spec))),
  })

  return {
    mandatory: toObjectSet(mandatory),
    suggested: toObjectSet(suggested),
  }
}
