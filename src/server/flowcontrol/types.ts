import type { V1ObjectMeta } from '@kubernetes/client-node'
import { z } from 'zod'

import { asRecord } from '~/server/records'

export const FLOWCONTROL_API_VERSION = 'flowcontrol.apiserver.k8s.io/v1'

// Well-known annotation; "false" means an operator owns the object and the spec must not be overwritten.
export const AUTO_UPDATE_ANNOTATION_KEY = 'apf.kubernetes.io/autoupdate-spec'

// Every write carries this manager so system-owned objects can be told apart from user-created ones.
export const FIELD_MANAGER = 'api-priority-and-fairness-config-producer-v1'

const subjectSchema = z.object({
  kind: z.enum(['User', 'Group', 'ServiceAccount']),
  user: z.object({ name: z.string().min(1) }).optional(),
  group: z.object({ name: z.string().min(1) }).optional(),
  serviceAccount: z.object({ namespace: z.string().min(1), name: z.string().min(1) }).optional(),
})

const resourcePolicyRuleSchema = z.object({
  verbs: z.array(z.string()),
  apiGroups: z.array(z.string()),
  resources: z.array(z.string()),
  clusterScope: z.boolean().optional(),
  namespaces: z.array(z.string()).optional(),
})

const nonResourcePolicyRuleSchema = z.object({
  verbs: z.array(z.string()),
  nonResourceURLs: z.array(z.string()),
})

const policyRulesWithSubjectsSchema = z.object({
  subjects: z.array(subjectSchema),
  resourceRules: z.array(resourcePolicyRuleSchema).optional(),
  nonResourceRules: z.array(nonResourcePolicyRuleSchema).optional(),
})

export const flowSchemaSpecSchema = z.object({
  priorityLevelConfiguration: z.object({ name: z.string().min(1) }),
  matchingPrecedence: z.number().int().nonnegative().optional(),
  distinguisherMethod: z.object({ type: z.enum(['ByUser', 'ByNamespace']) }).optional(),
  rules: z.array(policyRulesWithSubjectsSchema).optional(),
})

const queuingConfigurationSchema = z.object({
  queues: z.number().int().nonnegative().optional(),
  handSize: z.number().int().nonnegative().optional(),
  queueLengthLimit: z.number().int().nonnegative().optional(),
})

const limitResponseSchema = z.object({
  type: z.enum(['Queue', 'Reject']),
  queuing: queuingConfigurationSchema.optional(),
})

const limitedPriorityLevelSchema = z.object({
  nominalConcurrencyShares: z.number().int().nonnegative().optional(),
  limitResponse: limitResponseSchema.optional(),
  lendablePercent: z.number().int().min(0).max(100).optional(),
  borrowingLimitPercent: z.number().int().nonnegative().optional(),
})

const exemptPriorityLevelSchema = z.object({
  nominalConcurrencyShares: z.number().int().nonnegative().optional(),
  lendablePercent: z.number().int().min(0).max(100).optional(),
})

export const priorityLevelConfigurationSpecSchema = z.object({
  type: z.enum(['Exempt', 'Limited']),
  limited: limitedPriorityLevelSchema.optional(),
  exempt: exemptPriorityLevelSchema.optional(),
})

export type FlowSchemaSpec = z.infer<typeof flowSchemaSpecSchema>
export type QueuingConfiguration = z.infer<typeof queuingConfigurationSchema>
export type LimitResponse = z.infer<typeof limitResponseSchema>
export type LimitedPriorityLevel = z.infer<typeof limitedPriorityLevelSchema>
export type ExemptPriorityLevel = z.infer<typeof exemptPriorityLevelSchema>
export type PriorityLevelConfigurationSpec = z.infer<typeof priorityLevelConfigurationSpecSchema>

export type ConfigurationObject = {
  apiVersion: string
  kind: string
  metadata: V1ObjectMeta
  spec: object
}

export type FlowSchema = {
  apiVersion: string
  kind: 'FlowSchema'
  metadata: V1ObjectMeta
  spec: FlowSchemaSpec
}

export type PriorityLevelConfiguration = {
  apiVersion: string
  kind: 'PriorityLevelConfiguration'
  metadata: V1ObjectMeta
  spec: PriorityLevelConfigurationSpec
}

/**
 * Everything the generic reconciler needs to know about one configuration kind.
 */
export type ConfigurationKind<T extends ConfigurationObject> = {
  apiVersion: string
  kind: T['kind']
  typeName: string
  plural: string
  is: (value: unknown) => value is T
  /** Pure; returns the fully defaulted form of a raw spec. */
  defaultSpec: (spec: T['spec']) => T['spec']
}

const hasKind = (value: unknown, kind: string) => {
  const record = asRecord(value)
  if (!record || record.kind !== kind) return false
  return asRecord(record.metadata) !== null && asRecord(record.spec) !== null
}

export const isFlowSchema = (value: unknown): value is FlowSchema => hasKind(value, 'FlowSchema')

export const isPriorityLevelConfiguration = (value: unknown): value is PriorityLevelConfiguration =>
  hasKind(value, 'PriorityLevelConfiguration')

export const describeKind = (value: unknown) => {
  const kind = asRecord(value)?.kind
  return typeof kind === 'string' && kind.length > 0 ? kind : typeof value
}
