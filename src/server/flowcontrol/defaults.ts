import type {
  ExemptPriorityLevel,
  FlowSchemaSpec,
  LimitedPriorityLevel,
  LimitResponse,
  PriorityLevelConfigurationSpec,
  QueuingConfiguration,
} from './types'

export const DEFAULT_MATCHING_PRECEDENCE = 1000
export const DEFAULT_LIMITED_NOMINAL_CONCURRENCY_SHARES = 30
export const DEFAULT_QUEUING: Required<QueuingConfiguration> = {
  queues: 64,
  handSize: 8,
  queueLengthLimit: 50,
}

export const defaultFlowSchemaSpec = (spec: FlowSchemaSpec): FlowSchemaSpec => ({
  ...spec,
  // zero is not a valid precedence, so it is replaced as well
  matchingPrecedence: spec.matchingPrecedence || DEFAULT_MATCHING_PRECEDENCE,
})

const defaultQueuing = (queuing: QueuingConfiguration): QueuingConfiguration => ({
  ...queuing,
  queues: queuing.queues || DEFAULT_QUEUING.queues,
  handSize: queuing.handSize || DEFAULT_QUEUING.handSize,
  queueLengthLimit: queuing.queueLengthLimit || DEFAULT_QUEUING.queueLengthLimit,
})

const defaultLimitResponse = (limitResponse: LimitResponse): LimitResponse =>
  limitResponse.queuing ? { ...limitResponse, queuing: defaultQueuing(limitResponse.queuing) } : { ...limitResponse }

const defaultLimited = (limited: LimitedPriorityLevel): LimitedPriorityLevel => {
  const next: LimitedPriorityLevel = {
    ...limited,
    nominalConcurrencyShares: limited.nominalConcurrencyShares ?? DEFAULT_LIMITED_NOMINAL_CONCURRENCY_SHARES,
    lendablePercent: limited.lendablePercent ?? 0,
  }
  if (limited.limitResponse) {
    next.limitResponse = defaultLimitResponse(limited.limitResponse)
  }
  return next
}

const defaultExempt = (exempt: ExemptPriorityLevel): ExemptPriorityLevel => ({
  ...exempt,
  nominalConcurrencyShares: exempt.nominalConcurrencyShares ?? 0,
  lendablePercent: exempt.lendablePercent ?? 0,
})

export const defaultPriorityLevelConfigurationSpec = (
  spec: PriorityLevelConfigurationSpec,
): PriorityLevelConfigurationSpec => {
  const next: PriorityLevelConfigurationSpec = { ...spec }
  if (spec.limited) next.limited = defaultLimited(spec.limited)
  if (spec.exempt) next.exempt = defaultExempt(spec.exempt)
  return next
}
