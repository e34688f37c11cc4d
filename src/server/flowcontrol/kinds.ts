import { defaultFlowSchemaSpec, defaultPriorityLevelConfigurationSpec } from './defaults'
import {
  type ConfigurationKind,
  FLOWCONTROL_API_VERSION,
  type FlowSchema,
  isFlowSchema,
  isPriorityLevelConfiguration,
  type PriorityLevelConfiguration,
} from './types'

export const flowSchemaKind: ConfigurationKind<FlowSchema> = {
  apiVersion: FLOWCONTROL_API_VERSION,
  kind: 'FlowSchema',
  typeName: 'FlowSchema',
  plural: 'flowschemas',
  is: isFlowSchema,
  defaultSpec: defaultFlowSchemaSpec,
}

export const priorityLevelConfigurationKind: ConfigurationKind<PriorityLevelConfiguration> = {
  apiVersion: FLOWCONTROL_API_VERSION,
  kind: 'PriorityLevelConfiguration',
  typeName: 'PriorityLevelConfiguration',
  plural: 'prioritylevelconfigurations',
  is: isPriorityLevelConfiguration,
  defaultSpec: defaultPriorityLevelConfigurationSpec,
}
