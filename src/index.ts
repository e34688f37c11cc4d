export {
  type BootstrapReconciler,
  createBootstrapReconciler,
  type FlowcontrolStores,
  type KindSummary,
  type ReconcileSummary,
  startBootstrapConfigurationLoop,
} from './server/bootstrap-controller'
export { type BootstrapSettings, resolveBootstrapSettings } from './server/config'
export { readAutoUpdate, setAutoUpdate, type AutoUpdateSetting } from './server/ensurer/auto-update'
export { type BootstrapObject, createBootstrapObject } from './server/ensurer/bootstrap-object'
export { type ConfigurationAccess, createConfigurationAccess } from './server/ensurer/configuration-access'
export { computeDanglingObjectNames, getRemoveCandidates } from './server/ensurer/dangling'
export {
  createEnsurer,
  createMandatoryEnsurer,
  createSuggestedEnsurer,
  type EnsureOutcome,
  type EnsureResult,
  type Ensurer,
  UPDATE_CONFLICT_RETRIES,
} from './server/ensurer/ensurer'
export {
  AlreadyExistsError,
  ConflictError,
  KindMismatchError,
  NotFoundError,
  ReconcileError,
  StoreUnavailableError,
} from './server/ensurer/errors'
export { createRemover, type Remover } from './server/ensurer/remover'
export type {
  DeletePreconditions,
  ManagedObjectStore,
  ObjectClient,
  ObjectLister,
  ObjectStore,
} from './server/ensurer/store'
export {
  createMandatoryEnsureStrategy,
  createSuggestedEnsureStrategy,
  type EnsureDecision,
  type EnsureStrategy,
} from './server/ensurer/strategy'
export { type BootstrapConfiguration, loadBootstrapConfiguration } from './server/flowcontrol/bootstrap-table'
export { flowSchemaKind, priorityLevelConfigurationKind } from './server/flowcontrol/kinds'
export * from './server/flowcontrol/types'
export { createFlowcontrolStores, createKubeObjectStore } from './server/kube'
export { BootstrapConfigurationReconciler, makeBootstrapConfigurationLayer } from './server/service'
