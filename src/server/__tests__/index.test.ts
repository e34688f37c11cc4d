import { describe, expect, it } from 'vitest'

import {
  AUTO_UPDATE_ANNOTATION_KEY,
  createBootstrapReconciler,
  createConfigurationAccess,
  createSuggestedEnsurer,
  FIELD_MANAGER,
  flowSchemaKind,
  loadBootstrapConfiguration,
  ReconcileError,
  UPDATE_CONFLICT_RETRIES,
} from '~/index'

import { createFakeStore } from './fake-store'

describe('package entry', () => {
  it('exposes the well-known constants', () => {
    expect(AUTO_UPDATE_ANNOTATION_KEY).toBe('apf.kubernetes.io/autoupdate-spec')
    expect(FIELD_MANAGER).toBe('api-priority-and-fairness-config-producer-v1')
    expect(UPDATE_CONFLICT_RETRIES).toBe(1)
  })

  it('exposes a working ensurer over a custom store', async () => {
    const store = createFakeStore(flowSchemaKind)
    const ensurer = createSuggestedEnsurer(createConfigurationAccess(flowSchemaKind, store))
    const [exempt] = loadBootstrapConfiguration().mandatory.flowSchemas

    const results = exempt ? await ensurer.ensure([exempt]) : []

    expect(results).toEqual([{ name: 'exempt', outcome: 'created' }])
  })

  it('exposes the reconciler and error types', () => {
    expect(typeof createBootstrapReconciler).toBe('function')
    expect(new ReconcileError('failed', 'FlowSchema', 'exempt').objectName).toBe('exempt')
  })
})
