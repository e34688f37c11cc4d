import { beforeEach, describe, expect, it } from 'vitest'

import { type ConfigurationAccess, createConfigurationAccess } from '~/server/ensurer/configuration-access'
import { ConflictError, KindMismatchError, NotFoundError } from '~/server/ensurer/errors'
import { makeFlowSchema, makePriorityLevelConfiguration } from '~/server/flowcontrol/bootstrap-table'
import { flowSchemaKind } from '~/server/flowcontrol/kinds'
import { FIELD_MANAGER, type FlowSchema } from '~/server/flowcontrol/types'

import { createFakeStore, type FakeStore } from './fake-store'

const exemptLevel = makePriorityLevelConfiguration('exempt', { type: 'Exempt' })

describe('configuration access', () => {
  let store: FakeStore<FlowSchema>
  let access: ConfigurationAccess<FlowSchema>

  beforeEach(() => {
    store = createFakeStore(flowSchemaKind)
    access = createConfigurationAccess(flowSchemaKind, store)
  })

  it('reports the type name', () => {
    expect(access.typeName()).toBe('FlowSchema')
  })

  it('creates with the system field manager', async () => {
    const created = await access.create(makeFlowSchema('probes', { priorityLevelConfiguration: { name: 'exempt' } }))

    expect(store.client.create).toHaveBeenCalledWith(expect.objectContaining({ kind: 'FlowSchema' }), FIELD_MANAGER)
    expect(created.metadata.uid).toBe('uid-1')
    expect(created.spec.matchingPrecedence).toBe(1000)
  })

  it('rejects objects of another kind before writing', async () => {
    await expect(access.create(exemptLevel)).rejects.toBeInstanceOf(KindMismatchError)
    await expect(access.update(exemptLevel)).rejects.toThrow(
      'object is not a FlowSchema type (got PriorityLevelConfiguration)',
    )
    expect(store.client.create).not.toHaveBeenCalled()
    expect(store.client.replace).not.toHaveBeenCalled()
  })

  it('rejects a missing object on get', async () => {
    await expect(access.get('missing')).rejects.toBeInstanceOf(NotFoundError)
  })

  it('returns a private copy from get', async () => {
    store.seed(makeFlowSchema('probes', { priorityLevelConfiguration: { name: 'exempt' }, matchingPrecedence: 2 }))

    const first = await access.get('probes')
    first.spec.matchingPrecedence = 9999
    const second = await access.get('probes')

    expect(second.spec.matchingPrecedence).toBe(2)
  })

  it('surfaces a stale update as a conflict', async () => {
    store.seed(makeFlowSchema('probes', { priorityLevelConfiguration: { name: 'exempt' } }))
    const current = await access.get('probes')
    current.metadata.resourceVersion = '0'

    await expect(access.update(current)).rejects.toBeInstanceOf(ConflictError)
  })

  it('passes delete preconditions through', async () => {
    const seeded = store.seed(makeFlowSchema('probes', { priorityLevelConfiguration: { name: 'exempt' } }))

    await access.delete('probes', { uid: seeded.metadata.uid, resourceVersion: seeded.metadata.resourceVersion })

    expect(store.client.delete).toHaveBeenCalledWith('probes', { uid: 'uid-1', resourceVersion: '1' })
    expect(store.peek('probes')).toBeUndefined()
  })

  it('copies the bootstrap spec as an independent value', () => {
    const bootstrap = makeFlowSchema('probes', {
      priorityLevelConfiguration: { name: 'exempt' },
      rules: [{ subjects: [{ kind: 'Group', group: { name: 'system:authenticated' } }] }],
    })
    const current = makeFlowSchema('probes', { priorityLevelConfiguration: { name: 'global-default' } })

    access.copySpec(bootstrap, current)
    expect(current.spec).toEqual(bootstrap.spec)
    expect(current.spec).not.toBe(bootstrap.spec)

    current.spec.rules?.push({ subjects: [] })
    expect(bootstrap.spec.rules).toHaveLength(1)
  })

  it('refuses to copy between kinds', () => {
    const bootstrap = makeFlowSchema('probes', { priorityLevelConfiguration: { name: 'exempt' } })

    expect(() => access.copySpec(bootstrap, exemptLevel)).toThrow(KindMismatchError)
  })

  it('compares against the defaulted bootstrap spec', () => {
    const bootstrap = makeFlowSchema('probes', { priorityLevelConfiguration: { name: 'exempt' } })
    const defaulted = makeFlowSchema('probes', {
      priorityLevelConfiguration: { name: 'exempt' },
      matchingPrecedence: 1000,
    })
    const drifted = makeFlowSchema('probes', {
      priorityLevelConfiguration: { name: 'exempt' },
      matchingPrecedence: 500,
    })

    expect(access.hasSpecChanged(bootstrap, defaulted)).toBe(false)
    expect(access.hasSpecChanged(bootstrap, drifted)).toBe(true)
    expect(bootstrap.spec.matchingPrecedence).toBeUndefined()
  })

  it('ignores key order and empty collections when comparing', () => {
    const bootstrap = makeFlowSchema('probes', { priorityLevelConfiguration: { name: 'exempt' } })
    const live = makeFlowSchema('probes', {
      rules: [],
      matchingPrecedence: 1000,
      priorityLevelConfiguration: { name: 'exempt' },
    })

    expect(access.hasSpecChanged(bootstrap, live)).toBe(false)
  })
})
