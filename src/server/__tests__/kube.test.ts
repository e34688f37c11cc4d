import { describe, expect, it } from 'vitest'

import { AlreadyExistsError, ConflictError, NotFoundError, StoreUnavailableError } from '~/server/ensurer/errors'
import { getKubeStatusCode, toStoreError } from '~/server/kube'

const httpError = (statusCode: number, reason?: string) =>
  Object.assign(new Error('HTTP request failed'), { statusCode, body: { reason } })

describe('kube error mapping', () => {
  it('reads the status code from the error or its response', () => {
    expect(getKubeStatusCode(httpError(404))).toBe(404)
    expect(getKubeStatusCode(Object.assign(new Error('failed'), { response: { statusCode: 503 } }))).toBe(503)
    expect(getKubeStatusCode('boom')).toBeNull()
  })

  it('maps 404 to NotFoundError', () => {
    const error = toStoreError(httpError(404), 'FlowSchema', 'probes')

    expect(error).toBeInstanceOf(NotFoundError)
    expect(error.message).toBe('FlowSchema "probes" not found')
  })

  it('separates AlreadyExists from other conflicts', () => {
    expect(toStoreError(httpError(409, 'AlreadyExists'), 'FlowSchema', 'probes')).toBeInstanceOf(AlreadyExistsError)
    expect(toStoreError(httpError(409, 'Conflict'), 'FlowSchema', 'probes')).toBeInstanceOf(ConflictError)
  })

  it('wraps everything else as an unavailable store', () => {
    const cause = httpError(500)
    const error = toStoreError(cause, 'FlowSchema', 'probes')

    expect(error).toBeInstanceOf(StoreUnavailableError)
    expect(error.message).toBe('FlowSchema "probes" request failed: HTTP request failed (status=500)')
    expect(error.cause).toBe(cause)
    expect(toStoreError('boom', 'FlowSchema', 'probes').message).toBe('FlowSchema "probes" request failed: boom')
  })
})
