import pino, { multistream } from 'pino'
import { pinoLoki } from 'pino-loki'

import { type EnvSource, readEnvBoolean, readEnvString } from '~/server/env-config'

export type LokiSettings = {
  host: string
  basicAuth?: { username: string; password: string }
}

export type LoggerSettings = {
  level: string
  service: string
  namespace: string
  loki: LokiSettings | null
}

export type LogComponent = 'controller' | 'ensurer' | 'remover' | 'informer' | 'metrics'

// "user:password"; anything else leaves the Loki push unauthenticated.
const parseBasicAuth = (value: string | undefined) => {
  if (!value) return undefined
  const separator = value.indexOf(':')
  if (separator <= 0 || separator === value.length - 1) return undefined
  return { username: value.slice(0, separator), password: value.slice(separator + 1) }
}

export const resolveLoggerSettings = (env: EnvSource = process.env): LoggerSettings => {
  const lokiHost = readEnvString(env, 'LGTM_LOKI_ENDPOINT')
  return {
    level: readEnvString(env, 'LOG_LEVEL') ?? (env.NODE_ENV === 'test' ? 'silent' : 'info'),
    service: readEnvString(env, 'OTEL_SERVICE_NAME') ?? 'flowcontrol-bootstrap',
    namespace: readEnvString(env, 'POD_NAMESPACE') ?? 'kube-system',
    loki:
      lokiHost && !readEnvBoolean(env, 'LOKI_DISABLED', false)
        ? { host: lokiHost, basicAuth: parseBasicAuth(readEnvString(env, 'LGTM_LOKI_BASIC_AUTH')) }
        : null,
  }
}

export const createLogger = (settings: LoggerSettings) => {
  const destinations: { stream: NodeJS.WritableStream }[] = [{ stream: process.stdout }]
  if (settings.loki) {
    destinations.push({
      stream: pinoLoki({
        host: settings.loki.host,
        basicAuth: settings.loki.basicAuth,
        batching: true,
        interval: 5,
        labels: { service: settings.service, namespace: settings.namespace },
      }),
    })
  }

  return pino(
    {
      level: settings.level,
      base: { service: settings.service, namespace: settings.namespace },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    multistream(destinations),
  )
}

export const logger = createLogger(resolveLoggerSettings())

/** Child logger tagged with the component and, where given, the object type and ensure strategy. */
export const componentLogger = (component: LogComponent, scope: { type?: string; strategy?: string } = {}) => {
  const bindings: Record<string, string> = { component }
  if (scope.type) bindings.type = scope.type
  if (scope.strategy) bindings.strategy = scope.strategy
  return logger.child(bindings)
}
