import { type EnvSource, readEnvBoolean, readEnvInteger } from '~/server/env-config'

export type BootstrapSettings = {
  enabled: boolean
  intervalSeconds: number
  removeDangling: boolean
  cacheSyncTimeoutSeconds: number
}

export const resolveBootstrapSettings = (env: EnvSource = process.env): BootstrapSettings => ({
  enabled: readEnvBoolean(env, 'FLOWCONTROL_BOOTSTRAP_ENABLED', true),
  intervalSeconds: readEnvInteger(env, 'FLOWCONTROL_BOOTSTRAP_INTERVAL_SECONDS', { fallback: 60, min: 1 }),
  removeDangling: readEnvBoolean(env, 'FLOWCONTROL_BOOTSTRAP_REMOVE_DANGLING', true),
  cacheSyncTimeoutSeconds: readEnvInteger(env, 'FLOWCONTROL_BOOTSTRAP_CACHE_SYNC_TIMEOUT_SECONDS', {
    fallback: 30,
    min: 1,
  }),
})
