export type EnvSource = Record<string, string | undefined>

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on'])
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off'])

/** Trimmed value, or undefined when the variable is unset or blank. */
export const readEnvString = (env: EnvSource, name: string) => {
  const value = env[name]?.trim()
  return value ? value : undefined
}

export const readEnvBoolean = (env: EnvSource, name: string, fallback: boolean) => {
  const value = readEnvString(env, name)?.toLowerCase()
  if (value === undefined) return fallback
  if (TRUE_VALUES.has(value)) return true
  if (FALSE_VALUES.has(value)) return false
  return fallback
}

// Whole seconds and counts only; anything below `min` or unparseable keeps the fallback.
export const readEnvInteger = (env: EnvSource, name: string, options: { fallback: number; min: number }) => {
  const value = readEnvString(env, name)
  if (value === undefined || !/^\d+$/.test(value)) return options.fallback
  const parsed = Number.parseInt(value, 10)
  return parsed < options.min ? options.fallback : parsed
}
