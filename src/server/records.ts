export const asString = (value: unknown) => (typeof value === 'string' && value.trim().length > 0 ? value.trim() : null)

export const asRecord = (value: unknown) =>
  value && typeof value === 'object' && !Array.isArray(value) ? (value as Record<string, unknown>) : null
