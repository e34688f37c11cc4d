// Canonical form used for semantic comparison: keys sorted, and every zero value (null, undefined,
// false, 0, '', empty arrays and objects) treated the same as an absent field. The API server omits
// zero-valued optional fields when it stores an object, so a bootstrap spec that spells one out
// must still compare equal to the stored copy.
export const canonicalizeForComparison = (value: unknown): unknown => {
  if (value == null || value === false || value === 0 || value === '') return undefined
  if (Array.isArray(value)) {
    if (value.length === 0) return undefined
    return value.map((entry) => canonicalizeForComparison(entry) ?? null)
  }
  if (typeof value !== 'object') return value

  const output: Record<string, unknown> = {}
  const entries = Object.entries(value).sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
  for (const [key, entry] of entries) {
    const canonical = canonicalizeForComparison(entry)
    if (canonical === undefined) continue
    output[key] = canonical
  }
  return Object.keys(output).length > 0 ? output : undefined
}

export const stableJsonStringify = (value: unknown) => JSON.stringify(canonicalizeForComparison(value)) ?? 'null'

export const semanticEqual = (left: unknown, right: unknown) => stableJsonStringify(left) === stableJsonStringify(right)
