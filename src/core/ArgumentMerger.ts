import {
  DefaultSpec,
  FlagKey,
  MultiValueMap,
  OverrideSpec,
  TokenSequence
} from '../types/qemu.types'

/**
 * Groups override rows by key. QEMU accepts the same switch several times
 * with different values, so each key collects every non-empty value in the
 * order seen. A row whose joined value is empty still registers its key.
 */
export function collectOverrides (rows: OverrideSpec): MultiValueMap {
  const buckets: MultiValueMap = new Map()

  for (const [key, ...fragments] of rows) {
    let bucket = buckets.get(key)
    if (!bucket) {
      bucket = []
      buckets.set(key, bucket)
    }

    const value = fragments.join('')
    if (value.length > 0) {
      bucket.push(value)
    }
  }

  return buckets
}

/**
 * Adds a single-value bucket for every default whose key has no bucket yet.
 * Keys already present keep their override values, even an empty bucket.
 */
export function backfillDefaults (buckets: MultiValueMap, defaults: DefaultSpec): MultiValueMap {
  for (const [key, value] of defaults) {
    if (!buckets.has(key)) {
      buckets.set(key, [value])
    }
  }
  return buckets
}

/**
 * Emits `key value` for each value of each bucket, or the bare key when the
 * bucket is empty.
 */
export function flattenArgs (buckets: MultiValueMap): TokenSequence {
  const tokens: TokenSequence = []

  for (const [key, values] of buckets) {
    if (values.length === 0) {
      tokens.push(key)
      continue
    }
    for (const value of values) {
      tokens.push(key, value)
    }
  }

  return tokens
}

/**
 * Merges expanded override rows with the defaults and flattens the result.
 *
 * @example
 * ```typescript
 * mergeArgs(
 *   [['-device', 'virtio-net'], ['-device', 'e1000']],
 *   new Map([['-m', '512M'], ['-device', 'rtl8139']])
 * )
 * // ['-device', 'virtio-net', '-device', 'e1000', '-m', '512M']
 * ```
 */
export function mergeArgs (rows: OverrideSpec, defaults: DefaultSpec): TokenSequence {
  return flattenArgs(backfillDefaults(collectOverrides(rows), defaults))
}

/**
 * Regroups a token sequence by key. A token starting with '-' opens a new
 * key; any other token is a value of the last key.
 *
 * Cross-key order carries no meaning for QEMU, so this is the form to
 * compare token sequences in.
 *
 * Values that themselves start with '-' (`-append -quiet`) cannot be told
 * apart from keys and are grouped as separate bare flags.
 */
export function groupTokens (tokens: TokenSequence): Map<FlagKey, string[]> {
  const groups = new Map<FlagKey, string[]>()
  let current: string[] | undefined

  for (const token of tokens) {
    if (token.startsWith('-') || current === undefined) {
      current = groups.get(token)
      if (!current) {
        current = []
        groups.set(token, current)
      }
      continue
    }
    current.push(token)
  }

  return groups
}
