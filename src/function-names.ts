/**
 * Function name normalization
 *
 * `cargo llvm-cov` can emit several records for one source function that
 * differ only in the crate-hash disambiguator of a Rust v0-mangled symbol:
 *
 *   _RNvNtCs2PylkhAFI23_11parity_real1a1a
 *   _RNvNtCsiNoeFlk8yU1_11parity_real1a1a
 *
 * Stripping the `_RNvNtCs<hash>_` prefix collapses them into one function.
 * For display, both full v0 symbols and stripped names read as Rust paths
 * (`parity_real::a::a`).
 */

const RUST_V0_CRATE_HASH_PREFIX = '_RNvNtCs'
const RUST_V0_PREFIX = '_R'

/** Path segments kept when showing a demangled name */
const DISPLAY_SEGMENTS = 3

const LINE_PREFIXED_ID = /^(\d+):([\s\S]*)$/

/**
 * Normalize one function name; names that are not v0 symbols pass through
 */
export function normalizeFunctionName(raw: string): string {
  if (!raw.startsWith(RUST_V0_CRATE_HASH_PREFIX)) {
    return raw
  }
  const rest = raw.slice(RUST_V0_CRATE_HASH_PREFIX.length)
  const separator = rest.indexOf('_')
  if (separator === -1) {
    return raw
  }
  return rest.slice(separator + 1)
}

/**
 * Normalize the name part of a function id (`"{line}:{name}"` or `"{name}"`)
 */
export function normalizeFunctionId(id: string): string {
  const match = LINE_PREFIXED_ID.exec(id)
  if (match) {
    return `${match[1]}:${normalizeFunctionName(match[2])}`
  }
  return normalizeFunctionName(id)
}

// =============================================================================
// Display
// =============================================================================

interface Cursor {
  text: string
  pos: number
}

function eat(cursor: Cursor, char: string): boolean {
  if (cursor.text.charAt(cursor.pos) !== char) {
    return false
  }
  cursor.pos++
  return true
}

/**
 * `0`, or a number without leading zeros
 */
function readDecimal(cursor: Cursor): number | null {
  const start = cursor.pos
  if (eat(cursor, '0')) {
    return 0
  }
  while (/[0-9]/.test(cursor.text.charAt(cursor.pos))) {
    cursor.pos++
  }
  return cursor.pos === start ? null : Number(cursor.text.slice(start, cursor.pos))
}

/**
 * Skip an `s<base-62>_` disambiguator, if present
 */
function skipDisambiguator(cursor: Cursor): boolean {
  if (!eat(cursor, 's')) {
    return true
  }
  const end = cursor.text.indexOf('_', cursor.pos)
  if (end === -1) {
    return false
  }
  cursor.pos = end + 1
  return true
}

/**
 * `<length>[_]<bytes>`; punycode identifiers are not decoded
 */
function readIdentifier(cursor: Cursor): string | null {
  const length = readDecimal(cursor)
  if (length === null) {
    return null
  }
  eat(cursor, '_')
  if (cursor.pos + length > cursor.text.length) {
    return null
  }
  const identifier = cursor.text.slice(cursor.pos, cursor.pos + length)
  cursor.pos += length
  return identifier
}

/**
 * Crate roots and nested paths; impls, generics and back references give null
 */
function readPath(cursor: Cursor): string[] | null {
  if (eat(cursor, 'C')) {
    if (!skipDisambiguator(cursor)) return null
    const crate = readIdentifier(cursor)
    return crate === null ? null : [crate]
  }
  if (!eat(cursor, 'N')) {
    return null
  }

  const namespace = cursor.text.charAt(cursor.pos)
  if (!/[A-Za-z]/.test(namespace)) {
    return null
  }
  cursor.pos++
  const parent = readPath(cursor)
  if (!parent || !skipDisambiguator(cursor)) {
    return null
  }
  const name = readIdentifier(cursor)
  if (name === null) {
    return null
  }
  if (namespace === 'C') {
    return [...parent, '{closure}']
  }
  return name ? [...parent, name] : parent
}

function readIdentifierList(cursor: Cursor): string[] | null {
  const segments: string[] = []
  while (cursor.pos < cursor.text.length) {
    const segment = readIdentifier(cursor)
    if (segment === null) {
      return null
    }
    segments.push(segment)
  }
  return segments.length > 0 ? segments : null
}

/**
 * Readable name for reports. Rust v0 symbols, including names whose crate
 * hash prefix was stripped, show as their last path segments; anything that
 * does not parse is returned unchanged.
 *
 * @example
 * ```typescript
 * displayFunctionName('_RNvNtCs2PylkhAFI23_11parity_real1a1a') // 'parity_real::a::a'
 * displayFunctionName('11parity_real1a1a') // 'parity_real::a::a'
 * displayFunctionName('handler') // 'handler'
 * ```
 */
export function displayFunctionName(name: string): string {
  let segments: string[] | null = null
  if (name.startsWith(RUST_V0_PREFIX)) {
    segments = readPath({ text: name, pos: RUST_V0_PREFIX.length })
  } else if (/^[1-9]/.test(name)) {
    segments = readIdentifierList({ text: name, pos: 0 })
  }
  if (!segments || segments.length === 0) {
    return name
  }
  return segments.slice(-DISPLAY_SEGMENTS).join('::')
}
