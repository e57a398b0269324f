export interface DataArray extends Array<Data> {}
export interface DataSet extends Set<Data> {}
export type DataMapKey = number | string
export interface DataMap extends Map<DataMapKey,Data> {}
export interface Record { [key :string] :Data }

/** Values that can be compared structurally. Float32 vectors are included so that widget state
  * can hold positions and rects directly. */
export type Data = undefined | null | boolean | number | string | Float32Array | DataArray |
  DataSet | DataMap | Record

/**
 * Tests the structural equality of two data values. This compares all elements of arrays, vectors,
 * sets, maps and record valued subproperties.
 */
export function dataEquals (a :Data, b :Data) :boolean {
  if (a === b) return true
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) return false
  if (a instanceof Float32Array) {
    if (!(b instanceof Float32Array) || a.length !== b.length) return false
    for (let ii = 0; ii < a.length; ii += 1) if (a[ii] !== b[ii]) return false
    return true
  }
  if (Array.isArray(a)) {
    if (!Array.isArray(b)) return false
    const alen = a.length, blen = b.length
    if (alen !== blen) return false
    for (let ii = 0; ii < alen; ii += 1) if (!dataEquals(a[ii], b[ii])) return false
    return true
  }
  if (a instanceof Set) {
    if (!(b instanceof Set) || a.size !== b.size) return false
    for (const elem of a) if (!b.has(elem)) return false
    return true
  }
  if (a instanceof Map) {
    if (!(b instanceof Map) || a.size !== b.size) return false
    for (const [key, value] of a) if (!b.has(key) || !dataEquals(value, b.get(key))) return false
    return true
  }
  if (b instanceof Float32Array || Array.isArray(b)) return false
  if (b instanceof Set || b instanceof Map) return false
  const akeys = Object.keys(a), bkeys = Object.keys(b)
  if (akeys.length !== bkeys.length) return false
  for (const key of akeys) if (!b.hasOwnProperty(key) || !dataEquals(a[key], b[key])) return false
  return true
}
