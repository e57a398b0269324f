import {Level, log} from "./util"

/** Tunables for a [[Ui]] and the input machinery beneath it. */
export interface UiConfig {
  /** The Euclidean distance a pressed pointer must travel before a press becomes a drag. */
  dragThreshold :number
  /** Two clicks of the same button within this many milliseconds form a double click. */
  doubleClickMillis :number
  /** The number of widget ids an arena may hand out. */
  idCapacity :number
  /** The threshold a [[Ui]] applies to the shared [[log]] when it is created. */
  logLevel? :Level
  /** The clock used to timestamp clicks and touches, in milliseconds. */
  now :() => number
}

export const DefaultConfig :Readonly<UiConfig> = Object.freeze({
  dragThreshold: 4,
  doubleClickMillis: 500,
  idCapacity: 2**32 - 1,
  now: () => Date.now(),
})

function validate (config :UiConfig) {
  if (!(config.dragThreshold >= 0)) throw new Error(
    log.format("Drag threshold must be non-negative", "dragThreshold", config.dragThreshold))
  if (!(config.doubleClickMillis >= 0)) throw new Error(
    log.format("Double click interval must be non-negative", "millis", config.doubleClickMillis))
  if (!(config.idCapacity > 0) || !Number.isInteger(config.idCapacity)) throw new Error(
    log.format("Id capacity must be a positive integer", "capacity", config.idCapacity))
}

/** Merges a chain of partial configs over [[DefaultConfig]]. `layers` must be ordered from
  * child-most to parent-most. The result is validated and frozen. */
export function makeConfig (...layers :Partial<UiConfig>[]) :Readonly<UiConfig> {
  const config = layers.reduceRight<UiConfig>(
    (merged, layer) => ({...merged, ...defined(layer)}), {...DefaultConfig})
  validate(config)
  return Object.freeze(config)
}

// an explicit undefined in a layer means "inherit", so it must not be spread over the parent
function defined (layer :Partial<UiConfig>) :Partial<UiConfig> {
  const out :Partial<UiConfig> = {}
  if (layer.dragThreshold !== undefined) out.dragThreshold = layer.dragThreshold
  if (layer.doubleClickMillis !== undefined) out.doubleClickMillis = layer.doubleClickMillis
  if (layer.idCapacity !== undefined) out.idCapacity = layer.idCapacity
  if (layer.logLevel !== undefined) out.logLevel = layer.logLevel
  if (layer.now !== undefined) out.now = layer.now
  return out
}
