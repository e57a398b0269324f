/** Removes a listener registration when invoked. */
export type Remover = () => void

/** Removes `listener` from `listeners`, if present. */
export function removeListener<T> (listeners :T[], listener :T) {
  const idx = listeners.indexOf(listener)
  if (idx >= 0) listeners.splice(idx, 1)
}

/** Appends `listener` to `listeners` and returns a thunk that takes it back out. */
export function addListener<T> (listeners :T[], listener :T) :Remover {
  listeners.push(listener)
  return () => removeListener(listeners, listener)
}

export const developMode = process.env.NODE_ENV === "development"

/** Something that holds on to resources (listener registrations, ports) until disposed. */
export interface Disposable {
  dispose () :void
}

/**
 * Checks at compile time that a switch covered every case, and supplies `value` at runtime when
 * one slips through anyway:<pre>
 * switch (motion.type) {
 * case "cursor": return ...
 * default: return unreachableCase(motion, input)
 * }</pre>
 */
export function unreachableCase<T> (impossible :never, value :T) :T {
  return value
}

export type Level = "debug" | "info" | "warn" | "error"

const LevelOrder :{[L in Level] :number} = {debug: 0, info: 1, warn: 2, error: 3}

/** Receives formatted log lines. The default sink writes to the console. */
export type LogSink = (level :Level, line :string) => void

const consoleSink :LogSink = (level, line) => {
  switch (level) {
  case "error": console.error(line) ; break
  case "warn": console.warn(line) ; break
  case "info": console.info(line) ; break
  default: console.log(line) ; break
  }
}

/** Logs a message followed by `key=value` pairs: `log.info("Placed", "id", 3)` yields
  * `Placed [id=3]`. A trailing odd argument is logged on a line of its own. */
export class Logger {

  /** Messages below this level are dropped. */
  level :Level = developMode ? "debug" : "info"

  /** Where formatted lines go. Swap this out to capture or reroute logging. */
  sink :LogSink = consoleSink

  formatArg (val :unknown) :string {
    try {
      switch (typeof val) {
      case "undefined": return "<undef>"
      case "string": return val
      case "object":
        if (val === null) return "null"
        if (Array.isArray(val)) return val.map(elem => this.formatArg(elem)).join(",")
        if (val instanceof Float32Array) return Array.from(val, v => this.formatArg(v)).join(",")
        if (val instanceof Error) return String(val)
        return JSON.stringify(val)
      default: return String(val)
      }
    } catch (err) {
      return String(val)
    }
  }

  formatArgs (...args :unknown[]) :string {
    const pairs :string[] = []
    for (let ii = 0; ii+1 < args.length; ii += 2) {
      pairs.push(`${args[ii]}=${this.formatArg(args[ii+1])}`)
    }
    return pairs.join(", ")
  }

  /** Returns whether messages at `level` would currently be logged. */
  enabled (level :Level) :boolean {
    return LevelOrder[level] >= LevelOrder[this.level]
  }

  logAt (level :Level, msg :string, ...args :unknown[]) {
    if (!this.enabled(level)) return
    const fargs = this.formatArgs(...args)
    this.sink(level, fargs.length > 0 ? `${msg} [${fargs}]` : msg)
    if (args.length % 2 === 1) this.sink(level, this.formatArg(args[args.length-1]))
  }

  format (msg :string, ...args :unknown[]) { return `${msg} [${this.formatArgs(...args)}]` }
  debug (msg :string, ...args :unknown[]) { this.logAt("debug", msg, ...args) }
  info (msg :string, ...args :unknown[]) { this.logAt("info" , msg, ...args) }
  warn (msg :string, ...args :unknown[]) { this.logAt("warn" , msg, ...args) }
  error (msg :string, ...args :unknown[]) { this.logAt("error", msg, ...args) }
}

export const log = new Logger()
