import {Remover, addListener, removeListener} from "./util"

/** Decides whether a new value differs from the old one. */
export type Eq<T> = (a:T, b:T) => boolean

/** Reference equality, the default for reactive values. */
export const refEquals = <T>(a :T, b :T) => a === b

/** Thrown when more than one listener fails during a single dispatch. */
export class MultiError extends Error {
  constructor (readonly errors :unknown[]) {
    super(`${errors.length} errors`)
  }
}

/** Returned by a listener to unregister itself. */
export const Remove = {}

/** Consumes a value. Returning [[Remove]] unregisters the listener; other results are ignored. */
export type ValueFn<T> = (value :T) => unknown

/** Consumes a change from `oldValue` to `value`. */
export type ChangeFn<T> = (value :T, oldValue :T) => unknown

function dispatch<F> (listeners :F[], call :(fn :F) => unknown) {
  const errors :unknown[] = []
  for (const listener of listeners.slice()) {
    try {
      if (call(listener) === Remove) removeListener(listeners, listener)
    } catch (error) {
      errors.push(error)
    }
  }
  if (errors.length === 1) throw errors[0]
  else if (errors.length > 1) throw new MultiError(errors)
}

/** Something that emits values over time: a [[Stream]] or a [[Value]]. */
export abstract class Source<T> {

  /** Registers `fn` for emitted values. A current value, if any, is not passed to `fn`. */
  abstract onEmit (fn :ValueFn<T>) :Remover

  /** Registers `fn` for emitted values, calling it right away with the current value if there is
    * one. */
  abstract onValue (fn :ValueFn<T>) :Remover

  /** Calls `fn` with the next emitted value only. */
  next (fn :ValueFn<T>) :Remover {
    return this.onEmit(v => { fn(v) ; return Remove })
  }
}

/** Values with no current value. */
export class Stream<T> extends Source<T> {

  constructor (protected readonly _onEmit :(fn :ValueFn<T>) => Remover) { super() }

  onEmit (fn :ValueFn<T>) :Remover { return this._onEmit(fn) }
  onValue (fn :ValueFn<T>) :Remover { return this._onEmit(fn) }
}

/** A stream fed by calls to [[emit]]. */
export class Emitter<T> extends Stream<T> {
  private readonly listeners :ValueFn<T>[] = []

  constructor () {
    super(fn => addListener(this.listeners, fn))
  }

  emit (value :T) {
    dispatch(this.listeners, fn => fn(value))
  }
}

/** Something with a current value that notifies listeners when it changes. */
export abstract class Value<T> extends Source<T> {
  protected readonly listeners :ChangeFn<T>[] = []

  constructor (readonly eq :Eq<T>) { super() }

  abstract get current () :T

  onEmit (fn :ValueFn<T>) :Remover {
    return addListener(this.listeners, (value :T) => fn(value))
  }

  onValue (fn :ValueFn<T>) :Remover {
    const remover = this.onEmit(fn)
    if (fn(this.current) === Remove) remover()
    return remover
  }
}

/** A value that is updated directly. Updates equal to the current value (per `eq`) are not
  * heard. */
export class Mutable<T> extends Value<T> {
  private _current :T

  static local<T> (start :T, eq :Eq<T> = refEquals) :Mutable<T> { return new Mutable(start, eq) }

  protected constructor (start :T, eq :Eq<T>) {
    super(eq)
    this._current = start
  }

  get current () :T { return this._current }

  update (value :T) {
    const old = this._current
    if (this.eq(value, old)) return
    this._current = value
    dispatch(this.listeners, fn => fn(value, old))
  }
}
