import {Data, dataEquals} from "../core/data"
import {Eq} from "../core/react"
import {WidgetId} from "../widget/id"

/** The previous state of one widget, and whether this pass changed it. */
export class WidgetCachedState<T> {

  constructor (private _value :T, readonly eq :Eq<T>, private _dirty :boolean) {}

  /** The current state. */
  get value () :T { return this._value }

  /** Whether the state changed (or was created) since the tracker last looked. */
  get dirty () :boolean { return this._dirty }

  /** Computes a new state from the current one. The new state is kept, and the widget marked
    * dirty, only if it differs from the current state.
    * @return whether the state changed. */
  update (compute :(prev :T) => T) :boolean {
    const next = compute(this._value)
    if (this.eq(next, this._value)) return false
    this._value = next
    this._dirty = true
    return true
  }

  /** Returns whether the state was dirty, and clears the dirty flag. */
  takeDirty () :boolean {
    const dirty = this._dirty
    this._dirty = false
    return dirty
  }
}

/** The view a [[ChangeTracker]] needs of a kind of state, whatever its type. */
interface TrackedKind {
  readonly name :string
  takeDirty (tracker :ChangeTracker, id :WidgetId) :boolean
  drop (tracker :ChangeTracker, id :WidgetId) :void
}

/** A type of widget state, and how to compare two values of it. Widgets of one type share a kind;
  * each kind keeps the states of its widgets for every tracker that has seen them. */
export class StateKind<T> implements TrackedKind {
  private readonly stores = new WeakMap<ChangeTracker, Map<WidgetId, WidgetCachedState<T>>>()

  /** Creates a kind whose states are compared structurally with [[dataEquals]]. */
  static data<T extends Data> (name :string) :StateKind<T> {
    return new StateKind<T>(name, dataEquals)
  }

  constructor (readonly name :string, readonly eq :Eq<T>) {}

  /** Returns the states of this kind held for `tracker`. */
  store (tracker :ChangeTracker) :Map<WidgetId, WidgetCachedState<T>> {
    const store = this.stores.get(tracker)
    if (store) return store
    const nstore = new Map<WidgetId, WidgetCachedState<T>>()
    this.stores.set(tracker, nstore)
    return nstore
  }

  takeDirty (tracker :ChangeTracker, id :WidgetId) :boolean {
    const state = this.store(tracker).get(id)
    return state ? state.takeDirty() : false
  }

  drop (tracker :ChangeTracker, id :WidgetId) {
    this.store(tracker).delete(id)
  }
}

/** Tracks widget state across passes to decide whether anything needs to be redrawn.
  *
  * A pass is changed if any widget visited in it changed its state, if a widget was visited for the
  * first time, or if a widget visited in the previous pass was not visited in this one. The flag
  * accumulates until [[takeChanged]] consumes it. */
export class ChangeTracker {
  private readonly kinds = new Map<WidgetId, TrackedKind>()
  private readonly visited = new Set<WidgetId>()
  private _changed = false

  /** Whether something changed since the last [[takeChanged]]. */
  get changed () :boolean { return this._changed }

  /** The ids of the widgets that have state in this tracker. */
  get ids () :WidgetId[] { return Array.from(this.kinds.keys()) }

  /** Starts a pass. */
  beginPass () {
    this.visited.clear()
  }

  /** Marks `id` as visited this pass and returns its state, creating it with `init` if `id` has no
    * state of `kind` yet. A widget that changes kind starts over with fresh state. */
  visit<T> (id :WidgetId, kind :StateKind<T>, init :() => T) :WidgetCachedState<T> {
    const prior = this.kinds.get(id)
    if (prior && prior !== kind) prior.drop(this, id)
    this.kinds.set(id, kind)
    this.visited.add(id)
    const store = kind.store(this), state = store.get(id)
    if (state) return state
    const nstate = new WidgetCachedState(init(), kind.eq, true)
    store.set(id, nstate)
    return nstate
  }

  /** Returns the state of `id`, if it has state of `kind`. */
  get<T> (id :WidgetId, kind :StateKind<T>) :WidgetCachedState<T>|undefined {
    return kind.store(this).get(id)
  }

  /** Ends a pass, folding the dirty flags of every visited widget into the changed flag and
    * dropping the state of widgets that were not visited. */
  endPass () {
    for (const [id, kind] of Array.from(this.kinds)) {
      if (this.visited.has(id)) {
        if (kind.takeDirty(this, id)) this._changed = true
      } else {
        kind.drop(this, id)
        this.kinds.delete(id)
        this._changed = true
      }
    }
  }

  /** Forces the next [[takeChanged]] to report a change, for a resize or a regained focus. */
  needsRedraw () {
    this._changed = true
  }

  /** Returns whether something changed, and clears the changed flag. */
  takeChanged () :boolean {
    const changed = this._changed
    this._changed = false
    return changed
  }
}
