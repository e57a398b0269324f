import {DefaultConfig} from "../core/config"

/** The stable identity of one widget across update cycles. */
export type WidgetId = number

/** Thrown when an [[IdArena]] has handed out every id in its index space. */
export class AllocationExhausted extends Error {
  constructor (readonly capacity :number) {
    super(`Widget id space exhausted [capacity=${capacity}]`)
  }
}

/** Hands out widget ids, monotonically from zero. Ids are never reused within a session. */
export class IdArena {
  private _next = 0

  constructor (readonly capacity = DefaultConfig.idCapacity) {}

  /** The number of ids allocated so far. */
  get allocated () :number { return this._next }

  /** Allocates the next unused id.
    * @throws AllocationExhausted if `capacity` ids have already been allocated. */
  next () :WidgetId {
    if (this._next >= this.capacity) throw new AllocationExhausted(this.capacity)
    return this._next++
  }
}

/** A growable list of ids, for widgets that own a variable number of children.
  *
  * Shrinking a list hides its surplus ids but holds onto them: growing the list again restores the
  * same ids in the same slots, so a child keeps its identity while its parent's count fluctuates. */
export class IdList implements Iterable<WidgetId> {
  // every id this list has ever held; only the first `_length` are visible
  private readonly ids :WidgetId[] = []
  private _length = 0

  /** The number of visible ids. */
  get length () :number { return this._length }

  /** Returns the id in slot `index`, or `undefined` if the slot is not visible. */
  get (index :number) :WidgetId|undefined {
    return index >= 0 && index < this._length ? this.ids[index] : undefined
  }

  /** Grows or truncates this list to exactly `length` visible ids. Slots that held an id before
    * get that id back, new slots are allocated from `arena`. */
  resize (length :number, arena :IdArena) {
    if (length < 0 || !Number.isInteger(length)) throw new Error(
      `Invalid id list length [length=${length}]`)
    while (this.ids.length < length) this.ids.push(arena.next())
    this._length = length
  }

  /** Returns the id in slot `index`, growing the list to cover it if needed. */
  ensure (index :number, arena :IdArena) :WidgetId {
    if (index >= this._length) this.resize(index+1, arena)
    return this.ids[index]
  }

  /** Returns a cursor that walks this list from the start, growing it as it goes. */
  walk () :ListWalk { return new ListWalk(this) }

  /** Returns a copy of the visible ids. */
  toArray () :WidgetId[] { return this.ids.slice(0, this._length) }

  [Symbol.iterator] () :Iterator<WidgetId> { return this.toArray()[Symbol.iterator]() }
}

/** A forward-only cursor over the [[IdList]] it was obtained from. Each call to [[next]] that
  * passes the end of the list grows it by exactly one id. */
export class ListWalk {
  private index = 0

  constructor (readonly list :IdList) {}

  /** The number of ids this walk has produced. */
  get position () :number { return this.index }

  next (arena :IdArena) :WidgetId {
    return this.list.ensure(this.index++, arena)
  }
}

/** Widget ids keyed by name. Each name gets its id (or id list) the first time it is requested and
  * keeps it for the life of the set, which is how a build function gives each of its call sites a
  * stable identity. */
export class IdSet {
  private readonly ids = new Map<string, WidgetId>()
  private readonly lists = new Map<string, IdList>()

  constructor (readonly arena :IdArena) {}

  /** Returns the id for `name`, allocating it on first use. */
  id (name :string) :WidgetId {
    const id = this.ids.get(name)
    if (id !== undefined) return id
    const nid = this.arena.next()
    this.ids.set(name, nid)
    return nid
  }

  /** Returns the id list for `name`, creating an empty one on first use. */
  list (name :string) :IdList {
    const list = this.lists.get(name)
    if (list) return list
    const nlist = new IdList()
    this.lists.set(name, nlist)
    return nlist
  }
}
