import {dim2, rect, vec2} from "../core/math"
import {log} from "../core/util"
import {WidgetId} from "../widget/id"

/** Where a widget goes: at a fixed rect in window coordinates, or at an offset from the top-left of
  * another widget. Relative placements name their target by id, so two widgets may refer to each
  * other without either holding the other. */
export type Placement =
  {type :"abs", rect :rect} |
  {type :"rel", of :WidgetId, offset :vec2, size :dim2}

export const absolute = (x :number, y :number, width :number, height :number) :Placement =>
  ({type: "abs", rect: rect.fromValues(x, y, width, height)})

export const relative = (
  of :WidgetId, dx :number, dy :number, width :number, height :number
) :Placement => ({
  type: "rel", of, offset: vec2.fromValues(dx, dy), size: dim2.fromValues(width, height),
})

function placementEquals (a :Placement, b :Placement) :boolean {
  if (a.type === "abs") return b.type === "abs" && rect.eq(a.rect, b.rect)
  return b.type === "rel" && a.of === b.of &&
    vec2.exactEquals(a.offset, b.offset) && dim2.eq(a.size, b.size)
}

/** Resolves placements to rects.
  *
  * Placements persist from pass to pass, so a widget placed relative to one that has not been
  * placed yet this pass is resolved against its target's previous placement. Resolved rects are cached
  * until the next pass, or until a placement changes. */
export class Layout {
  private readonly placements = new Map<WidgetId, Placement>()
  private readonly resolved = new Map<WidgetId, rect>()

  /** Starts a pass, forgetting every resolved rect. */
  beginPass () {
    this.resolved.clear()
  }

  /** Sets the placement of `id`. */
  place (id :WidgetId, placement :Placement) {
    const prev = this.placements.get(id)
    if (prev && placementEquals(prev, placement)) return
    this.placements.set(id, placement)
    // anything resolved so far may have been resolved against the old placement
    this.resolved.clear()
  }

  /** Returns the placement of `id`, if it has one. */
  placement (id :WidgetId) :Placement|undefined { return this.placements.get(id) }

  /** The ids of every placed widget. */
  ids () :WidgetId[] { return Array.from(this.placements.keys()) }

  /** Forgets the placement of `id`. */
  remove (id :WidgetId) {
    if (this.placements.delete(id)) this.resolved.clear()
  }

  /** Resolves `id` to a rect in window coordinates. A widget with no placement resolves to an empty
    * rect at the origin. When a chain of relative placements loops back on itself, the placement
    * that closes the loop is resolved as though its offset were absolute. */
  resolve (id :WidgetId) :rect {
    return rect.clone(this.resolveIn(id, new Set()))
  }

  private resolveIn (id :WidgetId, chain :Set<WidgetId>) :rect {
    const cached = this.resolved.get(id)
    if (cached) return cached

    const placement = this.placements.get(id)
    let bounds :rect
    if (!placement) bounds = rect.create()
    else if (placement.type === "abs") bounds = rect.clone(placement.rect)
    else {
      const offset = placement.offset, size = placement.size
      if (placement.of === id || chain.has(placement.of)) {
        log.warn("Breaking layout cycle", "widget", id, "of", placement.of)
        bounds = rect.fromValues(offset[0], offset[1], size[0], size[1])
      } else {
        chain.add(id)
        const base = this.resolveIn(placement.of, chain)
        bounds = rect.fromValues(base[0] + offset[0], base[1] + offset[1], size[0], size[1])
      }
    }
    this.resolved.set(id, bounds)
    return bounds
  }
}
