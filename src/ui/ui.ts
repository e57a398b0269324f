import {UiConfig, DefaultConfig} from "../core/config"
import {dim2, rect, vec2} from "../core/math"
import {Mutable, Value} from "../core/react"
import {log} from "../core/util"
import {RawInput} from "../input/event"
import {EventSynthesizer} from "../input/global"
import {WidgetInput} from "../input/widget"
import {IdArena, IdSet, WidgetId} from "../widget/id"
import {ChangeTracker, StateKind, WidgetCachedState} from "./cache"
import {Layout, Placement} from "./layout"
import {Primitive} from "./render"

/** The cursor a host should show, as a CSS cursor name. */
export type CursorIcon = "default" | "pointer" | "text" | "crosshair" | "move" | "grab" |
  "grabbing" | "not-allowed" | "wait" | "ew-resize" | "ns-resize" | "nesw-resize" | "nwse-resize"

/** What a widget gets while it is updated. */
export interface UpdateArgs<S> {
  id :WidgetId
  /** The widget's rect, in window coordinates. */
  bounds :rect
  state :WidgetCachedState<S>
  input :WidgetInput
  cell :UiCell
}

/** A widget: a kind of state, where it goes, how that state reacts to input and how it is drawn.
  * Widgets are rebuilt every pass; their state persists in the [[Ui]] under their id. */
export interface Widget<S> {
  readonly kind :StateKind<S>
  readonly placement :Placement
  /** Creates the state of a widget visited for the first time. */
  init () :S
  update (args :UpdateArgs<S>) :void
  draw (state :S, bounds :rect, into :Primitive[]) :void
}

type Drawer = (into :Primitive[]) => void

/** The handle a build function uses to set widgets during one pass. */
export class UiCell {
  private _cursor :CursorIcon = "default"
  private readonly _hits :Array<[WidgetId, rect]> = []
  private readonly _drawers :Drawer[] = []

  constructor (readonly ui :Ui) {}

  /** The window size. */
  get windowSize () :dim2 { return this.ui.windowSize }

  get cursor () :CursorIcon { return this._cursor }
  get hits () :Array<[WidgetId, rect]> { return this._hits }
  get drawers () :Drawer[] { return this._drawers }

  /** Places and updates `widget` under `id`. Widgets set later are drawn over (and hit before)
    * widgets set earlier.
    * @return the widget's rect, in window coordinates. */
  set<S> (id :WidgetId, widget :Widget<S>) :rect {
    const ui = this.ui
    ui.layout.place(id, widget.placement)
    const bounds = ui.layout.resolve(id)
    const state = ui.tracker.visit(id, widget.kind, () => widget.init())
    const input = new WidgetInput(id, bounds, ui.input)
    widget.update({id, bounds, state, input, cell: this})
    this._hits.push([id, bounds])
    this._drawers.push(into => widget.draw(state.value, bounds, into))
    return bounds
  }

  captureMouse (id :WidgetId) { this.ui.input.captureMouse(id) }
  uncaptureMouse (id :WidgetId) { this.ui.input.uncaptureMouse(id) }
  captureKeyboard (id :WidgetId) { this.ui.input.captureKeyboard(id) }
  uncaptureKeyboard (id :WidgetId) { this.ui.input.uncaptureKeyboard(id) }

  /** Requests `icon` as the cursor. The last request of a pass wins. */
  setCursor (icon :CursorIcon) { this._cursor = icon }
}

/** Drives update cycles: feeds raw input to the synthesizer, runs rebuild passes over the widget
  * tree and hands out primitives when something changed. */
export class Ui {
  readonly arena :IdArena
  readonly input :EventSynthesizer
  readonly tracker = new ChangeTracker()
  readonly layout = new Layout()
  readonly windowSize = dim2.create()

  private readonly _cursor = Mutable.local<CursorIcon>("default")
  private _hits :Array<[WidgetId, rect]> = []
  private _drawers :Drawer[] = []

  constructor (readonly config :Readonly<UiConfig> = DefaultConfig) {
    if (config.logLevel) log.level = config.logLevel
    this.arena = new IdArena(config.idCapacity)
    this.input = new EventSynthesizer(config)
    this.input.hitTester = xy => this.widgetAt(xy)
  }

  /** The cursor requested by the last pass. */
  get cursor () :Value<CursorIcon> { return this._cursor }

  /** Whether the next [[drawIfChanged]] will yield primitives. */
  get redrawPending () :boolean { return this.tracker.changed }

  /** Returns a fresh set of named ids allocated from this ui's arena. */
  widgetIds () :IdSet { return new IdSet(this.arena) }

  /** Returns the top-most widget of the last pass whose rect contains `xy`. */
  widgetAt (xy :vec2) :WidgetId|undefined {
    for (let ii = this._hits.length-1; ii >= 0; ii -= 1) {
      const [id, bounds] = this._hits[ii]
      if (rect.contains(bounds, xy)) return id
    }
    return undefined
  }

  /** Feeds a raw input to this ui. A resize or regained focus forces a redraw. */
  handleEvent (input :RawInput) {
    this.input.handle(input)
    if (input.type === "resize") {
      dim2.set(this.windowSize, input.width, input.height)
      this.tracker.needsRedraw()
    } else if (input.type === "focus" && input.focused) this.tracker.needsRedraw()
  }

  /** Runs one rebuild pass: `build` sets every widget that exists this pass, then the cycle's
    * input is consumed. */
  setWidgets (build :(cell :UiCell) => void) {
    const cell = new UiCell(this)
    this.tracker.beginPass()
    this.layout.beginPass()
    build(cell)
    this.tracker.endPass()
    const live = new Set(cell.hits.map(([id]) => id))
    for (const id of this.layout.ids()) if (!live.has(id)) this.layout.remove(id)
    this._hits = cell.hits
    this._drawers = cell.drawers
    this._cursor.update(cell.cursor)
    this.input.resetCycle()
    if (log.enabled("debug")) log.debug("Ui pass", "widgets", cell.hits.length,
                                        "changed", this.tracker.changed)
  }

  /** Returns the primitives of the last pass, in drawing order, if anything changed since the last
    * call. Otherwise returns `undefined`, and nothing needs drawing. */
  drawIfChanged () :Primitive[]|undefined {
    if (!this.tracker.takeChanged()) return undefined
    const into :Primitive[] = []
    for (const drawer of this._drawers) drawer(into)
    return into
  }
}
