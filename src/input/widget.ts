import {rect, vec2} from "../core/math"
import {WidgetId} from "../widget/id"
import {UiEvent, eventRelativeTo, isKeyboardEvent, isMouseEvent} from "./event"
import {EventSynthesizer} from "./global"
import {InputProvider} from "./provider"
import {InputState} from "./state"

function mouseEventIsOver (bounds :rect, event :UiEvent, state :InputState) :boolean {
  switch (event.type) {
  case "click":
  case "doubleClick": return rect.contains(bounds, event.xy)
  case "drag": return rect.contains(bounds, event.start) || rect.contains(bounds, event.end)
  default: return rect.contains(bounds, state.mouseXy)
  }
}

/** Whether `widget` gets to see `event`, given the state just after it. `bounds` and `state` are in
  * window coordinates. */
function isVisible (widget :WidgetId, bounds :rect, event :UiEvent, state :InputState) :boolean {
  if (event.type === "tap") return event.widget === widget
  if (isMouseEvent(event)) {
    const holder = state.capturingMouse
    return holder === undefined ? mouseEventIsOver(bounds, event, state) : holder === widget
  }
  if (isKeyboardEvent(event)) {
    const holder = state.capturingKeyboard
    return holder === undefined || holder === widget
  }
  // scrolls, focus, resizes and capture changes are seen by everyone
  return true
}

/** The input of one cycle as one widget sees it.
  *
  * Events go to a widget only if it may see them: mouse events when it holds the mouse capture (or
  * nobody does and the event happened over it) and keyboard events unless another widget holds the
  * keyboard capture. Visibility is decided by replaying the log from the start of the cycle, so a
  * click that happened before capture moved is judged by where capture was at the time. Positions
  * are relative to the widget's top-left corner. */
export class WidgetInput extends InputProvider {
  private readonly _events :UiEvent[] = []
  private readonly _state :InputState

  constructor (readonly widget :WidgetId, readonly bounds :rect, readonly global :EventSynthesizer) {
    super()
    const origin = rect.pos(bounds), replay = global.start.clone()
    for (const event of global.events()) {
      replay.apply(event)
      if (!isVisible(widget, bounds, event, replay)) continue
      this._events.push(eventRelativeTo(event, origin))
    }
    this._state = global.state.relativeTo(origin)
  }

  events () :UiEvent[] { return this._events.slice() }

  get state () :InputState { return this._state }

  /** Whether this widget holds the mouse capture. */
  get capturesMouse () :boolean { return this.global.state.capturingMouse === this.widget }

  /** Whether this widget holds the keyboard capture. */
  get capturesKeyboard () :boolean { return this.global.state.capturingKeyboard === this.widget }

  mouseIsOverWidget () :boolean {
    return rect.contains(this.bounds, this.global.state.mouseXy)
  }

  /** Returns the mouse position relative to this widget if the mouse is over it. */
  maybeMousePosition () :vec2|undefined {
    return this.mouseIsOverWidget() ? this.mousePosition() : undefined
  }
}
