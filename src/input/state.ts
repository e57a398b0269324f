import {vec2} from "../core/math"
import {WidgetId} from "../widget/id"
import {UiEvent, TouchId} from "./event"
import {Modifiers, modifierBit} from "./keyboard"
import {ButtonMap} from "./mouse"

/** Where and when a touch began, and which widget it began over. */
export interface TouchStart {
  time :number
  xy :vec2
  widget? :WidgetId
}

/** An active touch: where it began and where it is now. */
export interface TouchState {
  start :TouchStart
  xy :vec2
  widget? :WidgetId
}

function copyTouch (touch :TouchState, offset? :vec2) :TouchState {
  const move = (xy :vec2) => offset ? vec2.sub(vec2.create(), xy, offset) : vec2.clone(xy)
  return {
    start: {time: touch.start.time, xy: move(touch.start.xy), widget: touch.start.widget},
    xy: move(touch.xy),
    widget: touch.widget,
  }
}

/** The state of every input source at one point in a cycle. */
export class InputState {
  /** The mouse position, in window coordinates unless this is a [[relativeTo]] copy. */
  readonly mouseXy = vec2.create()
  buttons = new ButtonMap()
  readonly touches = new Map<TouchId, TouchState>()
  capturingMouse? :WidgetId
  capturingKeyboard? :WidgetId
  /** The top-most widget under the mouse, as of the last cursor move. */
  widgetUnderMouse? :WidgetId
  modifiers :Modifiers = 0

  clone () :InputState {
    return this.copyInto(new InputState())
  }

  /** Returns a copy of this state with every absolute position (the mouse, button press origins
    * and touches) translated by `-xy`. Translations compose: `s.relativeTo(a).relativeTo(b)` equals
    * `s.relativeTo(a+b)`. */
  relativeTo (xy :vec2) :InputState {
    return this.copyInto(new InputState(), xy)
  }

  /** Folds `event` into this state. Capture events move capture, raw cursor moves move the mouse,
    * raw mouse presses and releases change button positions, and modifier keys set and clear their
    * bits. Everything else leaves the state alone. */
  apply (event :UiEvent) {
    switch (event.type) {
    case "captureMouse": this.capturingMouse = event.widget ; break
    case "uncaptureMouse":
      if (this.capturingMouse === event.widget) this.capturingMouse = undefined
      break
    case "captureKeyboard": this.capturingKeyboard = event.widget ; break
    case "uncaptureKeyboard":
      if (this.capturingKeyboard === event.widget) this.capturingKeyboard = undefined
      break
    case "raw":
      const input = event.input
      if (input.type === "move") {
        if (input.motion.type === "cursor") vec2.set(this.mouseXy, input.motion.x, input.motion.y)
      } else if (input.type === "press") {
        const button = input.button
        if (button.type === "mouse") this.buttons.press(
          button.button, this.mouseXy, this.widgetUnderMouse)
        else this.modifiers |= modifierBit(button.key)
      } else if (input.type === "release") {
        const button = input.button
        if (button.type === "mouse") this.buttons.release(button.button)
        else this.modifiers &= ~modifierBit(button.key)
      }
      break
    }
  }

  private copyInto (into :InputState, offset? :vec2) :InputState {
    if (offset) vec2.sub(into.mouseXy, this.mouseXy, offset)
    else vec2.copy(into.mouseXy, this.mouseXy)
    into.buttons = offset ? this.buttons.relativeTo(offset) : this.buttons.clone()
    this.touches.forEach((touch, id) => into.touches.set(id, copyTouch(touch, offset)))
    into.capturingMouse = this.capturingMouse
    into.capturingKeyboard = this.capturingKeyboard
    into.widgetUnderMouse = this.widgetUnderMouse
    into.modifiers = this.modifiers
    return into
  }
}
