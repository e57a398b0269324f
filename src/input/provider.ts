import {vec2} from "../core/math"
import {ClickEvent, DoubleClickEvent, DragEvent, ScrollEvent, TapEvent, UiEvent} from "./event"
import {Key, Modifiers} from "./keyboard"
import {MouseButton} from "./mouse"
import {InputState} from "./state"

/** Queries over one cycle's semantic events. The global view ([[EventSynthesizer]]) answers them for
  * the whole window, a [[WidgetInput]] answers them for one widget in its own coordinates. */
export abstract class InputProvider {

  /** The events of the current cycle visible through this provider, in the order they happened. */
  abstract events () :UiEvent[]

  /** The input state as of the last event, in this provider's coordinates. */
  abstract get state () :InputState

  mousePosition () :vec2 { return vec2.clone(this.state.mouseXy) }

  modifiers () :Modifiers { return this.state.modifiers }

  /** Returns the first click of `button` this cycle, if any. */
  mouseClick (button :MouseButton) :ClickEvent|undefined {
    for (const event of this.events()) {
      if (event.type === "click" && event.button === button) return event
    }
    return undefined
  }

  mouseLeftClick () :ClickEvent|undefined { return this.mouseClick(MouseButton.Left) }
  mouseRightClick () :ClickEvent|undefined { return this.mouseClick(MouseButton.Right) }

  /** Returns the first double click of `button` this cycle, if any. */
  mouseDoubleClick (button :MouseButton) :DoubleClickEvent|undefined {
    for (const event of this.events()) {
      if (event.type === "doubleClick" && event.button === button) return event
    }
    return undefined
  }

  /** Returns the last drag of `button` this cycle, if any. */
  mouseDrag (button :MouseButton) :DragEvent|undefined {
    let drag :DragEvent|undefined
    for (const event of this.events()) {
      if (event.type === "drag" && event.button === button) drag = event
    }
    return drag
  }

  mouseLeftDrag () :DragEvent|undefined { return this.mouseDrag(MouseButton.Left) }

  /** Returns the sum of every scroll this cycle, carrying the modifiers of the last one, or
    * `undefined` if nothing scrolled. */
  scroll () :ScrollEvent|undefined {
    let sum :ScrollEvent|undefined
    for (const event of this.events()) {
      if (event.type !== "scroll") continue
      if (!sum) sum = event
      else sum = {type: "scroll", x: sum.x+event.x, y: sum.y+event.y, modifiers: event.modifiers}
    }
    return sum
  }

  /** Returns all text entered this cycle, concatenated, or `undefined` if there was none. */
  textJustEntered () :string|undefined {
    let text :string|undefined
    for (const event of this.events()) {
      if (event.type !== "raw" || event.input.type !== "text") continue
      text = (text || "") + event.input.text
    }
    return text
  }

  keysJustPressed () :Key[] { return this.keys("press") }
  keysJustReleased () :Key[] { return this.keys("release") }

  mouseButtonsJustPressed () :MouseButton[] { return this.mouseButtons("press") }
  mouseButtonsJustReleased () :MouseButton[] { return this.mouseButtons("release") }

  /** Returns where `button` was pressed if it is down now, otherwise `undefined`. */
  mouseButtonDown (button :MouseButton) :vec2|undefined {
    const pos = this.state.buttons.get(button)
    return pos.type === "down" ? vec2.clone(pos.xy) : undefined
  }

  /** Returns the first tap this cycle, if any. */
  tap () :TapEvent|undefined {
    for (const event of this.events()) {
      if (event.type === "tap") return event
    }
    return undefined
  }

  private keys (type :"press"|"release") :Key[] {
    const keys :Key[] = []
    for (const event of this.events()) {
      if (event.type !== "raw") continue
      const input = event.input
      if (input.type !== "press" && input.type !== "release") continue
      const button = input.button
      if (input.type === type && button.type === "keyboard") keys.push(button.key)
    }
    return keys
  }

  private mouseButtons (type :"press"|"release") :MouseButton[] {
    const buttons :MouseButton[] = []
    for (const event of this.events()) {
      if (event.type !== "raw") continue
      const input = event.input
      if (input.type !== "press" && input.type !== "release") continue
      const button = input.button
      if (input.type === type && button.type === "mouse") buttons.push(button.button)
    }
    return buttons
  }
}
