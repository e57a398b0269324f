import {vec2} from "../core/math"
import {WidgetId} from "../widget/id"

/** The mouse buttons tracked by the input state. */
export const enum MouseButton {
  Unknown = 0, Left, Right, Middle, X1, X2, Button6, Button7, Button8
}

export const NumButtons = 9

/** Returns the [[MouseButton]] for a DOM `MouseEvent.button` index. */
export function domButton (index :number) :MouseButton {
  switch (index) {
  case 0: return MouseButton.Left
  case 1: return MouseButton.Middle
  case 2: return MouseButton.Right
  case 3: return MouseButton.X1
  case 4: return MouseButton.X2
  default: return MouseButton.Unknown
  }
}

/** The state of one button: up, or down since it was pressed at `xy` over `widget` (if any). */
export type ButtonPosition = {type :"up"} | {type :"down", xy :vec2, widget? :WidgetId}

const Up :ButtonPosition = {type: "up"}

function copyPosition (pos :ButtonPosition, offset? :vec2) :ButtonPosition {
  if (pos.type === "up") return Up
  const xy = vec2.clone(pos.xy)
  if (offset) vec2.sub(xy, xy, offset)
  return pos.widget === undefined ? {type: "down", xy} : {type: "down", xy, widget: pos.widget}
}

/** The positions of all mouse buttons. */
export class ButtonMap {
  private readonly positions :ButtonPosition[] = []

  constructor () {
    for (let ii = 0; ii < NumButtons; ii += 1) this.positions.push(Up)
  }

  /** Returns the position of `button`. */
  get (button :MouseButton) :ButtonPosition { return this.positions[button] }

  /** Records `button` as pressed at `xy` over `widget`. */
  press (button :MouseButton, xy :vec2, widget? :WidgetId) {
    this.positions[button] = copyPosition({type: "down", xy, widget})
  }

  /** Records `button` as released.
    * @return the position it was in before, which is `up` for a stray release. */
  release (button :MouseButton) :ButtonPosition {
    const old = this.positions[button]
    this.positions[button] = Up
    return old
  }

  /** Returns the buttons that are down, in button order, with their press positions. */
  pressed () :Array<[MouseButton, vec2, WidgetId|undefined]> {
    const pressed :Array<[MouseButton, vec2, WidgetId|undefined]> = []
    this.positions.forEach((pos, button) => {
      if (pos.type === "down") pressed.push([button, pos.xy, pos.widget])
    })
    return pressed
  }

  /** Whether any button is down. */
  get anyDown () :boolean { return this.positions.some(pos => pos.type === "down") }

  /** Returns a copy of this map with every press position translated by `-xy`. */
  relativeTo (xy :vec2) :ButtonMap {
    const map = new ButtonMap()
    this.positions.forEach((pos, button) => map.positions[button] = copyPosition(pos, xy))
    return map
  }

  clone () :ButtonMap {
    const map = new ButtonMap()
    this.positions.forEach((pos, button) => map.positions[button] = copyPosition(pos))
    return map
  }
}
