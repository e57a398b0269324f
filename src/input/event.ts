import {vec2} from "../core/math"
import {unreachableCase} from "../core/util"
import {WidgetId} from "../widget/id"
import {Key, Modifiers} from "./keyboard"
import {MouseButton} from "./mouse"

//
// Raw input: what the host window system reports

export type TouchId = number
export type TouchPhase = "start" | "move" | "end" | "cancel"

/** One step of a touch interaction, in window coordinates. */
export interface Touch {
  phase :TouchPhase
  id :TouchId
  xy :vec2
}

export type Button = {type :"mouse", button :MouseButton} | {type :"keyboard", key :Key}

export type Motion =
  {type :"cursor", x :number, y :number} |
  {type :"scroll", x :number, y :number} |
  {type :"touch", touch :Touch}

/** An event reported by the host, before interpretation. Everything in a raw input is structured
  * cloneable so that it can cross a message port. */
export type RawInput =
  {type :"press", button :Button} |
  {type :"release", button :Button} |
  {type :"move", motion :Motion} |
  {type :"text", text :string} |
  {type :"focus", focused :boolean} |
  {type :"resize", width :number, height :number}

export const mousePress = (button :MouseButton) :RawInput =>
  ({type: "press", button: {type: "mouse", button}})
export const mouseRelease = (button :MouseButton) :RawInput =>
  ({type: "release", button: {type: "mouse", button}})
export const keyPress = (key :Key) :RawInput => ({type: "press", button: {type: "keyboard", key}})
export const keyRelease = (key :Key) :RawInput => ({type: "release", button: {type: "keyboard", key}})
export const cursorMove = (x :number, y :number) :RawInput =>
  ({type: "move", motion: {type: "cursor", x, y}})
export const scrollMove = (x :number, y :number) :RawInput =>
  ({type: "move", motion: {type: "scroll", x, y}})
export const touchMove = (phase :TouchPhase, id :TouchId, x :number, y :number) :RawInput =>
  ({type: "move", motion: {type: "touch", touch: {phase, id, xy: vec2.fromValues(x, y)}}})
export const textInput = (text :string) :RawInput => ({type: "text", text})

//
// Semantic events: what the synthesizer derives from raw input

/** A press and release of `button` that moved no farther than the drag threshold. `xy` is where
  * the press happened. */
export interface ClickEvent {
  type :"click"
  button :MouseButton
  xy :vec2
  modifiers :Modifiers
}

/** A click that follows a click of the same button, in the same place, soon enough. */
export interface DoubleClickEvent {
  type :"doubleClick"
  button :MouseButton
  xy :vec2
  modifiers :Modifiers
}

/** Movement with `button` held that went beyond the drag threshold. Drags are reported on every
  * qualifying move with `inProgress` set, and once more on release without it. */
export interface DragEvent {
  type :"drag"
  button :MouseButton
  start :vec2
  end :vec2
  inProgress :boolean
  modifiers :Modifiers
}

export interface ScrollEvent {
  type :"scroll"
  x :number
  y :number
  modifiers :Modifiers
}

/** A touch that started and ended over `widget`. */
export interface TapEvent {
  type :"tap"
  id :TouchId
  xy :vec2
  widget :WidgetId
}

export type CaptureType = "captureMouse" | "uncaptureMouse" | "captureKeyboard" | "uncaptureKeyboard"

export interface CaptureEvent {
  type :CaptureType
  widget :WidgetId
}

export interface RawEvent {
  type :"raw"
  input :RawInput
}

export type UiEvent = ClickEvent | DoubleClickEvent | DragEvent | ScrollEvent | TapEvent |
  CaptureEvent | RawEvent

/** Whether `event` comes from the mouse, and is thus subject to mouse capture. */
export function isMouseEvent (event :UiEvent) :boolean {
  switch (event.type) {
  case "click":
  case "doubleClick":
  case "drag": return true
  case "raw":
    const input = event.input
    switch (input.type) {
    case "press":
    case "release": return input.button.type === "mouse"
    case "move": return input.motion.type === "cursor"
    default: return false
    }
  default: return false
  }
}

/** Whether `event` comes from the keyboard, and is thus subject to keyboard capture. */
export function isKeyboardEvent (event :UiEvent) :boolean {
  if (event.type !== "raw") return false
  const input = event.input
  switch (input.type) {
  case "press":
  case "release": return input.button.type === "keyboard"
  case "text": return true
  default: return false
  }
}

const rel = (pos :vec2, xy :vec2) => vec2.sub(vec2.create(), pos, xy)

function rawRelativeTo (input :RawInput, xy :vec2) :RawInput {
  if (input.type !== "move") return input
  const motion = input.motion
  switch (motion.type) {
  case "cursor":
    return {type: "move", motion: {type: "cursor", x: motion.x - xy[0], y: motion.y - xy[1]}}
  case "scroll": return input
  case "touch":
    const touch = motion.touch
    return {type: "move", motion: {type: "touch", touch: {...touch, xy: rel(touch.xy, xy)}}}
  default: return unreachableCase(motion, input)
  }
}

/** Returns a copy of `event` with every position in it translated by `-xy`. */
export function eventRelativeTo (event :UiEvent, xy :vec2) :UiEvent {
  switch (event.type) {
  case "click":
  case "doubleClick":
  case "tap": return {...event, xy: rel(event.xy, xy)}
  case "drag": return {...event, start: rel(event.start, xy), end: rel(event.end, xy)}
  case "raw": return {type: "raw", input: rawRelativeTo(event.input, xy)}
  case "scroll":
  case "captureMouse":
  case "uncaptureMouse":
  case "captureKeyboard":
  case "uncaptureKeyboard": return event
  default: return unreachableCase(event, event)
  }
}
