import {vec2} from "../core/math"
import {RawInput, UiEvent, cursorMove, keyPress, keyRelease, mousePress, mouseRelease} from "./event"
import {CtrlLeft, ShiftLeft, ShiftMask, ShiftRight, formatModifiers, hasModifier} from "./keyboard"
import {MouseButton, domButton} from "./mouse"
import {InputState} from "./state"

const raw = (input :RawInput) :UiEvent => ({type: "raw", input})

function pressedAt (state :InputState, button :MouseButton) :number[]|undefined {
  const pos = state.buttons.get(button)
  return pos.type === "down" ? Array.from(pos.xy) : undefined
}

function stateWithDownButton () :InputState {
  const state = new InputState()
  state.apply(raw(cursorMove(-20, -10)))
  state.apply(raw(mousePress(MouseButton.Left)))
  state.apply(raw(cursorMove(50, -10)))
  return state
}

test("relative state", () => {
  const state = stateWithDownButton()
  const rel = state.relativeTo(vec2.fromValues(20, 20))
  expect(Array.from(rel.mouseXy)).toEqual([30, -30])
  expect(pressedAt(rel, MouseButton.Left)).toEqual([-40, -30])
  // the source state is untouched
  expect(Array.from(state.mouseXy)).toEqual([50, -10])
  expect(pressedAt(state, MouseButton.Left)).toEqual([-20, -10])
})

test("relative state composes", () => {
  const state = stateWithDownButton()
  const twice = state.relativeTo(vec2.fromValues(5, 7)).relativeTo(vec2.fromValues(15, 13))
  const once = state.relativeTo(vec2.fromValues(20, 20))
  expect(Array.from(twice.mouseXy)).toEqual(Array.from(once.mouseXy))
  expect(pressedAt(twice, MouseButton.Left)).toEqual(pressedAt(once, MouseButton.Left))
})

test("relative touches", () => {
  const state = new InputState()
  const xy = vec2.fromValues(12, 8)
  state.touches.set(1, {start: {time: 0, xy, widget: 2}, xy: vec2.fromValues(14, 9), widget: 2})
  const touch = state.relativeTo(vec2.fromValues(10, 10)).touches.get(1)
  expect(touch && Array.from(touch.start.xy)).toEqual([2, -2])
  expect(touch && Array.from(touch.xy)).toEqual([4, -1])
  expect(touch && touch.widget).toBe(2)
})

test("button state", () => {
  const state = stateWithDownButton()
  state.apply(raw(mousePress(MouseButton.Right)))
  const pressed = state.buttons.pressed().map(([button]) => button)
  expect(pressed).toEqual([MouseButton.Left, MouseButton.Right])
  state.apply(raw(mouseRelease(MouseButton.Left)))
  expect(pressedAt(state, MouseButton.Left)).toBeUndefined()
  expect(state.buttons.anyDown).toBe(true)
  state.apply(raw(mouseRelease(MouseButton.Right)))
  expect(state.buttons.anyDown).toBe(false)
  expect(domButton(2)).toBe(MouseButton.Right)
})

test("modifier bits", () => {
  const state = new InputState()
  state.apply(raw(keyPress("ShiftLeft")))
  state.apply(raw(keyPress("ShiftRight")))
  state.apply(raw(keyPress("KeyA")))
  expect(state.modifiers).toBe(ShiftLeft | ShiftRight)
  state.apply(raw(keyRelease("ShiftLeft")))
  expect(state.modifiers).toBe(ShiftRight)
  expect(hasModifier(state.modifiers, ShiftMask)).toBe(true)
  state.apply(raw(keyRelease("ShiftRight")))
  expect(hasModifier(state.modifiers, ShiftMask)).toBe(false)
  expect(formatModifiers(CtrlLeft | ShiftRight)).toBe("Ctrl+Shift+")
})

test("capture events", () => {
  const state = new InputState()
  state.apply({type: "captureMouse", widget: 3})
  state.apply({type: "captureKeyboard", widget: 4})
  expect([state.capturingMouse, state.capturingKeyboard]).toEqual([3, 4])
  state.apply({type: "uncaptureMouse", widget: 4})
  expect(state.capturingMouse).toBe(3)
  const copy = state.clone()
  state.apply({type: "uncaptureMouse", widget: 3})
  expect(state.capturingMouse).toBeUndefined()
  expect(copy.capturingMouse).toBe(3)
  expect(copy.capturingKeyboard).toBe(4)
})
