import {rect, vec2} from "../core/math"
import {
  cursorMove, isMouseEvent, mousePress, mouseRelease, scrollMove, textInput, touchMove,
} from "./event"
import {EventSynthesizer} from "./global"
import {MouseButton} from "./mouse"
import {WidgetInput} from "./widget"

const A = 1, B = 2
const boundsA = rect.fromValues(20, 20, 100, 100), boundsB = rect.fromValues(200, 20, 100, 100)

function twoWidgets () :EventSynthesizer {
  const synth = new EventSynthesizer()
  synth.hitTester = xy =>
    rect.contains(boundsA, xy) ? A : rect.contains(boundsB, xy) ? B : undefined
  return synth
}

const inputA = (synth :EventSynthesizer) => new WidgetInput(A, boundsA, synth)
const inputB = (synth :EventSynthesizer) => new WidgetInput(B, boundsB, synth)

test("clicks go to the capturing widget, in its coordinates", () => {
  const synth = twoWidgets()
  synth.handle(cursorMove(50, 50))
  synth.handle(mousePress(MouseButton.Left))
  synth.handle(mouseRelease(MouseButton.Left))

  const click = inputA(synth).mouseLeftClick()
  expect(click && Array.from(click.xy)).toEqual([30, 30])
  expect(inputB(synth).mouseLeftClick()).toBeUndefined()
  expect(inputA(synth).mouseButtonsJustPressed()).toEqual([MouseButton.Left])
  expect(inputB(synth).mouseButtonsJustPressed()).toEqual([])
})

test("a widget without capture sees no mouse events while the cursor is over it", () => {
  const synth = twoWidgets()
  synth.handle(cursorMove(50, 50))
  synth.handle(mousePress(MouseButton.Left))
  synth.handle(cursorMove(250, 50))
  synth.handle(mouseRelease(MouseButton.Left))

  const b = inputB(synth)
  expect(b.mouseIsOverWidget()).toBe(true)
  expect(b.events().filter(isMouseEvent)).toEqual([])
  expect(b.mouseLeftDrag()).toBeUndefined()

  const drag = inputA(synth).mouseLeftDrag()
  expect(drag && drag.inProgress).toBe(false)
  expect(drag && Array.from(drag.start)).toEqual([30, 30])
  expect(drag && Array.from(drag.end)).toEqual([230, 30])
})

test("uncaptured mouse events go to the widget they happened over", () => {
  const synth = new EventSynthesizer()
  synth.handle(cursorMove(50, 50))
  synth.handle(mousePress(MouseButton.Right))
  synth.handle(mouseRelease(MouseButton.Right))
  expect(synth.state.capturingMouse).toBeUndefined()
  const click = inputA(synth).mouseRightClick()
  expect(click && Array.from(click.xy)).toEqual([30, 30])
  expect(inputB(synth).mouseRightClick()).toBeUndefined()
})

test("events are judged by the capture in force when they happened", () => {
  const synth = twoWidgets()
  synth.handle(cursorMove(50, 50))
  synth.handle(mousePress(MouseButton.Left))
  synth.handle(mouseRelease(MouseButton.Left))
  synth.captureMouse(B)
  expect(inputA(synth).mouseLeftClick()).toBeDefined()
  expect(inputB(synth).mouseLeftClick()).toBeUndefined()
  expect(inputA(synth).capturesMouse).toBe(false)
  expect(inputB(synth).capturesMouse).toBe(true)
})

test("a press that moves capture goes to the widget pressed on", () => {
  const synth = twoWidgets()
  synth.handle(cursorMove(50, 50))
  synth.handle(mousePress(MouseButton.Left))
  synth.handle(cursorMove(250, 50))
  synth.handle(mousePress(MouseButton.Right))
  expect(synth.state.capturingMouse).toBe(B)

  const a = inputA(synth), b = inputB(synth)
  expect(a.capturesMouse).toBe(false)
  expect(a.mouseButtonsJustPressed()).toEqual([MouseButton.Left])
  expect(b.capturesMouse).toBe(true)
  expect(b.mouseButtonsJustPressed()).toEqual([MouseButton.Right])
  expect(b.mouseButtonDown(MouseButton.Right)).toEqual(vec2.fromValues(50, 30))
})

test("scrolls bypass capture", () => {
  const synth = twoWidgets()
  synth.handle(cursorMove(50, 50))
  synth.handle(mousePress(MouseButton.Left))
  synth.handle(scrollMove(0, 5))
  synth.handle(scrollMove(2, 5))
  expect(synth.state.capturingMouse).toBe(A)
  expect(inputB(synth).scroll()).toEqual({type: "scroll", x: 2, y: 10, modifiers: 0})
  expect(inputA(synth).scroll()).toEqual({type: "scroll", x: 2, y: 10, modifiers: 0})
})

test("keyboard events honor keyboard capture", () => {
  const free = twoWidgets()
  free.handle(textInput("x"))
  expect(inputA(free).textJustEntered()).toBe("x")
  expect(inputB(free).textJustEntered()).toBe("x")

  const held = twoWidgets()
  held.handle(cursorMove(50, 50))
  held.handle(mousePress(MouseButton.Left))
  held.handle(textInput("y"))
  expect(inputA(held).capturesKeyboard).toBe(true)
  expect(inputA(held).textJustEntered()).toBe("y")
  expect(inputB(held).textJustEntered()).toBeUndefined()
})

test("mouse position is widget relative", () => {
  const synth = twoWidgets()
  synth.handle(cursorMove(50, 60))
  const a = inputA(synth), b = inputB(synth)
  expect(Array.from(a.mousePosition())).toEqual([30, 40])
  expect(a.mouseIsOverWidget()).toBe(true)
  expect(a.maybeMousePosition()).toEqual(vec2.fromValues(30, 40))
  expect(Array.from(b.mousePosition())).toEqual([-150, 40])
  expect(b.maybeMousePosition()).toBeUndefined()
})

test("taps go to the tapped widget", () => {
  const synth = twoWidgets()
  synth.handle(touchMove("start", 7, 60, 60))
  synth.handle(touchMove("end", 7, 60, 60))
  const tap = inputA(synth).tap()
  expect(tap && Array.from(tap.xy)).toEqual([40, 40])
  expect(inputB(synth).tap()).toBeUndefined()
})
