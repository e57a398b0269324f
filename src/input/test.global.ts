import {makeConfig} from "../core/config"
import {vec2} from "../core/math"
import {WidgetId} from "../widget/id"
import {
  UiEvent, cursorMove, keyPress, keyRelease, mousePress, mouseRelease, scrollMove, textInput,
  touchMove,
} from "./event"
import {EventSynthesizer, InputAnomaly} from "./global"
import {CtrlLeft} from "./keyboard"
import {MouseButton} from "./mouse"

const Left = MouseButton.Left, Right = MouseButton.Right

function summarize (event :UiEvent) :string {
  switch (event.type) {
  case "raw":
    const input = event.input
    return input.type === "move" ? `raw:${input.motion.type}` : `raw:${input.type}`
  case "captureMouse":
  case "uncaptureMouse":
  case "captureKeyboard":
  case "uncaptureKeyboard": return `${event.type}:${event.widget}`
  default: return event.type
  }
}

const summarizeAll = (synth :EventSynthesizer) => synth.events().map(summarize)

// widget 1 covers x < 100, widget 2 covers x >= 100
const twoWidgets = (xy :vec2) :WidgetId|undefined => xy[0] < 100 ? 1 : 2

test("click below the drag threshold", () => {
  const synth = new EventSynthesizer()
  synth.handle(cursorMove(10, 10))
  synth.handle(mousePress(Left))
  synth.handle(cursorMove(12, 12))
  synth.handle(mouseRelease(Left))
  expect(summarizeAll(synth)).toEqual(
    ["raw:cursor", "raw:press", "raw:cursor", "raw:release", "click"])

  const click = synth.mouseClick(Left)
  expect(click && Array.from(click.xy)).toEqual([10, 10])
  expect(click && click.modifiers).toBe(0)
  expect(synth.events().filter(e => e.type === "click").length).toBe(1)
  expect(synth.mouseDrag(Left)).toBeUndefined()
  expect(synth.mouseRightClick()).toBeUndefined()
})

test("movement of exactly the threshold is still a click", () => {
  const synth = new EventSynthesizer()
  synth.handle(mousePress(Left))
  synth.handle(cursorMove(4, 0))
  synth.handle(mouseRelease(Left))
  expect(summarizeAll(synth)).toEqual(["raw:press", "raw:cursor", "raw:release", "click"])
})

test("drag beyond the threshold", () => {
  const synth = new EventSynthesizer()
  synth.handle(cursorMove(0, 0))
  synth.handle(mousePress(Left))
  synth.handle(cursorMove(10, 0))
  synth.handle(cursorMove(20, 0))
  synth.handle(mouseRelease(Left))
  expect(summarizeAll(synth)).toEqual([
    "raw:cursor", "raw:press", "raw:cursor", "drag", "raw:cursor", "drag", "raw:release", "drag"])

  const drags = synth.events().flatMap(e => e.type === "drag" ? [e.inProgress] : [])
  expect(drags).toEqual([true, true, false])
  const drag = synth.mouseLeftDrag()
  expect(drag && drag.inProgress).toBe(false)
  expect(drag && Array.from(drag.start)).toEqual([0, 0])
  expect(drag && Array.from(drag.end)).toEqual([20, 0])
  expect(synth.mouseClick(Left)).toBeUndefined()
})

test("a larger drag threshold", () => {
  const synth = new EventSynthesizer(makeConfig({dragThreshold: 25}))
  synth.handle(mousePress(Left))
  synth.handle(cursorMove(20, 0))
  synth.handle(mouseRelease(Left))
  expect(synth.mouseDrag(Left)).toBeUndefined()
  const click = synth.mouseClick(Left)
  expect(click && Array.from(click.xy)).toEqual([0, 0])
})

test("scrolls are summed", () => {
  const synth = new EventSynthesizer()
  synth.handle(scrollMove(10, 33))
  synth.handle(scrollMove(10, 33))
  synth.handle(keyPress("ControlLeft"))
  synth.handle(scrollMove(10, 33))
  expect(synth.events().filter(e => e.type === "scroll").length).toBe(3)
  expect(synth.scroll()).toEqual({type: "scroll", x: 30, y: 99, modifiers: CtrlLeft})
})

test("pressing moves capture", () => {
  const synth = new EventSynthesizer()
  synth.hitTester = twoWidgets
  synth.handle(cursorMove(10, 10))
  synth.handle(mousePress(Left))
  expect(synth.state.capturingMouse).toBe(1)
  synth.handle(cursorMove(150, 10))
  synth.handle(mousePress(Right))
  expect(synth.state.capturingMouse).toBe(2)
  synth.handle(mouseRelease(Left))
  synth.handle(mouseRelease(Right))

  expect(summarizeAll(synth)).toEqual([
    "raw:cursor", "captureMouse:1", "captureKeyboard:1", "raw:press",
    "raw:cursor", "drag",
    "uncaptureMouse:1", "captureMouse:2", "raw:press",
    "raw:release", "drag",
    "raw:release", "click", "uncaptureMouse:2",
  ])
  expect(synth.state.capturingMouse).toBeUndefined()
  // only the left button moves keyboard capture
  expect(synth.state.capturingKeyboard).toBe(1)
})

test("pressing over nothing releases keyboard capture", () => {
  const synth = new EventSynthesizer()
  synth.hitTester = xy => xy[0] < 100 ? 1 : undefined
  synth.handle(cursorMove(10, 10))
  synth.handle(mousePress(Left))
  synth.handle(mouseRelease(Left))
  synth.resetCycle()
  synth.handle(cursorMove(150, 10))
  synth.handle(mousePress(Left))
  expect(summarizeAll(synth)).toEqual(["raw:cursor", "uncaptureKeyboard:1", "raw:press"])
  expect(synth.state.capturingKeyboard).toBeUndefined()
})

test("widget capture requests", () => {
  const synth = new EventSynthesizer()
  const anomalies :InputAnomaly[] = []
  synth.anomalies.onEmit(a => anomalies.push(a))

  synth.captureMouse(5)
  synth.uncaptureMouse(6)
  expect(synth.state.capturingMouse).toBe(5)
  expect(anomalies).toEqual([{type: "mismatchedCapture", source: "mouse", widget: 6, holder: 5}])

  synth.captureMouse(7)
  synth.captureMouse(7)
  synth.captureKeyboard(7)
  synth.uncaptureKeyboard(7)
  expect(summarizeAll(synth)).toEqual([
    "captureMouse:5", "uncaptureMouse:5", "captureMouse:7", "captureKeyboard:7",
    "uncaptureKeyboard:7",
  ])
})

test("stale release", () => {
  const synth = new EventSynthesizer()
  const anomalies :InputAnomaly[] = []
  synth.anomalies.onEmit(a => anomalies.push(a))
  synth.handle(mouseRelease(Left))
  synth.handle(textInput("a"))
  expect(summarizeAll(synth)).toEqual(["raw:release", "raw:text"])
  expect(anomalies).toEqual([{type: "staleReleaseWithoutPress", button: Left}])
})

test("double clicks", () => {
  let time = 0
  const synth = new EventSynthesizer(makeConfig({now: () => time}))
  const click = (button :MouseButton, at :number) => {
    time = at
    synth.resetCycle()
    synth.handle(mousePress(button))
    synth.handle(mouseRelease(button))
    return synth.mouseDoubleClick(button) !== undefined
  }
  expect(click(Left, 0)).toBe(false)
  expect(click(Left, 200)).toBe(true)
  // a third click starts over
  expect(click(Left, 400)).toBe(false)
  expect(click(Right, 500)).toBe(false)
  expect(click(Left, 600)).toBe(false)
  expect(click(Left, 1200)).toBe(false)
  expect(click(Left, 1300)).toBe(true)
})

test("taps", () => {
  const synth = new EventSynthesizer()
  synth.hitTester = xy => xy[0] < 50 ? 3 : undefined
  synth.handle(touchMove("start", 1, 10, 10))
  synth.handle(touchMove("move", 1, 12, 12))
  expect(synth.state.touches.get(1)).toBeDefined()
  synth.handle(touchMove("end", 1, 12, 12))
  const tap = synth.tap()
  expect(tap && tap.id).toBe(1)
  expect(tap && tap.widget).toBe(3)
  expect(tap && Array.from(tap.xy)).toEqual([12, 12])
  expect(synth.state.touches.size).toBe(0)

  synth.resetCycle()
  synth.handle(touchMove("start", 2, 10, 10))
  synth.handle(touchMove("end", 2, 80, 10))
  synth.handle(touchMove("end", 9, 10, 10))
  synth.handle(touchMove("start", 4, 10, 10))
  synth.handle(touchMove("cancel", 4, 10, 10))
  expect(synth.tap()).toBeUndefined()
  expect(synth.state.touches.size).toBe(0)
})

test("text, keys and buttons", () => {
  const synth = new EventSynthesizer()
  expect(synth.textJustEntered()).toBeUndefined()
  synth.handle(textInput("he"))
  synth.handle(keyPress("KeyL"))
  synth.handle(textInput("llo"))
  synth.handle(keyRelease("KeyL"))
  synth.handle(mousePress(Right))
  expect(synth.textJustEntered()).toBe("hello")
  expect(synth.keysJustPressed()).toEqual(["KeyL"])
  expect(synth.keysJustReleased()).toEqual(["KeyL"])
  expect(synth.mouseButtonsJustPressed()).toEqual([Right])
  expect(synth.mouseButtonsJustReleased()).toEqual([])
  expect(synth.mouseButtonDown(Right)).toEqual(vec2.fromValues(0, 0))
  expect(synth.mouseButtonDown(Left)).toBeUndefined()
})

test("reset rolls the start state forward", () => {
  const synth = new EventSynthesizer()
  synth.handle(cursorMove(30, 40))
  expect(Array.from(synth.start.mouseXy)).toEqual([0, 0])
  synth.resetCycle()
  expect(synth.events()).toEqual([])
  expect(Array.from(synth.start.mouseXy)).toEqual([30, 40])
  expect(Array.from(synth.mousePosition())).toEqual([30, 40])
})
