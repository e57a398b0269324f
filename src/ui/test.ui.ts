import {makeConfig} from "../core/config"
import {rect, vec2} from "../core/math"
import {log} from "../core/util"
import {cursorMove, mousePress, mouseRelease} from "../input/event"
import {MouseButton} from "../input/mouse"
import {StateKind} from "./cache"
import {Placement, absolute, relative} from "./layout"
import {Primitive, drawText, fillRect} from "./render"
import {CursorIcon, Ui, UiCell, UpdateArgs, Widget} from "./ui"

type ButtonState = {presses :number, hover :boolean}
const ButtonKind = StateKind.data<ButtonState>("button")

class Button implements Widget<ButtonState> {
  readonly kind = ButtonKind

  constructor (readonly placement :Placement, readonly label :string) {}

  init () :ButtonState { return {presses: 0, hover: false} }

  update ({state, input, cell} :UpdateArgs<ButtonState>) {
    const clicks = input.mouseLeftClick() ? 1 : 0, hover = input.mouseIsOverWidget()
    state.update(prev => ({presses: prev.presses + clicks, hover}))
    if (hover) cell.setCursor("pointer")
  }

  draw (state :ButtonState, bounds :rect, into :Primitive[]) {
    fillRect(into, bounds, state.hover ? "#CCCCCC" : "#EEEEEE")
    drawText(into, rect.pos(bounds), `${this.label}:${state.presses}`, "#000000")
  }
}

const summarize = (prims :Primitive[]|undefined) =>
  prims && prims.map(p => p.type === "text" ? p.text : p.type === "rect" ? p.fill : p.type)

function click (ui :Ui, x :number, y :number) {
  ui.handleEvent(cursorMove(x, y))
  ui.handleEvent(mousePress(MouseButton.Left))
  ui.handleEvent(mouseRelease(MouseButton.Left))
}

test("draw only when something changed", () => {
  const ui = new Ui()
  const ids = ui.widgetIds()
  const build = (cell :UiCell) => {
    cell.set(ids.id("ok"), new Button(absolute(10, 10, 80, 20), "ok"))
  }

  ui.setWidgets(build)
  expect(summarize(ui.drawIfChanged())).toEqual(["#EEEEEE", "ok:0"])
  ui.setWidgets(build)
  expect(ui.drawIfChanged()).toBeUndefined()
  ui.setWidgets(build)
  expect(ui.drawIfChanged()).toBeUndefined()

  click(ui, 20, 15)
  ui.setWidgets(build)
  expect(ui.redrawPending).toBe(true)
  expect(summarize(ui.drawIfChanged())).toEqual(["#CCCCCC", "ok:1"])
  expect(ui.cursor.current).toBe("pointer")
  ui.setWidgets(build)
  expect(ui.drawIfChanged()).toBeUndefined()
})

test("only the widget under the press gets the click", () => {
  const ui = new Ui()
  const ids = ui.widgetIds()
  const build = (cell :UiCell) => {
    cell.set(ids.id("left"), new Button(absolute(0, 0, 50, 50), "left"))
    cell.set(ids.id("right"), new Button(absolute(100, 0, 50, 50), "right"))
  }
  ui.setWidgets(build)
  ui.drawIfChanged()

  click(ui, 120, 10)
  ui.setWidgets(build)
  const prims = summarize(ui.drawIfChanged())
  expect(prims).toEqual(["#EEEEEE", "left:0", "#CCCCCC", "right:1"])
})

test("later widgets are on top", () => {
  const ui = new Ui()
  const ids = ui.widgetIds()
  const under = ids.id("under"), over = ids.id("over")
  ui.setWidgets(cell => {
    cell.set(under, new Button(absolute(0, 0, 100, 100), "under"))
    cell.set(over, new Button(relative(under, 10, 10, 20, 20), "over"))
  })
  expect(ui.widgetAt(vec2.fromValues(15, 15))).toBe(over)
  expect(ui.widgetAt(vec2.fromValues(50, 50))).toBe(under)
  expect(ui.widgetAt(vec2.fromValues(500, 50))).toBeUndefined()
})

test("resizes and regained focus force a redraw", () => {
  const ui = new Ui()
  const ids = ui.widgetIds()
  const build = (cell :UiCell) => {
    cell.set(ids.id("ok"), new Button(absolute(10, 10, 80, 20), "ok"))
  }
  ui.setWidgets(build)
  ui.drawIfChanged()

  ui.handleEvent({type: "resize", width: 640, height: 480})
  expect(ui.redrawPending).toBe(true)
  expect(Array.from(ui.windowSize)).toEqual([640, 480])
  ui.setWidgets(build)
  expect(summarize(ui.drawIfChanged())).toEqual(["#EEEEEE", "ok:0"])

  ui.handleEvent({type: "focus", focused: false})
  ui.setWidgets(build)
  expect(ui.drawIfChanged()).toBeUndefined()

  ui.handleEvent({type: "focus", focused: true})
  ui.setWidgets(build)
  expect(ui.drawIfChanged()).toBeDefined()
})

test("removing a widget is a change", () => {
  const ui = new Ui()
  const ids = ui.widgetIds()
  let showExtra = true
  const build = (cell :UiCell) => {
    cell.set(ids.id("ok"), new Button(absolute(10, 10, 80, 20), "ok"))
    if (showExtra) cell.set(ids.id("extra"), new Button(absolute(10, 40, 80, 20), "extra"))
  }
  ui.setWidgets(build)
  expect(summarize(ui.drawIfChanged())).toEqual(["#EEEEEE", "ok:0", "#EEEEEE", "extra:0"])
  showExtra = false
  ui.setWidgets(build)
  expect(summarize(ui.drawIfChanged())).toEqual(["#EEEEEE", "ok:0"])
  expect(ui.layout.ids()).toEqual([ids.id("ok")])
})

test("cursor hint resets each pass", () => {
  const ui = new Ui()
  const ids = ui.widgetIds()
  const build = (cell :UiCell) => {
    cell.set(ids.id("ok"), new Button(absolute(20, 20, 10, 10), "ok"))
  }
  const cursors :CursorIcon[] = []
  ui.cursor.onValue(c => cursors.push(c))
  ui.setWidgets(build)
  ui.handleEvent(cursorMove(25, 25))
  ui.setWidgets(build)
  ui.handleEvent(cursorMove(50, 5))
  ui.setWidgets(build)
  expect(cursors).toEqual(["default", "pointer", "default"])
})

test("widgets can request capture", () => {
  const ui = new Ui()
  const ids = ui.widgetIds()
  const field = ids.id("field")
  const FieldKind = StateKind.data<string>("field")
  const widget :Widget<string> = {
    kind: FieldKind,
    placement: absolute(0, 0, 100, 20),
    init: () => "",
    update: ({id, state, input, cell}) => {
      if (!input.capturesKeyboard) cell.captureKeyboard(id)
      const text = input.textJustEntered()
      if (text !== undefined) state.update(prev => prev + text)
    },
    draw: (state, bounds, into) => drawText(into, rect.pos(bounds), state, "#000000"),
  }
  ui.setWidgets(cell => cell.set(field, widget))
  expect(ui.input.state.capturingKeyboard).toBe(field)
  ui.drawIfChanged()

  ui.handleEvent({type: "text", text: "hi"})
  ui.setWidgets(cell => cell.set(field, widget))
  expect(summarize(ui.drawIfChanged())).toEqual(["hi"])
})

test("a ui applies its configured log level", () => {
  const prev = log.level
  try {
    log.level = "info"
    new Ui()
    expect(log.level).toBe("info")
    new Ui(makeConfig({logLevel: "error"}))
    expect(log.level).toBe("error")
    expect(log.enabled("warn")).toBe(false)
  } finally {
    log.level = prev
  }
})
