import {MessageChannel} from "worker_threads"
import {Level, log} from "../core/util"
import {cursorMove, mousePress, mouseRelease} from "../input/event"
import {MouseButton} from "../input/mouse"
import {StateKind} from "./cache"
import {absolute} from "./layout"
import {Primitive, fillRect} from "./render"
import {FrameMsg, Port, UiClient, UiServer} from "./remote"
import {Ui, UiCell, Widget} from "./ui"

const CountKind = StateKind.data<number>("count")

const counter :Widget<number> = {
  kind: CountKind,
  placement: absolute(10, 10, 40, 40),
  init: () => 0,
  update: ({state, input, cell}) => {
    if (input.mouseLeftClick()) state.update(count => count + 1)
    if (input.mouseIsOverWidget()) cell.setCursor("pointer")
  },
  draw: (count, bounds, into) => fillRect(into, bounds, count > 0 ? "#00FF00" : "#FF0000"),
}

const fills = (prims :Primitive[]) => prims.map(p => p.type === "rect" ? p.fill : p.type)

test("frames cross the port", async () => {
  const {port1, port2} = new MessageChannel()
  const ui = new Ui()
  const id = ui.widgetIds().id("counter")
  const server = new UiServer(port1, ui, (cell :UiCell) => { cell.set(id, counter) })
  const client = new UiClient(port2)
  const nextFrame = () => new Promise<FrameMsg>(resolve => client.frames.next(resolve))

  const lines :Array<[Level, string]> = []
  const sink = log.sink
  log.sink = (level, line) => lines.push([level, line])
  try {
    const first = nextFrame()
    expect(server.update()).toBe(true)
    expect(server.update()).toBe(false)
    const frame = await first
    expect(fills(frame.primitives)).toEqual(["#FF0000"])
    expect(frame.cursor).toBe("default")
    const bounds = frame.primitives.map(p => p.type === "rect" ? Array.from(p.bounds) : [])
    expect(bounds).toEqual([[10, 10, 40, 40]])

    const second = nextFrame()
    port2.postMessage({type: "bogus"})
    const left = MouseButton.Left
    client.send([cursorMove(20, 20), mousePress(left), mouseRelease(left)])
    const clicked = await second
    expect(fills(clicked.primitives)).toEqual(["#00FF00"])
    expect(clicked.cursor).toBe("pointer")
    expect(lines.map(([level]) => level)).toEqual(["warn"])
    expect(lines[0][1].startsWith("Dropping unexpected message [msg=")).toBe(true)
  } finally {
    log.sink = sink
    server.dispose()
    client.dispose()
    port1.close()
    port2.close()
  }
})

class LocalPort implements Port {
  readonly posted :unknown[] = []
  private listeners :Array<(msg :unknown) => void> = []

  postMessage (msg :unknown) { this.posted.push(msg) }
  on (event :"message", listener :(msg :unknown) => void) { this.listeners.push(listener) }
  off (event :"message", listener :(msg :unknown) => void) {
    this.listeners = this.listeners.filter(l => l !== listener)
  }
  deliver (msg :unknown) { for (const listener of this.listeners) listener(msg) }
}

test("malformed input batches are dropped", () => {
  const port = new LocalPort()
  const ui = new Ui()
  const id = ui.widgetIds().id("counter")
  const server = new UiServer(port, ui, (cell :UiCell) => { cell.set(id, counter) })

  const lines :Array<[Level, string]> = []
  const sink = log.sink
  log.sink = (level, line) => lines.push([level, line])
  try {
    const malformed = [
      [{type: "press"}],
      [{type: "release", button: {type: "mouse", button: 42}}],
      [{type: "move", motion: {type: "touch"}}],
      [{type: "move", motion: {type: "touch", touch: {phase: "start", id: 1, xy: [1]}}}],
      [{type: "move", motion: {type: "cursor", x: "1", y: 2}}],
      [cursorMove(20, 20), {type: "resize", width: 10}],
    ]
    for (const events of malformed) {
      expect(() => port.deliver({type: "input", events})).not.toThrow()
    }
    expect(lines.map(([level]) => level)).toEqual(malformed.map(() => "warn"))
    expect(port.posted).toEqual([])
    expect(Array.from(ui.input.state.mouseXy)).toEqual([0, 0])

    port.deliver({type: "input", events: [{type: "move", motion: {type: "touch", touch: {
      phase: "start", id: 1, xy: [30, 30]}}}]})
    expect(port.posted.length).toBe(1)
    expect(lines.length).toBe(malformed.length)
  } finally {
    log.sink = sink
    server.dispose()
  }
})
