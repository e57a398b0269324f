import {Emitter, Stream} from "../core/react"
import {Disposable, log} from "../core/util"
import {vec2} from "../core/math"
import {Button, Motion, RawInput, Touch} from "../input/event"
import {MouseButton, NumButtons} from "../input/mouse"
import {Primitive} from "./render"
import {CursorIcon, Ui, UiCell} from "./ui"

/** The end of a message channel. Node's `worker_threads` ports fit as they are. */
export interface Port {
  postMessage (msg :unknown) :void
  on (event :"message", listener :(msg :unknown) => void) :unknown
  off (event :"message", listener :(msg :unknown) => void) :unknown
}

/** A batch of raw input, sent from a host to the ui that owns its widgets. */
export interface InputMsg {
  type :"input"
  events :RawInput[]
}

/** The primitives of a changed frame, sent back to the host. */
export interface FrameMsg {
  type :"frame"
  primitives :Primitive[]
  cursor :CursorIcon
}

const TouchPhases = new Set(["start", "move", "end", "cancel"])

function isObject (value :unknown) :value is {[key :string] :unknown} {
  return typeof value === "object" && value !== null
}

const isNumber = (value :unknown) :value is number =>
  typeof value === "number" && !isNaN(value)

// messages from another thread arrive as plain arrays or typed arrays of another realm
function isVec2 (value :unknown) :value is vec2 {
  return isObject(value) && value.length === 2 && isNumber(value[0]) && isNumber(value[1])
}

function isMouseButton (value :unknown) :value is MouseButton {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value < NumButtons
}

function isButton (value :unknown) :value is Button {
  if (!isObject(value)) return false
  switch (value.type) {
  case "mouse": return isMouseButton(value.button)
  case "keyboard": return typeof value.key === "string"
  default: return false
  }
}

function isTouch (value :unknown) :value is Touch {
  return isObject(value) && typeof value.phase === "string" && TouchPhases.has(value.phase) &&
    isNumber(value.id) && isVec2(value.xy)
}

function isMotion (value :unknown) :value is Motion {
  if (!isObject(value)) return false
  switch (value.type) {
  case "cursor":
  case "scroll": return isNumber(value.x) && isNumber(value.y)
  case "touch": return isTouch(value.touch)
  default: return false
  }
}

function isRawInput (value :unknown) :value is RawInput {
  if (!isObject(value)) return false
  switch (value.type) {
  case "press":
  case "release": return isButton(value.button)
  case "move": return isMotion(value.motion)
  case "text": return typeof value.text === "string"
  case "focus": return typeof value.focused === "boolean"
  case "resize": return isNumber(value.width) && isNumber(value.height)
  default: return false
  }
}

function isInputMsg (msg :unknown) :msg is InputMsg {
  return isObject(msg) && msg.type === "input" && Array.isArray(msg.events) &&
    msg.events.every(isRawInput)
}

function isFrameMsg (msg :unknown) :msg is FrameMsg {
  return isObject(msg) && msg.type === "frame" && Array.isArray(msg.primitives) &&
    typeof msg.cursor === "string"
}

/** Runs a [[Ui]] behind a port. Each input batch that arrives is handled, followed by one pass of
  * `build`; if the pass changed anything, the frame is posted back. A batch holding any malformed
  * input is logged and dropped whole. The ui is touched only from
  * the port's message handler, so it has a single writer however the host is threaded. */
export class UiServer implements Disposable {
  private readonly onMessage = (msg :unknown) => {
    if (!isInputMsg(msg)) {
      log.warn("Dropping unexpected message", "msg", msg)
      return
    }
    for (const input of msg.events) this.ui.handleEvent(input)
    this.update()
  }

  constructor (readonly port :Port, readonly ui :Ui, readonly build :(cell :UiCell) => void) {
    port.on("message", this.onMessage)
  }

  /** Runs a pass and posts the frame if anything changed.
    * @return whether a frame was posted. */
  update () :boolean {
    this.ui.setWidgets(this.build)
    const primitives = this.ui.drawIfChanged()
    if (!primitives) return false
    const frame :FrameMsg = {type: "frame", primitives, cursor: this.ui.cursor.current}
    this.port.postMessage(frame)
    return true
  }

  dispose () {
    this.port.off("message", this.onMessage)
  }
}

/** The host end of a [[UiServer]]: sends raw input and receives frames. */
export class UiClient implements Disposable {
  private readonly _frames = new Emitter<FrameMsg>()
  private readonly onMessage = (msg :unknown) => {
    if (isFrameMsg(msg)) this._frames.emit(msg)
    else log.warn("Dropping unexpected message", "msg", msg)
  }

  constructor (readonly port :Port) {
    port.on("message", this.onMessage)
  }

  /** The frames posted by the server. */
  get frames () :Stream<FrameMsg> { return this._frames }

  send (events :RawInput[]) {
    const msg :InputMsg = {type: "input", events}
    this.port.postMessage(msg)
  }

  dispose () {
    this.port.off("message", this.onMessage)
  }
}
