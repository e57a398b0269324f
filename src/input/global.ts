import {UiConfig, DefaultConfig} from "../core/config"
import {vec2} from "../core/math"
import {Emitter, Stream} from "../core/react"
import {log} from "../core/util"
import {WidgetId} from "../widget/id"
import {CaptureType, RawInput, Touch, UiEvent} from "./event"
import {MouseButton} from "./mouse"
import {InputProvider} from "./provider"
import {InputState} from "./state"

/** Returns the top-most widget at `xy` (in window coordinates), if any. */
export type HitTester = (xy :vec2) => WidgetId|undefined

export type InputSource = "mouse" | "keyboard"

/** Input that made no sense in the order it arrived. Anomalies are reported and otherwise ignored:
  * a focus change that eats a release must not take the interface down with it. */
export type InputAnomaly =
  {type :"mismatchedCapture", source :InputSource, widget :WidgetId, holder? :WidgetId} |
  {type :"staleReleaseWithoutPress", button :MouseButton}

interface LastClick {
  button :MouseButton
  xy :vec2
  time :number
}

/** Turns raw input into the semantic event log of one update cycle.
  *
  * Every raw input is logged as a `raw` event followed by whatever it implies (clicks, drags,
  * scrolls, taps and releases of capture). A mouse press is the exception: the capture it moves is
  * logged ahead of it, so the widget pressed on holds capture when it sees its own press.
  *
  * Each logged event is also folded into [[state]], so capture only ever changes through an event
  * in the log. [[start]] holds the state as of the start of the cycle, which lets a [[WidgetInput]]
  * replay the log and see each event in context. */
export class EventSynthesizer extends InputProvider {
  private _start = new InputState()
  private readonly _current = new InputState()
  private readonly _events :UiEvent[] = []
  private readonly _anomalies = new Emitter<InputAnomaly>()
  private _lastClick? :LastClick

  /** Finds the widget under a point. Until a host installs one, no widget is ever hit. */
  hitTester :HitTester = () => undefined

  constructor (readonly config :Readonly<UiConfig> = DefaultConfig) { super() }

  /** The state at the start of this cycle. */
  get start () :InputState { return this._start }

  /** The state as of the last logged event. */
  get state () :InputState { return this._current }

  /** Reports input anomalies, which are otherwise ignored. */
  get anomalies () :Stream<InputAnomaly> { return this._anomalies }

  events () :UiEvent[] { return this._events.slice() }

  /** Interprets `input`, appending to this cycle's event log. */
  handle (input :RawInput) {
    const state = this._current
    switch (input.type) {
    case "press":
      if (input.button.type === "keyboard") this.push({type: "raw", input})
      else {
        const under = state.widgetUnderMouse = this.hitTester(state.mouseXy)
        this.transferCapture("mouse", under)
        if (input.button.button === MouseButton.Left) this.transferCapture("keyboard", under)
        this.push({type: "raw", input})
      }
      break

    case "release":
      if (input.button.type === "keyboard") this.push({type: "raw", input})
      else this.releaseMouse(input.button.button, input)
      break

    case "move":
      const motion = input.motion
      if (motion.type === "cursor") this.moveCursor(motion.x, motion.y, input)
      else if (motion.type === "scroll") {
        this.push({type: "raw", input})
        this.push({type: "scroll", x: motion.x, y: motion.y, modifiers: state.modifiers})
      }
      else this.moveTouch(motion.touch, input)
      break

    case "text":
    case "focus":
    case "resize":
      this.push({type: "raw", input})
      break
    }
  }

  /** Gives mouse capture to `widget`, releasing it from its current holder first. */
  captureMouse (widget :WidgetId) { this.capture("mouse", widget) }

  /** Releases mouse capture, if `widget` holds it. */
  uncaptureMouse (widget :WidgetId) { this.uncapture("mouse", widget) }

  /** Gives keyboard capture to `widget`, releasing it from its current holder first. */
  captureKeyboard (widget :WidgetId) { this.capture("keyboard", widget) }

  /** Releases keyboard capture, if `widget` holds it. */
  uncaptureKeyboard (widget :WidgetId) { this.uncapture("keyboard", widget) }

  /** Ends the current cycle: clears the event log and rolls [[start]] forward to the current
    * state. */
  resetCycle () {
    this._events.length = 0
    this._start = this._current.clone()
  }

  private push (event :UiEvent) {
    this._events.push(event)
    this._current.apply(event)
  }

  private report (anomaly :InputAnomaly) {
    log.debug("Ignoring input anomaly", "anomaly", anomaly)
    this._anomalies.emit(anomaly)
  }

  private holder (source :InputSource) :WidgetId|undefined {
    return source === "mouse" ? this._current.capturingMouse : this._current.capturingKeyboard
  }

  private capture (source :InputSource, widget :WidgetId) {
    const holder = this.holder(source)
    if (holder === widget) return
    if (holder !== undefined) this.push({type: uncaptureType(source), widget: holder})
    this.push({type: captureType(source), widget})
  }

  private uncapture (source :InputSource, widget :WidgetId) {
    const holder = this.holder(source)
    if (holder !== widget) this.report({type: "mismatchedCapture", source, widget, holder})
    else this.push({type: uncaptureType(source), widget})
  }

  private transferCapture (source :InputSource, to :WidgetId|undefined) {
    const holder = this.holder(source)
    if (holder === to) return
    if (holder !== undefined) this.push({type: uncaptureType(source), widget: holder})
    if (to !== undefined) this.push({type: captureType(source), widget: to})
  }

  private releaseMouse (button :MouseButton, input :RawInput) {
    const state = this._current, pressed = state.buttons.get(button)
    this.push({type: "raw", input})
    if (pressed.type === "up") {
      this.report({type: "staleReleaseWithoutPress", button})
      return
    }

    const start = vec2.clone(pressed.xy), end = vec2.clone(state.mouseXy)
    const modifiers = state.modifiers, config = this.config
    if (vec2.distance(start, end) > config.dragThreshold) {
      this.push({type: "drag", button, start, end, inProgress: false, modifiers})
    } else {
      this.push({type: "click", button, xy: start, modifiers})
      const now = config.now(), last = this._lastClick
      if (last && last.button === button && now - last.time <= config.doubleClickMillis &&
          vec2.distance(last.xy, start) <= config.dragThreshold) {
        this.push({type: "doubleClick", button, xy: vec2.clone(start), modifiers})
        this._lastClick = undefined
      } else this._lastClick = {button, xy: vec2.clone(start), time: now}
    }

    const holder = state.capturingMouse
    if (!state.buttons.anyDown && holder !== undefined) {
      this.push({type: "uncaptureMouse", widget: holder})
    }
  }

  private moveCursor (x :number, y :number, input :RawInput) {
    const state = this._current
    state.widgetUnderMouse = this.hitTester(vec2.fromValues(x, y))
    this.push({type: "raw", input})
    const end = state.mouseXy, threshold = this.config.dragThreshold
    for (const [button, start] of state.buttons.pressed()) {
      if (vec2.distance(start, end) <= threshold) continue
      this.push({
        type: "drag", button, start: vec2.clone(start), end: vec2.clone(end),
        inProgress: true, modifiers: state.modifiers,
      })
    }
  }

  private moveTouch (touch :Touch, input :RawInput) {
    const touches = this._current.touches, xy = vec2.clone(touch.xy)
    this.push({type: "raw", input})
    switch (touch.phase) {
    case "start":
      const widget = this.hitTester(xy)
      const time = this.config.now()
      touches.set(touch.id, {start: {time, xy, widget}, xy: vec2.clone(xy), widget})
      break
    case "move":
      const moved = touches.get(touch.id)
      if (moved) {
        moved.xy = xy
        moved.widget = this.hitTester(xy)
      }
      break
    case "end":
      const ended = touches.get(touch.id)
      if (!ended) break
      touches.delete(touch.id)
      const over = this.hitTester(xy)
      if (over !== undefined && over === ended.start.widget) {
        this.push({type: "tap", id: touch.id, xy, widget: over})
      }
      break
    case "cancel":
      touches.delete(touch.id)
      break
    }
  }
}

function captureType (source :InputSource) :CaptureType {
  return source === "mouse" ? "captureMouse" : "captureKeyboard"
}

function uncaptureType (source :InputSource) :CaptureType {
  return source === "mouse" ? "uncaptureMouse" : "uncaptureKeyboard"
}
