import {vec2} from "./math"
import {Level, Logger, addListener} from "./util"

function capture (logger :Logger) :Array<[Level, string]> {
  const lines :Array<[Level, string]> = []
  logger.sink = (level, line) => lines.push([level, line])
  return lines
}

test("log formatting", () => {
  const logger = new Logger()
  logger.level = "debug"
  const lines = capture(logger)
  logger.info("Widget placed", "id", 3, "pos", vec2.fromValues(10, -2))
  logger.warn("Nothing to say")
  logger.error("Odd args", "a", 1, "trailing")
  expect(lines).toEqual([
    ["info", "Widget placed [id=3, pos=10,-2]"],
    ["warn", "Nothing to say"],
    ["error", "Odd args [a=1]"],
    ["error", "trailing"],
  ])
  const oops = logger.format("Oops", "what", undefined, "who", null)
  expect(oops).toBe("Oops [what=<undef>, who=null]")
})

test("log level filtering", () => {
  const logger = new Logger()
  const lines = capture(logger)
  logger.level = "warn"
  logger.debug("dropped")
  logger.info("dropped")
  logger.warn("kept")
  logger.error("kept too")
  expect(lines.map(([level]) => level)).toEqual(["warn", "error"])
  expect(logger.enabled("info")).toBe(false)
  logger.level = "debug"
  expect(logger.enabled("debug")).toBe(true)
})

test("listener registration", () => {
  const listeners :Array<() => void> = []
  const first = () => {}, second = () => {}
  const removeFirst = addListener(listeners, first)
  addListener(listeners, second)
  removeFirst()
  removeFirst()
  expect(listeners).toEqual([second])
})
