import {DefaultConfig, makeConfig} from "./config"
import {log} from "./util"

test("config defaults", () => {
  const config = makeConfig()
  expect(config.dragThreshold).toBe(4)
  expect(config.doubleClickMillis).toBe(500)
  expect(config.idCapacity).toBe(2**32 - 1)
  expect(config.now).toBe(DefaultConfig.now)
  expect(Object.isFrozen(config)).toBe(true)
})

test("config layering", () => {
  const now = () => 42
  const config = makeConfig(
    {dragThreshold: 2, doubleClickMillis: undefined},
    {dragThreshold: 8, doubleClickMillis: 250, now})
  expect(config.dragThreshold).toBe(2)
  expect(config.doubleClickMillis).toBe(250)
  expect(config.now()).toBe(42)
  expect(config.idCapacity).toBe(DefaultConfig.idCapacity)
})

test("config validation", () => {
  expect(() => makeConfig({dragThreshold: -1})).toThrow("Drag threshold must be non-negative")
  expect(() => makeConfig({doubleClickMillis: NaN})).toThrow("Double click interval")
  expect(() => makeConfig({idCapacity: 0})).toThrow("Id capacity must be a positive integer")
  expect(() => makeConfig({idCapacity: 1.5})).toThrow("Id capacity must be a positive integer")
  expect(makeConfig({dragThreshold: 0}).dragThreshold).toBe(0)
})

test("making a config leaves logging alone", () => {
  const prev = log.level
  try {
    log.level = "info"
    const config = makeConfig({logLevel: "error"})
    expect(config.logLevel).toBe("error")
    expect(log.level).toBe("info")
  } finally {
    log.level = prev
  }
})
