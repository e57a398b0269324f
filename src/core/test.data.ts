import {dataEquals} from "./data"
import {rect} from "./math"

test("data equality", () => {
  expect(dataEquals(1, 1)).toBe(true)
  expect(dataEquals("a", "b")).toBe(false)
  expect(dataEquals(null, undefined)).toBe(false)
  expect(dataEquals([1, [2, 3]], [1, [2, 3]])).toBe(true)
  expect(dataEquals([1, [2, 3]], [1, [2]])).toBe(false)
  expect(dataEquals({a: 1, b: {c: "x"}}, {b: {c: "x"}, a: 1})).toBe(true)
  expect(dataEquals({a: 1}, {a: 1, b: 2})).toBe(false)
  expect(dataEquals({a: 1}, [1])).toBe(false)
  expect(dataEquals(new Set([1, 2]), new Set([2, 1]))).toBe(true)
  expect(dataEquals(new Map([["a", 1]]), new Map([["a", 2]]))).toBe(false)
})

test("typed array equality", () => {
  expect(dataEquals(rect.fromValues(1, 2, 3, 4), rect.fromValues(1, 2, 3, 4))).toBe(true)
  expect(dataEquals(rect.fromValues(1, 2, 3, 4), rect.fromValues(1, 2, 3, 5))).toBe(false)
  expect(dataEquals({bounds: rect.fromValues(0, 0, 8, 8)}, {bounds: [0, 0, 8, 8]})).toBe(false)
})
