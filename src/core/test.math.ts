import {dim2, rect, vec2} from "./math"

test("rect", () => {
  const r = rect.fromValues(10, 20, 30, 40)
  expect(rect.contains(r, vec2.fromValues(10, 20))).toBe(true)
  expect(rect.contains(r, vec2.fromValues(40, 60))).toBe(true)
  expect(rect.contains(r, vec2.fromValues(41, 60))).toBe(false)
  expect(rect.contains(r, vec2.fromValues(20, 19))).toBe(false)
  expect(Array.from(rect.pos(r))).toEqual([10, 20])

  const copy = rect.clone(r)
  expect(rect.eq(copy, r)).toBe(true)
  copy[2] = 5
  expect(rect.eq(copy, r)).toBe(false)
  expect(r[2]).toBe(30)
})

test("dim2", () => {
  const size = dim2.fromValues(640, 480)
  expect(Array.from(size)).toEqual([640, 480])
  expect(dim2.eq(size, dim2.set(dim2.create(), 640, 480))).toBe(true)
  expect(dim2.eq(size, dim2.create())).toBe(false)
})
