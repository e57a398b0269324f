import {rect} from "../core/math"
import {Level, log} from "../core/util"
import {Layout, absolute, relative} from "./layout"

const values = (r :rect) => Array.from(r)

test("absolute and relative placements", () => {
  const layout = new Layout()
  layout.place(1, absolute(10, 10, 100, 50))
  layout.place(2, relative(1, 5, 5, 20, 20))
  layout.place(3, relative(2, 0, 30, 10, 10))
  expect(values(layout.resolve(1))).toEqual([10, 10, 100, 50])
  expect(values(layout.resolve(3))).toEqual([15, 45, 10, 10])
  expect(values(layout.resolve(2))).toEqual([15, 15, 20, 20])
})

test("unknown targets resolve to the origin", () => {
  const layout = new Layout()
  layout.place(2, relative(99, 5, 5, 1, 1))
  expect(values(layout.resolve(2))).toEqual([5, 5, 1, 1])
  expect(values(layout.resolve(99))).toEqual([0, 0, 0, 0])
})

test("changed placements invalidate resolved rects", () => {
  const layout = new Layout()
  layout.place(1, absolute(0, 0, 10, 10))
  layout.place(2, relative(1, 1, 1, 2, 2))
  expect(values(layout.resolve(2))).toEqual([1, 1, 2, 2])
  layout.place(1, absolute(0, 0, 10, 10))
  layout.place(1, absolute(20, 0, 10, 10))
  expect(values(layout.resolve(2))).toEqual([21, 1, 2, 2])
  layout.remove(1)
  expect(values(layout.resolve(2))).toEqual([1, 1, 2, 2])
  expect(layout.ids()).toEqual([2])
})

test("cycles are broken where they close", () => {
  const lines :Array<[Level, string]> = []
  const sink = log.sink
  log.sink = (level, line) => lines.push([level, line])
  try {
    const layout = new Layout()
    layout.place(1, relative(2, 1, 2, 3, 4))
    layout.place(2, relative(1, 10, 20, 5, 5))
    expect(values(layout.resolve(1))).toEqual([11, 22, 3, 4])
    expect(values(layout.resolve(2))).toEqual([10, 20, 5, 5])
    expect(lines).toEqual([["warn", "Breaking layout cycle [widget=2, of=1]"]])

    layout.place(3, relative(3, 7, 8, 1, 1))
    expect(values(layout.resolve(3))).toEqual([7, 8, 1, 1])
    expect(lines.length).toBe(2)
  } finally {
    log.sink = sink
  }
})
