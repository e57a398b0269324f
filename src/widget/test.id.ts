import {AllocationExhausted, IdArena, IdList, IdSet} from "./id"

test("arena allocation", () => {
  const arena = new IdArena(3)
  expect([arena.next(), arena.next(), arena.next()]).toEqual([0, 1, 2])
  expect(arena.allocated).toBe(3)
  expect(() => arena.next()).toThrow(AllocationExhausted)
  expect(() => arena.next()).toThrow("Widget id space exhausted [capacity=3]")
})

test("id list resize restores ids", () => {
  const arena = new IdArena()
  const list = new IdList()
  list.resize(5, arena)
  const first = list.toArray()
  expect(first).toEqual([0, 1, 2, 3, 4])

  list.resize(2, arena)
  expect(list.length).toBe(2)
  expect(list.toArray()).toEqual([0, 1])
  expect(list.get(3)).toBeUndefined()

  list.resize(5, arena)
  expect(list.toArray()).toEqual(first)
  expect(arena.allocated).toBe(5)

  list.resize(7, arena)
  expect(list.toArray()).toEqual([0, 1, 2, 3, 4, 5, 6])
  expect(Array.from(list)).toEqual([0, 1, 2, 3, 4, 5, 6])
  expect(() => list.resize(-1, arena)).toThrow("Invalid id list length")
})

test("list walk grows one id at a time", () => {
  const arena = new IdArena()
  const other = arena.next()
  const list = new IdList()
  list.resize(1, arena)

  const walk = list.walk()
  expect(walk.next(arena)).toBe(1)
  expect(list.length).toBe(1)
  expect(walk.next(arena)).toBe(2)
  expect(list.length).toBe(2)
  expect(walk.next(arena)).toBe(3)
  expect(list.length).toBe(3)
  expect(walk.position).toBe(3)
  expect(other).toBe(0)

  // a second walk reuses what the first one grew
  const again = list.walk()
  expect(again.list).toBe(list)
  expect([again.next(arena), again.next(arena)]).toEqual([1, 2])
  expect(arena.allocated).toBe(4)
})

test("walks only grow the list they came from", () => {
  const arena = new IdArena()
  const rows = new IdList(), cols = new IdList()
  const walk = rows.walk()
  expect([walk.next(arena), walk.next(arena)]).toEqual([0, 1])
  expect(rows.toArray()).toEqual([0, 1])
  expect(cols.length).toBe(0)
  expect(cols.walk().next(arena)).toBe(2)
  expect(rows.length).toBe(2)
})

test("id set", () => {
  const arena = new IdArena()
  const ids = new IdSet(arena)
  const button = ids.id("button")
  const label = ids.id("label")
  expect([button, label]).toEqual([0, 1])
  expect(ids.id("button")).toBe(button)
  const items = ids.list("items")
  expect(ids.list("items")).toBe(items)
  items.resize(2, arena)
  expect(items.toArray()).toEqual([2, 3])
})
