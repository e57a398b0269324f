import {Emitter, MultiError, Mutable, Remove} from "./react"

test("emitter", () => {
  const em = new Emitter<string>()
  const history :string[] = []
  const remover = em.onEmit(s => history.push(s))
  em.emit("a")
  em.emit("b")
  expect(history).toEqual(["a", "b"])
  remover()
  em.emit("c")
  expect(history).toEqual(["a", "b"])

  let nexts = 0
  em.next(() => nexts += 1)
  em.emit("one")
  em.emit("two")
  expect(nexts).toBe(1)
})

test("mutable", () => {
  const value = Mutable.local(1)
  const seen :number[] = []
  value.onValue(v => seen.push(v))
  value.update(2)
  value.update(2)
  value.update(3)
  expect(seen).toEqual([1, 2, 3])
  expect(value.current).toBe(3)

  let firstOnly = 0
  value.onValue(() => { firstOnly += 1 ; return Remove })
  value.update(4)
  expect(firstOnly).toBe(1)

  const pairs = Mutable.local([1, 2], (a, b) => a[0] === b[0] && a[1] === b[1])
  let pairChanges = 0
  pairs.onEmit(() => pairChanges += 1)
  pairs.update([1, 2])
  pairs.update([2, 2])
  expect(pairChanges).toBe(1)
})

test("listener removal and errors", () => {
  const em = new Emitter<number>()
  let calls = 0
  em.onEmit(() => { calls += 1 ; return Remove })
  em.emit(1)
  em.emit(2)
  expect(calls).toBe(1)

  em.onEmit(() => { throw new Error("one") })
  expect(() => em.emit(3)).toThrow("one")
  em.onEmit(() => { throw new Error("two") })
  expect(() => em.emit(4)).toThrow(MultiError)
})
