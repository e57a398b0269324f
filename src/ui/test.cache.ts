import {rect} from "../core/math"
import {ChangeTracker, StateKind} from "./cache"

type Toggle = {on :boolean, label :string}
const ToggleKind = StateKind.data<Toggle>("toggle")
const SliderKind = new StateKind<number>("slider", (a, b) => Math.abs(a - b) < 0.5)

function valueOf<T> (tracker :ChangeTracker, id :number, kind :StateKind<T>) :T|undefined {
  const state = tracker.get(id, kind)
  return state ? state.value : undefined
}

function pass (tracker :ChangeTracker, visit :() => void) :boolean {
  tracker.beginPass()
  visit()
  tracker.endPass()
  return tracker.takeChanged()
}

test("first visits count as changes", () => {
  const tracker = new ChangeTracker()
  const init = () => ({on: false, label: "a"})
  expect(pass(tracker, () => tracker.visit(1, ToggleKind, init))).toBe(true)
  expect(pass(tracker, () => tracker.visit(1, ToggleKind, init))).toBe(false)
  expect(pass(tracker, () => tracker.visit(1, ToggleKind, init))).toBe(false)
})

test("structurally equal updates are not changes", () => {
  const tracker = new ChangeTracker()
  const init = () => ({on: false, label: "a"})
  pass(tracker, () => tracker.visit(1, ToggleKind, init))

  expect(pass(tracker, () => {
    const state = tracker.visit(1, ToggleKind, init)
    expect(state.update(prev => ({...prev}))).toBe(false)
    expect(state.dirty).toBe(false)
  })).toBe(false)

  expect(pass(tracker, () => {
    const state = tracker.visit(1, ToggleKind, init)
    expect(state.update(prev => ({...prev, on: true}))).toBe(true)
    expect(state.value).toEqual({on: true, label: "a"})
  })).toBe(true)
})

test("custom equality", () => {
  const tracker = new ChangeTracker()
  pass(tracker, () => tracker.visit(1, SliderKind, () => 10))
  const nudge = (delta :number) => pass(tracker, () => {
    tracker.visit(1, SliderKind, () => 10).update(v => v + delta)
  })
  expect(nudge(0.25)).toBe(false)
  expect(valueOf(tracker, 1, SliderKind)).toBe(10)
  expect(nudge(2)).toBe(true)
  expect(valueOf(tracker, 1, SliderKind)).toBe(12)
})

test("vanished widgets count as changes", () => {
  const tracker = new ChangeTracker()
  const init = () => 0
  pass(tracker, () => {
    tracker.visit(1, SliderKind, init)
    tracker.visit(2, SliderKind, init)
  })
  expect(tracker.ids).toEqual([1, 2])
  expect(pass(tracker, () => tracker.visit(1, SliderKind, init))).toBe(true)
  expect(tracker.ids).toEqual([1])
  expect(tracker.get(2, SliderKind)).toBeUndefined()
  expect(pass(tracker, () => tracker.visit(1, SliderKind, init))).toBe(false)
})

test("a widget that changes kind starts over", () => {
  const tracker = new ChangeTracker()
  pass(tracker, () => tracker.visit(1, SliderKind, () => 5))
  const toggle = () => ({on: true, label: "b"})
  expect(pass(tracker, () => tracker.visit(1, ToggleKind, toggle))).toBe(true)
  expect(tracker.get(1, SliderKind)).toBeUndefined()
  expect(valueOf(tracker, 1, ToggleKind)).toEqual({on: true, label: "b"})
})

test("states are kept per tracker", () => {
  const one = new ChangeTracker(), two = new ChangeTracker()
  const BoundsKind = StateKind.data<rect>("bounds")
  one.visit(1, BoundsKind, () => rect.fromValues(0, 0, 1, 1))
  two.visit(1, BoundsKind, () => rect.fromValues(0, 0, 2, 2))
  expect(valueOf(one, 1, BoundsKind)).toEqual(rect.fromValues(0, 0, 1, 1))
  expect(valueOf(two, 1, BoundsKind)).toEqual(rect.fromValues(0, 0, 2, 2))
})

test("forced redraws", () => {
  const tracker = new ChangeTracker()
  expect(tracker.changed).toBe(false)
  tracker.needsRedraw()
  expect(tracker.changed).toBe(true)
  expect(tracker.takeChanged()).toBe(true)
  expect(tracker.takeChanged()).toBe(false)
})
