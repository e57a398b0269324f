/** A key, named by its DOM `KeyboardEvent.code` (`"KeyA"`, `"ShiftLeft"`, `"Enter"`...). */
export type Key = string

export const ShiftLeft  = 1 << 0
export const ShiftRight = 1 << 1
export const AltLeft    = 1 << 2
export const AltRight   = 1 << 3
export const CtrlLeft   = 1 << 4
export const CtrlRight  = 1 << 5
export const MetaLeft   = 1 << 6
export const MetaRight  = 1 << 7

export const ShiftMask = ShiftLeft | ShiftRight
export const AltMask   = AltLeft | AltRight
export const CtrlMask  = CtrlLeft | CtrlRight
export const MetaMask  = MetaLeft | MetaRight

/** A set of held modifier keys. The left and right keys have separate bits. */
export type Modifiers = number

export const NoModifiers :Modifiers = 0

const modifierBits :{[code :string] :number} = {
  ShiftLeft, ShiftRight, AltLeft, AltRight,
  ControlLeft: CtrlLeft, ControlRight: CtrlRight,
  MetaLeft, MetaRight,
  // older browsers report the meta keys as OS keys
  OSLeft: MetaLeft, OSRight: MetaRight,
}

/** Returns the modifier bit for `key`, or zero if it is not a modifier key. */
export function modifierBit (key :Key) :number {
  return modifierBits.hasOwnProperty(key) ? modifierBits[key] : 0
}

/** Returns whether `mods` holds any of the bits in `mask` (e.g. either shift key for `ShiftMask`). */
export function hasModifier (mods :Modifiers, mask :number) :boolean {
  return (mods & mask) !== 0
}

/** Formats `mods` as a key binding prefix: `Ctrl+Alt+Shift+Meta+`. */
export function formatModifiers (mods :Modifiers) :string {
  let str = ""
  if (mods & CtrlMask) str += "Ctrl+"
  if (mods & AltMask) str += "Alt+"
  if (mods & ShiftMask) str += "Shift+"
  if (mods & MetaMask) str += "Meta+"
  return str
}
