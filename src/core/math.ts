import {vec2} from "gl-matrix"

export {vec2} from "gl-matrix"

/** A width and height, stored as `[width, height]`. */
export class dim2 extends Float32Array {

  static create () :dim2 {
    return new Float32Array(2)
  }

  static fromValues (width :number, height :number) :dim2 {
    return dim2.set(dim2.create(), width, height)
  }

  static set (out :dim2, width :number, height :number) :dim2 {
    out[0] = width
    out[1] = height
    return out
  }

  static eq (a :dim2, b :dim2) :boolean {
    return a[0] === b[0] && a[1] === b[1]
  }
}

/** An axis-aligned rectangle stored as `[x, y, width, height]`, with `y` increasing downward. */
export class rect extends Float32Array {

  static create () :rect {
    return new Float32Array(4)
  }

  static fromValues (x :number, y :number, width :number, height :number) :rect {
    const out = rect.create()
    out[0] = x
    out[1] = y
    out[2] = width
    out[3] = height
    return out
  }

  static clone (src :rect) :rect {
    return rect.fromValues(src[0], src[1], src[2], src[3])
  }

  static eq (a :rect, b :rect) :boolean {
    return a[0] === b[0] && a[1] === b[1] && a[2] === b[2] && a[3] === b[3]
  }

  /** Writes the top-left corner of `r` into `into`. */
  static pos (r :rect, into = vec2.create()) :vec2 {
    return vec2.set(into, r[0], r[1])
  }

  /** Whether `pos` lies in `r`. Edges count as inside. */
  static contains (r :rect, pos :vec2) :boolean {
    const px = pos[0], py = pos[1]
    return px >= r[0] && px <= r[0] + r[2] && py >= r[1] && py <= r[1] + r[3]
  }
}
