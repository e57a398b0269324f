import {rect, vec2} from "../core/math"

/** A CSS color string: `"#336699"`, `"rgba(0,0,0,0.5)"`... */
export type Color = string

/** One drawing operation, in window coordinates. Primitives are structured cloneable, so a frame
  * of them can be posted across a message port. */
export type Primitive =
  {type :"rect", bounds :rect, fill :Color} |
  {type :"border", bounds :rect, stroke :Color, width :number} |
  {type :"line", from :vec2, to :vec2, stroke :Color, width :number} |
  {type :"text", origin :vec2, text :string, fill :Color, font? :string} |
  {type :"image", bounds :rect, source :string}

/** Pushes a filled rectangle covering `bounds` onto `into`. */
export function fillRect (into :Primitive[], bounds :rect, fill :Color) {
  into.push({type: "rect", bounds: rect.clone(bounds), fill})
}

/** Pushes a line of text with its top-left at `origin` onto `into`. */
export function drawText (
  into :Primitive[], origin :vec2, text :string, fill :Color, font? :string
) {
  into.push(font === undefined ? {type: "text", origin: vec2.clone(origin), text, fill} :
    {type: "text", origin: vec2.clone(origin), text, fill, font})
}
