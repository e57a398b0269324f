export * from "./core/config"
export * from "./core/data"
export * from "./core/math"
export * from "./core/react"
export * from "./core/util"
export * from "./widget/id"
export * from "./input/keyboard"
export * from "./input/mouse"
export * from "./input/event"
export * from "./input/state"
export * from "./input/provider"
export * from "./input/global"
export * from "./input/widget"
export * from "./ui/cache"
export * from "./ui/layout"
export * from "./ui/render"
export * from "./ui/ui"
export * from "./ui/remote"
