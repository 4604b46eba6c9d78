export * from "./core/brand.js"
export type * from "./core/domain.js"
export * from "./core/mention.js"
