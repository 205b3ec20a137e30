export * as Api from "./app/api.js"
export type { ApiResult, ContestServices } from "./app/api.js"
export { contextOf, type ContestRuntime, makeRuntime } from "./app/context.js"
export { EntrantId, VoterId } from "./core/brand.js"
export type * from "./core/domain.js"
export { type Config, loadConfig } from "./shell/config.js"
export { makeDurableStores, makeMemoryStores, type Stores } from "./shell/stores.js"
