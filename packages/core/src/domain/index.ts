export * from "./dog.js"
export * from "./user-state.js"
export * from "./preferences.js"
export * from "./event.js"
export * from "./errors.js"
export * from "./normalize.js"
export { LegacyDogRecord, dogFromLegacy, dogToLegacyDict } from "./legacy.js"
export type { LegacyDogDict } from "./legacy.js"
export * from "./legacy-overrides.js"
