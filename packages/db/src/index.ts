export * as schema from "./schema.js"
export * from "./client.js"
export * from "./dog-store.js"
