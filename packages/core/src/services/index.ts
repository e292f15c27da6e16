export * from "./change-detector.js"
export * from "./scoring.js"
export * from "./event-factory.js"
export * from "./dog-store.js"
export * from "./dal.js"
export * from "./ingest.js"
export * from "./overrides-import.js"
