export * from "./domain/index.js"
export * from "./services/index.js"
export * from "./config/app.js"
