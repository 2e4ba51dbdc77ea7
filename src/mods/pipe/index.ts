export * from "./errors.js"
export * from "./pipe.js"
