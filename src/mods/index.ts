export * from "./console/index.js"
export * from "./http/index.js"
export * from "./pipe/index.js"
