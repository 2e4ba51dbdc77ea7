export * from "./mods/index.js"
