export * from "./address.js"
export * from "./client.js"
export * from "./decoder.js"
export * from "./encoding.js"
export * from "./errors.js"
export * from "./headers.js"
export * from "./query.js"
export * from "./request.js"
export * from "./resolver.js"
export * from "./response.js"
export * from "./socket.js"
export * from "./status.js"
export * from "./url.js"
