import "./query.test.js"
import "./url.test.js"
import "./status.test.js"
import "./encoding.test.js"
import "./decoder.test.js"
import "./response.test.js"
import "./request.test.js"
import "./resolver.test.js"
import "./socket.test.js"
import "./client.test.js"
