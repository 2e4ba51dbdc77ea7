import { Bytes } from "@hazae41/bytes"
import { assert, test } from "@hazae41/phobos"
import { ResponseDecoder } from "./decoder.js"
import { HeaderMaps } from "./headers.js"

function decode(text: string) {
  return ResponseDecoder.decode(Bytes.fromUtf8(text))
}

test("content-length response", async () => {
  const { responses, failed } = decode("HTTP/1.1 200 OK\r\nContent-Length: 5\r\nContent-Type: text/plain\r\n\r\nhello")

  assert(!failed)
  assert(responses.length === 1)

  const [response] = responses

  assert(response.version === "1.1")
  assert(response.status === 200)
  assert(response.statusText === "OK")
  assert(response.headers["Content-Length"] === "5")
  assert(response.headers["Content-Type"] === "text/plain")
  assert(response.body === "hello")
})

test("content-length counts bytes", async () => {
  const { responses } = decode("HTTP/1.1 200 OK\r\nContent-Length: 6\r\n\r\nhéllo")

  assert(responses.length === 1)
  assert(responses[0].body === "héllo")
})

test("concatenated responses", async () => {
  const { responses, failed } = decode(
    "HTTP/1.1 200 OK\r\nContent-Length: 3\r\n\r\none" +
    "HTTP/1.1 404 Not Found\r\nContent-Length: 3\r\n\r\ntwo")

  assert(!failed)
  assert(responses.length === 2)
  assert(responses[0].status === 200)
  assert(responses[0].body === "one")
  assert(responses[1].status === 404)
  assert(responses[1].body === "two")
})

test("chunked response", async () => {
  const { responses, failed } = decode(
    "HTTP/1.1 200 OK\r\nTransfer-Encoding: chunked\r\n\r\n" +
    "5\r\nhello\r\n6;ext=1\r\n world\r\n0\r\nX-Trailer: yes\r\n\r\n" +
    "HTTP/1.1 204 No Content\r\n\r\n")

  assert(!failed)
  assert(responses.length === 2)
  assert(responses[0].body === "hello world")
  assert(responses[1].status === 204)
  assert(responses[1].body === "")
})

test("close-delimited response", async () => {
  const { responses } = decode("HTTP/1.0 200 OK\r\nServer: stub\r\n\r\nuntil the end")

  assert(responses.length === 1)
  assert(responses[0].version === "1.0")
  assert(responses[0].body === "until the end")
})

test("missing reason phrase", async () => {
  const { responses } = decode("HTTP/1.1 404\r\nContent-Length: 0\r\n\r\n")

  assert(responses.length === 1)
  assert(responses[0].statusText === "Not Found")
})

test("repeated headers are joined", async () => {
  const { responses } = decode("HTTP/1.1 200 OK\r\nSet-Cookie: a=1\r\nSet-Cookie: b=2\r\nContent-Length: 0\r\n\r\n")

  assert(responses[0].headers["Set-Cookie"] === "a=1, b=2")
})

test("malformed responses", async () => {
  const status = decode("HTTP/1.1 abc OK\r\n\r\n")

  assert(status.failed)
  assert(status.responses.length === 0)

  assert(decode("HTTP/1.1 200 OK\r\nBroken header\r\n\r\n").failed)
  assert(decode("HTTP/1.1 200 OK\r\nContent-Length: ten\r\n\r\n").failed)
  assert(decode("HTTP/1.1 200 OK\r\nTransfer-Encoding: chunked\r\n\r\nzz\r\n").failed)
  assert(decode("garbage").responses.length === 0)
})

test("malformed trailing response keeps the previous ones", async () => {
  const { responses, failed } = decode("HTTP/1.1 200 OK\r\nContent-Length: 2\r\n\r\nokHTTP/9 nope\r\n\r\n")

  assert(failed)
  assert(responses.length === 1)
})

test("incomplete responses", async () => {
  const lengthed = decode("HTTP/1.1 200 OK\r\nContent-Length: 10\r\n\r\nshort")

  assert(!lengthed.failed)
  assert(lengthed.responses.length === 0)

  const chunked = decode("HTTP/1.1 200 OK\r\nTransfer-Encoding: chunked\r\n\r\n5\r\nhel")

  assert(!chunked.failed)
  assert(chunked.responses.length === 0)

  assert(decode("").responses.length === 0)
})

test("header names shared with object properties", async () => {
  const { responses, failed } = decode("HTTP/1.1 200 OK\r\nconstructor: x\r\n__proto__: y\r\ntoString: z\r\ntoString: w\r\nContent-Length: 0\r\n\r\n")

  assert(!failed)
  assert(responses.length === 1)

  const { headers } = responses[0]

  assert(Object.keys(headers).join() === "constructor,__proto__,toString,Content-Length")
  assert(headers["constructor"] === "x")
  assert(headers["__proto__"] === "y")
  assert(headers["toString"] === "z, w", `Repeated header should be joined`)
  assert(HeaderMaps.get(headers, "__PROTO__") === "y")
})
