import { assert, test } from "@hazae41/phobos"
import { errorOf } from "tests/promises.js"
import { InvalidQueryError } from "./errors.js"
import { Percent, Query } from "./query.js"

function sameEntries(a: ReadonlyMap<string, string>, b: ReadonlyMap<string, string>) {
  if (a.size !== b.size)
    return false

  for (const [key, value] of a)
    if (b.get(key) !== value)
      return false

  return true
}

test("decode pairs", async () => {
  const query = Query.decodeOrThrow("a=1&b=2;c")

  assert(query.size === 3)
  assert(query.get("a") === "1")
  assert(query.get("b") === "2")
  assert(query.get("c") === "", `Key without value should map to the empty string`)
})

test("decode escapes", async () => {
  const query = Query.decodeOrThrow("name=John+Doe&city=S%C3%A3o%20Paulo&expr=v=w")

  assert(query.get("name") === "John Doe")
  assert(query.get("city") === "São Paulo")
  assert(query.get("expr") === "v=w", `Only the first "=" should split`)
})

test("decode skips empty tokens", async () => {
  const query = Query.decodeOrThrow("&&a=1&;")

  assert(query.size === 1)
  assert(query.get("a") === "1")
})

test("decode rejects malformed escapes", async () => {
  const error = await errorOf(Promise.resolve().then(() => Query.decodeOrThrow("bad=%ZZ")))

  assert(error instanceof InvalidQueryError)
})

test("encode pairs", async () => {
  const query = new Map([["a", "1"], ["empty", ""], ["sp ace", "x&y"]])

  assert(Query.encode(query) === "a=1&empty&sp%20ace=x%26y")
  assert(Query.encode(new Map()) === "")
})

test("encode then decode keeps pairs", async () => {
  for (const text of ["a=1&b=2", "key=va%20lue;other=x", "flag&x=%2B", "path=%2Fa%2Fb&q=%3F%26%3D"]) {
    const decoded = Query.decodeOrThrow(text)
    const again = Query.decodeOrThrow(Query.encode(decoded))

    assert(sameEntries(decoded, again), `Pairs of "${text}" should survive encoding`)
  }
})

test("encode then decode keeps printable characters", async () => {
  const printable = new Array<string>()

  for (let code = 0x20; code <= 0x7e; code++)
    printable.push(String.fromCharCode(code))

  const query = new Map<string, string>()

  for (const char of printable)
    query.set(`k${char}`, `${char}v${char}`)

  query.set(printable.join(""), printable.reverse().join(""))
  query.set("+%=&; ", "")

  const decoded = Query.decodeOrThrow(Query.encode(query))

  assert(sameEntries(query, decoded), `Printable pairs should survive encoding`)
})

test("percent", async () => {
  assert(Percent.encode("a b/c?d") === "a%20b%2Fc%3Fd")
  assert(Percent.decodeOrThrow("a%20b+c") === "a b c")
})
