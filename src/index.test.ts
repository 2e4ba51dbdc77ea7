import "./package.test.js"
import "libs/strings/strings.test.js"
import "mods/pipe/pipe.test.js"
import "mods/http/index.test.js"
