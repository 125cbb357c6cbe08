#!/usr/bin/env node
// scripts/digest.ts
// WS-Security UsernameToken digest calculator.
//
// Usage:
// npm run build && node dist/scripts/digest.js --generate --password admin123

import { runDigestCli } from "../src/digestCli.js";

const code = runDigestCli(process.argv.slice(2), {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
});
process.exit(code);
