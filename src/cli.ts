#!/usr/bin/env node
import "dotenv/config"
import process from "node:process"
import { buildProgram } from "./app.js"
import { ConfigurationError } from "./errors.js"

async function main() {
  const program = buildProgram()

  // Some runners (pnpm+tsx) may inject a leading "--" which breaks option parsing.
  const argv = process.argv.slice()
  if (argv[2] === "--") argv.splice(2, 1)
  await program.parseAsync(argv)
}

main().catch((e) => {
  if (e instanceof ConfigurationError) {
    process.stderr.write(`error: ${e.message}\n`)
  } else {
    process.stderr.write(String(e) + "\n")
  }
  process.exitCode = 1
})
