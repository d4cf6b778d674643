#!/usr/bin/env -S npx tsx
import { main } from "./cli"

main().then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    console.error(error)
    process.exitCode = 1
  },
)
