#!/usr/bin/env node
import { run } from './langmerge'

run(process.argv)
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    console.error(err)
    process.exitCode = 1
  })
