#!/usr/bin/env node
import { runCli } from './interfaces/cli/run.js'
import { createNodeIO } from './interfaces/cli/io.js'

const code = await runCli({ argv: process.argv.slice(2), env: process.env, io: createNodeIO() })
process.exitCode = code
