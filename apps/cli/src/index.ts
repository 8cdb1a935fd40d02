#!/usr/bin/env tsx
import { run } from './program'

process.exitCode = await run(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr })
