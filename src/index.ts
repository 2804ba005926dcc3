#!/usr/bin/env node

import program from './program/index.js'

process.exitCode = await program()
