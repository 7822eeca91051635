#!/usr/bin/env node

import log from 'electron-log/node'
import { main } from './cli'

// File output starts once the run command knows its log directory
log.transports.file.level = false

process.exitCode = main(process.argv)
