#!/usr/bin/env node
/**
 * pH Sensor CLI
 * Reads and calibrates a probe from the command line
 */

import { loadEnvFile } from './config'
import { createProgram } from './program'

loadEnvFile()
createProgram().parse(process.argv)
