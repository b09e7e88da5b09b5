#!/usr/bin/env node
import { config } from 'dotenv'
import runCli from './cli.js'
import createReadlineIo from './readlineIo.js'

config()

const io = createReadlineIo({ input: process.stdin, output: process.stdout })

runCli({ env: process.env, io })
	.then(code => {
		process.exitCode = code
	})
	.catch(error => {
		console.error(error)
		process.exitCode = 1
	})
	.finally(() => {
		io.close()
	})
