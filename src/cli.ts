#!/usr/bin/env node
/**
 * Interactive entry point: reads the configuration from the environment,
 * then runs the menu on stdin/stdout.
 *
 * @module cli
 */

import { createInterface } from 'node:readline/promises'
import { stdin as input, stdout as output } from 'node:process'
import chalk from 'chalk'
import { createCmsClient } from './index.js'
import { PostTypeCache } from './cache.js'
import { ConfigError, loadConfig } from './config.js'
import { createLogger } from './logger.js'
import { runMenu } from './menu.js'
import type { Prompter } from './menu.js'
import { Session } from './session.js'
import { describeError } from './types/common.js'
import type { AppConfig } from './config.js'

async function main(): Promise<void> {
  let config: AppConfig
  try {
    config = loadConfig(process.env)
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(chalk.red(err.message))
      process.exitCode = 1
      return
    }
    throw err
  }

  const logger = createLogger({ level: config.logLevel })
  const client = createCmsClient({
    baseUrl: config.baseUrl,
    username: config.username,
    applicationPassword: config.applicationPassword,
    defaultTimeout: config.requestTimeoutMs,
  })
  const session = new Session({
    client,
    logger,
    mappingFile: config.mappingFile,
    cache: new PostTypeCache({ ttlMs: config.typeCacheTtlMs }),
  })

  const rl = createInterface({ input, output })
  const closed = new AbortController()
  rl.on('close', () => closed.abort())

  const io: Prompter = {
    async ask(question) {
      if (closed.signal.aborted) return null
      try {
        return await rl.question(question, { signal: closed.signal })
      } catch (err) {
        if (closed.signal.aborted) return null
        throw err
      }
    },
    print(line) {
      console.log(line)
    },
  }

  console.log(chalk.bold(`CMS field mapper: ${client.baseUrl}`))
  try {
    await runMenu(session, io, logger)
  } finally {
    rl.close()
  }
}

main().catch((err: unknown) => {
  console.error(chalk.red(describeError(err)))
  process.exit(1)
})
