#!/usr/bin/env node
import fs from 'node:fs'
import path from 'node:path'

import { Config, readCount } from './config/env'
import { debugLog } from './debug/logger'
import { hexdump } from './dump/hexdump'

export interface CliOptions {
  input?: string
  text?: string
  length?: number
  help?: boolean
}

export const USAGE = 'Usage: hexdump-iter [file|-] [--string <text>] [--length <n>] [--help]'

export const parseArgs = (argv: string[]): CliOptions => {
  const args = argv.slice(2)
  const options: CliOptions = {}
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i]
    if (arg === undefined) continue
    if (arg === '--help' || arg === '-h') {
      options.help = true
      continue
    }
    if (arg === '--string') {
      const value = args[i + 1]
      if (value === undefined) throw new Error('--string 缺少参数')
      options.text = value
      i += 1
      continue
    }
    if (arg === '--length') {
      const length = readCount(args[i + 1])
      if (length === undefined) throw new Error(`无效的长度参数: ${args[i + 1] ?? '(空)'}`)
      options.length = length
      i += 1
      continue
    }
    if (arg.startsWith('--')) {
      throw new Error(`未知选项: ${arg}`)
    }
    if (options.input === undefined) {
      options.input = arg
    }
  }
  return options
}

/**
 * 按选项读取待转储的字节：`--string` 优先，其次是文件，`-` 或缺省读 stdin。
 */
export const readInput = (options: CliOptions, cwd = process.cwd()): Uint8Array => {
  if (options.text !== undefined) {
    return Buffer.from(options.text, 'utf8')
  }
  if (options.input === undefined || options.input === '-') {
    return fs.readFileSync(0)
  }
  return fs.readFileSync(path.resolve(cwd, options.input))
}

/**
 * CLI 入口，返回退出码。
 */
export const main = (argv: string[] = process.argv, log: (line: string) => void = console.log): number => {
  let options: CliOptions
  try {
    options = parseArgs(argv)
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error))
    console.error(USAGE)
    return 1
  }

  if (options.help) {
    log(USAGE)
    return 0
  }

  let bytes: Uint8Array
  try {
    bytes = readInput(options)
  } catch (error) {
    console.error(`读取输入失败: ${error instanceof Error ? error.message : String(error)}`)
    return 1
  }

  const limit = options.length ?? Config.HEXDUMP_MAX_BYTES
  const view = limit === undefined ? bytes : bytes.subarray(0, limit)
  debugLog(`dumping ${view.length} of ${bytes.length} bytes`)
  hexdump(view, log)
  return 0
}

if (require.main === module) {
  process.exitCode = main()
}
