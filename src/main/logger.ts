// SPDX-License-Identifier: GPL-2.0-or-later
// Rotation logger: writes to <config dir>/logs/

import { join } from 'node:path'
import {
  existsSync,
  mkdirSync,
  statSync,
  renameSync,
  unlinkSync,
  appendFileSync,
} from 'node:fs'
import { getConfigDir, loadAppConfig } from './app-config'

const LOG_FILE_PREFIX = 'deckwire-'
const LOG_FILE_EXT = '.log'
const MAX_FILE_SIZE = 5 * 1024 * 1024 // 5 MB
const MAX_GENERATIONS = 5 // deckwire-0.log through deckwire-4.log

let logDir = ''
let initialized = false
let hidDebug: boolean | null = null

function getLogDir(): string {
  if (!logDir) {
    logDir = join(getConfigDir(), 'logs')
  }
  return logDir
}

function logFilePath(generation: number): string {
  return join(getLogDir(), `${LOG_FILE_PREFIX}${generation}${LOG_FILE_EXT}`)
}

function ensureLogDir(): void {
  const dir = getLogDir()
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true })
  }
}

function rotate(): void {
  const oldest = logFilePath(MAX_GENERATIONS - 1)
  if (existsSync(oldest)) {
    unlinkSync(oldest)
  }
  for (let i = MAX_GENERATIONS - 2; i >= 0; i--) {
    const src = logFilePath(i)
    if (existsSync(src)) {
      renameSync(src, logFilePath(i + 1))
    }
  }
}

function shouldRotate(): boolean {
  const current = logFilePath(0)
  if (!existsSync(current)) return false
  return statSync(current).size >= MAX_FILE_SIZE
}

function formatTimestamp(): string {
  return new Date().toISOString()
}

export type LogLevel = 'info' | 'warn' | 'error' | 'debug'

export function log(level: LogLevel, message: string): void {
  if (!initialized) {
    ensureLogDir()
    initialized = true
  }
  if (shouldRotate()) {
    rotate()
  }
  const line = `[${formatTimestamp()}] [${level.toUpperCase()}] ${message}\n`
  appendFileSync(logFilePath(0), line, 'utf-8')
}

function isHidDebugEnabled(): boolean {
  if (process.env.DECKWIRE_DEBUG_HID) return true
  if (hidDebug === null) {
    hidDebug = loadAppConfig().debugHid
  }
  return hidDebug
}

export function formatHex(data: Uint8Array): string {
  return Array.from(data)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join(' ')
}

export function logHidPacket(direction: 'TX' | 'RX' | 'FEATURE_TX' | 'FEATURE_RX', data: Uint8Array): void {
  if (!isHidDebugEnabled()) return
  log('debug', `HID ${direction}: ${formatHex(data)}`)
}

export function getLogPath(): string {
  return getLogDir()
}

/** Forget cached paths and flags (config directory or debug setting changed). */
export function resetLogger(): void {
  logDir = ''
  initialized = false
  hidDebug = null
}
