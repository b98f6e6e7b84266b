// SPDX-License-Identifier: GPL-2.0-or-later
// App configuration backed by conf

import { dirname } from 'node:path'
import Conf from 'conf'
import { DEFAULT_READ_TIMEOUT_MS } from '../shared/constants/protocol'

export interface AppConfig {
  /** Default timeout for input reads, in milliseconds */
  readTimeoutMs: number
  /** Dump every HID report to the log */
  debugHid: boolean
}

export const DEFAULT_APP_CONFIG: AppConfig = {
  readTimeoutMs: DEFAULT_READ_TIMEOUT_MS,
  debugHid: false,
}

let store: Conf<AppConfig> | null = null

/**
 * The store is created on first use. DECKWIRE_CONFIG_DIR overrides the
 * platform config directory.
 */
export function getAppConfigStore(): Conf<AppConfig> {
  if (!store) {
    store = new Conf<AppConfig>({
      projectName: 'deckwire',
      configName: 'config',
      cwd: process.env.DECKWIRE_CONFIG_DIR || undefined,
      defaults: DEFAULT_APP_CONFIG,
    })
  }
  return store
}

function isValidTimeout(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0
}

/**
 * Load the config, replacing invalid values with defaults.
 */
export function loadAppConfig(): AppConfig {
  const raw = getAppConfigStore().store
  return {
    readTimeoutMs: isValidTimeout(raw.readTimeoutMs) ? raw.readTimeoutMs : DEFAULT_APP_CONFIG.readTimeoutMs,
    debugHid: typeof raw.debugHid === 'boolean' ? raw.debugHid : DEFAULT_APP_CONFIG.debugHid,
  }
}

export function saveAppConfig(config: AppConfig): void {
  getAppConfigStore().store = config
}

export function getConfigDir(): string {
  return dirname(getAppConfigStore().path)
}

/** Drop the cached store so the next access re-reads the environment. */
export function resetAppConfigStore(): void {
  store = null
}
