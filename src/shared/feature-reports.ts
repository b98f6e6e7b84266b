// SPDX-License-Identifier: GPL-2.0-or-later
// Control-channel (feature report) layouts: reset, brightness, touch point colour, text fields

import {
  LEGACY_FEATURE_LENGTH,
  MODERN_FEATURE_LENGTH,
  LEGACY_RESET,
  MODERN_RESET,
  LEGACY_BRIGHTNESS_PREFIX,
  MODERN_BRIGHTNESS_PREFIX,
  TOUCH_POINT_COLOR_PREFIX,
  MAX_BRIGHTNESS,
  SERIAL_STRIP_CHAR,
} from './constants/protocol'
import { InvalidTouchPointIndexError, TextDecodeError } from './errors'
import type { ControlFamily, PanelDescriptor } from './types/protocol'

/** Build a feature report (zero-padded to length). */
function report(length: number, ...bytes: number[]): Uint8Array {
  const buf = new Uint8Array(length)
  buf.set(bytes.slice(0, length))
  return buf
}

export function clampBrightness(percent: number): number {
  if (Number.isNaN(percent)) return 0
  return Math.round(Math.min(MAX_BRIGHTNESS, Math.max(0, percent)))
}

export function buildResetReport(family: ControlFamily): Uint8Array {
  return family === 'legacy'
    ? report(LEGACY_FEATURE_LENGTH, ...LEGACY_RESET)
    : report(MODERN_FEATURE_LENGTH, ...MODERN_RESET)
}

/** Percent is clamped to 0..100 before encoding. */
export function buildBrightnessReport(family: ControlFamily, percent: number): Uint8Array {
  const value = clampBrightness(percent)
  return family === 'legacy'
    ? report(LEGACY_FEATURE_LENGTH, ...LEGACY_BRIGHTNESS_PREFIX, value)
    : report(MODERN_FEATURE_LENGTH, ...MODERN_BRIGHTNESS_PREFIX, value)
}

/**
 * Touch point LEDs are addressed after the keys: index = keyCount + point.
 */
export function buildTouchPointColorReport(
  descriptor: PanelDescriptor,
  point: number,
  red: number,
  green: number,
  blue: number,
): Uint8Array {
  if (!Number.isInteger(point) || point < 0 || point >= descriptor.touchPointCount) {
    throw new InvalidTouchPointIndexError(point, descriptor.touchPointCount)
  }
  return Uint8Array.of(
    ...TOUCH_POINT_COLOR_PREFIX,
    descriptor.keyCount + point,
    red & 0xff,
    green & 0xff,
    blue & 0xff,
  )
}

/**
 * Extract a text field from a feature report: bytes from `offset` up to
 * the first NUL (or the end), strict UTF-8, with 0x01 control characters removed.
 */
export function extractString(bytes: Uint8Array, offset: number, field: string): string {
  const run = bytes.subarray(Math.min(offset, bytes.length))
  const nul = run.indexOf(0)
  const text = nul === -1 ? run : run.subarray(0, nul)
  let decoded: string
  try {
    decoded = new TextDecoder('utf-8', { fatal: true }).decode(text)
  } catch (err) {
    throw new TextDecodeError(field, err)
  }
  return decoded.split(SERIAL_STRIP_CHAR).join('')
}
