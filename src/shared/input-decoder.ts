// SPDX-License-Identifier: GPL-2.0-or-later

/**
 * Input report decoding.
 *
 * report[0] is a status byte; 0 means the device had nothing new.
 * Layouts:
 *   legacy / legacy-mirrored: [status, key0, key1, ...]
 *   modern:                   [status, x, x, x, key0, ..., touchPoint0, ...]
 *   touch-strip:              [status, kind, ...] where kind selects
 *     0x00 buttons   [.., .., .., .., key0, ...]
 *     0x02 touch     [.., .., .., .., gesture, .., x LE16, y LE16, x2 LE16, y2 LE16]
 *     0x03 encoders  [.., .., .., .., event, enc0, enc1, ...]
 */

import {
  INPUT_KIND_BUTTONS,
  INPUT_KIND_TOUCH_SCREEN,
  INPUT_KIND_ENCODER,
  TOUCH_GESTURE_PRESS,
  TOUCH_GESTURE_LONG_PRESS,
  TOUCH_GESTURE_SWIPE,
  ENCODER_EVENT_PRESS,
  ENCODER_EVENT_TWIST,
} from './constants/protocol'
import { flipKeyIndex } from './device-table'
import { BadDataError } from './errors'
import type { InputLayout, PanelDescriptor, PanelInput } from './types/protocol'

const MODERN_BUTTON_OFFSET = 4
const LEGACY_BUTTON_OFFSET = 1
const ENCODER_OFFSET = 5

// --- Byte helpers ---

function readLE16(buf: Uint8Array, offset: number): number {
  return buf[offset] | (buf[offset + 1] << 8)
}

function toInt8(byte: number): number {
  return byte > 0x7f ? byte - 0x100 : byte
}

function requireLength(report: Uint8Array, length: number, what: string): void {
  if (report.length < length) {
    throw new BadDataError(`${what} report too short: ${report.length} < ${length}`)
  }
}

function buttonVectorLength(descriptor: PanelDescriptor): number {
  return descriptor.keyCount + descriptor.touchPointCount
}

function readFlatButtons(descriptor: PanelDescriptor, report: Uint8Array, offset: number): boolean[] {
  const count = buttonVectorLength(descriptor)
  requireLength(report, offset + count, 'Button')
  return Array.from(report.subarray(offset, offset + count), (b) => b !== 0)
}

function readMirroredButtons(descriptor: PanelDescriptor, report: Uint8Array): boolean[] {
  requireLength(report, LEGACY_BUTTON_OFFSET + descriptor.keyCount, 'Button')
  const states: boolean[] = []
  for (let key = 0; key < descriptor.keyCount; key++) {
    states.push(report[flipKeyIndex(descriptor, key) + LEGACY_BUTTON_OFFSET] !== 0)
  }
  return states
}

function readTouchScreen(report: Uint8Array): PanelInput {
  requireLength(report, 10, 'Touch screen')
  const x = readLE16(report, 6)
  const y = readLE16(report, 8)

  switch (report[4]) {
    case TOUCH_GESTURE_PRESS:
      return { type: 'touchPress', x, y }
    case TOUCH_GESTURE_LONG_PRESS:
      return { type: 'touchLongPress', x, y }
    case TOUCH_GESTURE_SWIPE:
      requireLength(report, 14, 'Touch swipe')
      return {
        type: 'touchSwipe',
        from: { x, y },
        to: { x: readLE16(report, 10), y: readLE16(report, 12) },
      }
    default:
      throw new BadDataError(`Unknown touch gesture 0x${report[4].toString(16)}`)
  }
}

function readEncoders(descriptor: PanelDescriptor, report: Uint8Array): PanelInput {
  const end = ENCODER_OFFSET + descriptor.encoderCount
  requireLength(report, end, 'Encoder')
  const values = Array.from(report.subarray(ENCODER_OFFSET, end))

  switch (report[4]) {
    case ENCODER_EVENT_PRESS:
      return { type: 'encoders', states: values.map((b) => b !== 0) }
    case ENCODER_EVENT_TWIST:
      return { type: 'encoderTwist', deltas: values.map(toInt8) }
    default:
      throw new BadDataError(`Unknown encoder event 0x${report[4].toString(16)}`)
  }
}

function readTouchStrip(descriptor: PanelDescriptor, report: Uint8Array): PanelInput {
  requireLength(report, 5, 'Input')
  switch (report[1]) {
    case INPUT_KIND_BUTTONS:
      return { type: 'buttons', states: readFlatButtons(descriptor, report, MODERN_BUTTON_OFFSET) }
    case INPUT_KIND_TOUCH_SCREEN:
      return readTouchScreen(report)
    case INPUT_KIND_ENCODER:
      return readEncoders(descriptor, report)
    default:
      throw new BadDataError(`Unknown input report kind 0x${report[1].toString(16)}`)
  }
}

const DECODERS: Record<InputLayout, (descriptor: PanelDescriptor, report: Uint8Array) => PanelInput> = {
  'legacy-mirrored': (descriptor, report) => ({ type: 'buttons', states: readMirroredButtons(descriptor, report) }),
  legacy: (descriptor, report) => ({ type: 'buttons', states: readFlatButtons(descriptor, report, LEGACY_BUTTON_OFFSET) }),
  modern: (descriptor, report) => ({ type: 'buttons', states: readFlatButtons(descriptor, report, MODERN_BUTTON_OFFSET) }),
  'touch-strip': readTouchStrip,
}

/**
 * Decode one raw input report for the given model.
 * Throws BadDataError for any shape the model does not produce.
 */
export function decodeInput(descriptor: PanelDescriptor, report: Uint8Array): PanelInput {
  if (report.length === 0 || report[0] === 0) return { type: 'noData' }
  return DECODERS[descriptor.inputReport.layout](descriptor, report)
}
