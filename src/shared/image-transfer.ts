// SPDX-License-Identifier: GPL-2.0-or-later

/**
 * Chunked image transfer.
 *
 * An image payload is split across fixed-length output reports:
 *   [header (variant specific)] [payload slice] [zero padding]
 * Only the final report carries last=1. Header layouts are bit-exact
 * copies of what the firmware expects; multi-byte fields are LE16.
 */

import {
  REPORT_ID_IMAGE,
  CMD_LEGACY_KEY_IMAGE,
  CMD_KEY_IMAGE,
  CMD_LCD_FILL,
  CMD_LCD_REGION,
  IMAGE_REPORT_LENGTH,
  LCD_FILL_HEADER_LENGTH,
  LCD_REGION_HEADER_LENGTH,
} from './constants/protocol'
import { flipKeyIndex } from './device-table'
import {
  ImageTooLargeError,
  InvalidKeyIndexError,
  NoScreenError,
  UnsupportedOperationError,
} from './errors'
import type { ImageRect, KeyImageFamily, PanelDescriptor } from './types/protocol'

export interface ImageReportParameters {
  reportLength: number
  headerLength: number
  /** Payload bytes per report */
  payloadLength: number
  /** Exact number of reports to send; the trailing ones may carry no payload */
  pageCount?: number
}

/** Builds the header for one report; returned bytes are zero-extended to headerLength. */
export type HeaderBuilder = (page: number, length: number, last: boolean) => number[]

// --- Byte helpers ---

function lo(value: number): number {
  return value & 0xff
}

function hi(value: number): number {
  return (value >> 8) & 0xff
}

function flag(value: boolean): number {
  return value ? 1 : 0
}

// --- Chunking ---

/**
 * Split `payload` into the ordered list of reports that carry it.
 * A zero-length payload yields no reports.
 */
export function chunkImageReports(
  payload: Uint8Array,
  params: ImageReportParameters,
  header: HeaderBuilder,
): Uint8Array[] {
  const { reportLength, headerLength, payloadLength, pageCount } = params
  assertPayloadFits(payload.length, params)

  const reports: Uint8Array[] = []
  let page = 0
  let offset = 0
  let remaining = payload.length
  if (remaining === 0) return reports

  while (pageCount === undefined ? remaining > 0 : page < pageCount) {
    const thisLength = Math.min(remaining, payloadLength)
    const last = pageCount === undefined ? thisLength === remaining : page === pageCount - 1

    const report = new Uint8Array(reportLength)
    const head = header(page, thisLength, last)
    report.set(head.slice(0, headerLength))
    report.set(payload.subarray(offset, offset + thisLength), headerLength)
    reports.push(report)

    offset += thisLength
    remaining -= thisLength
    page++
  }

  return reports
}

function assertPayloadFits(length: number, params: ImageReportParameters): void {
  const capacity = params.reportLength - params.headerLength
  if (length === 0) return
  if (params.payloadLength > capacity) {
    throw new ImageTooLargeError(length, capacity)
  }
  if (params.pageCount !== undefined && length > params.payloadLength * params.pageCount) {
    throw new ImageTooLargeError(length, capacity)
  }
}

/**
 * Send reports in order, one awaited write each.
 * A failing write aborts the transfer; reports already written stay written.
 */
export async function writeImageReports(
  write: (report: Uint8Array) => Promise<void>,
  reports: readonly Uint8Array[],
): Promise<void> {
  for (const report of reports) {
    await write(report)
  }
}

// --- Key images ---

interface KeyImageStrategy {
  payloadLength(descriptor: PanelDescriptor, imageLength: number): number
  pageCount?: number
  wireKey(descriptor: PanelDescriptor, key: number): number
  header(key: number): HeaderBuilder
}

function capacity(descriptor: PanelDescriptor): number {
  return descriptor.keyImageReport.reportLength - descriptor.keyImageReport.headerLength
}

const KEY_IMAGE_STRATEGIES: Record<KeyImageFamily, KeyImageStrategy> = {
  // Firmware expects exactly two reports per key image regardless of size
  'legacy-large': {
    payloadLength: (_descriptor, imageLength) => Math.ceil(imageLength / 2),
    pageCount: 2,
    wireKey: flipKeyIndex,
    header: (key) => (page, _length, last) =>
      [REPORT_ID_IMAGE, CMD_LEGACY_KEY_IMAGE, page + 1, 0, flag(last), key + 1],
  },
  'legacy-small': {
    payloadLength: capacity,
    wireKey: (_descriptor, key) => key,
    header: (key) => (page, _length, last) =>
      [REPORT_ID_IMAGE, CMD_LEGACY_KEY_IMAGE, page, 0, flag(last), key + 1],
  },
  modern: {
    payloadLength: capacity,
    wireKey: (_descriptor, key) => key,
    header: (key) => (page, length, last) =>
      [REPORT_ID_IMAGE, CMD_KEY_IMAGE, key, flag(last), lo(length), hi(length), lo(page), hi(page)],
  },
}

export function keyImageParameters(descriptor: PanelDescriptor, imageLength: number): ImageReportParameters {
  const strategy = KEY_IMAGE_STRATEGIES[descriptor.keyImageReport.family]
  return {
    reportLength: descriptor.keyImageReport.reportLength,
    headerLength: descriptor.keyImageReport.headerLength,
    payloadLength: strategy.payloadLength(descriptor, imageLength),
    pageCount: strategy.pageCount,
  }
}

/** Throws ImageTooLargeError when an image of `imageLength` bytes cannot be sent to this model. */
export function validateKeyImageSize(descriptor: PanelDescriptor, imageLength: number): void {
  assertPayloadFits(imageLength, keyImageParameters(descriptor, imageLength))
}

/** Throws when `key` cannot take an image on this model. */
export function validateKeyImage(descriptor: PanelDescriptor, key: number): void {
  if (!Number.isInteger(key) || key < 0 || key >= descriptor.keyCount) {
    throw new InvalidKeyIndexError(key, descriptor.keyCount)
  }
  if (!descriptor.visual) {
    throw new NoScreenError(descriptor.name)
  }
}

export function encodeKeyImage(descriptor: PanelDescriptor, key: number, image: Uint8Array): Uint8Array[] {
  validateKeyImage(descriptor, key)
  const strategy = KEY_IMAGE_STRATEGIES[descriptor.keyImageReport.family]
  const wireKey = strategy.wireKey(descriptor, key)
  return chunkImageReports(image, keyImageParameters(descriptor, image.length), strategy.header(wireKey))
}

// --- Screen writes ---

const LCD_REGION_PARAMETERS: ImageReportParameters = {
  reportLength: IMAGE_REPORT_LENGTH,
  headerLength: LCD_REGION_HEADER_LENGTH,
  payloadLength: IMAGE_REPORT_LENGTH - LCD_REGION_HEADER_LENGTH,
}

const LCD_FILL_PARAMETERS: ImageReportParameters = {
  reportLength: IMAGE_REPORT_LENGTH,
  headerLength: LCD_FILL_HEADER_LENGTH,
  payloadLength: IMAGE_REPORT_LENGTH - LCD_FILL_HEADER_LENGTH,
}

function requireU16(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
    throw new RangeError(`${name} must be an integer in 0..65535, got ${value}`)
  }
}

/** Coordinates and size are LE16 on the wire; anything else throws RangeError. */
export function lcdRegionHeader(x: number, y: number, width: number, height: number): HeaderBuilder {
  requireU16('x', x)
  requireU16('y', y)
  requireU16('width', width)
  requireU16('height', height)
  return (page, length, last) => [
    REPORT_ID_IMAGE,
    CMD_LCD_REGION,
    lo(x), hi(x),
    lo(y), hi(y),
    lo(width), hi(width),
    lo(height), hi(height),
    flag(last),
    lo(page), hi(page),
    lo(length), hi(length),
    0,
  ]
}

export const lcdFillHeader: HeaderBuilder = (page, length, last) => [
  REPORT_ID_IMAGE,
  CMD_LCD_FILL,
  0,
  flag(last),
  lo(length), hi(length),
  lo(page), hi(page),
]

export function encodeLcdRegion(descriptor: PanelDescriptor, x: number, y: number, rect: ImageRect): Uint8Array[] {
  if (descriptor.lcd?.capability !== 'region') {
    throw new UnsupportedOperationError('Screen region write', descriptor.name)
  }
  return chunkImageReports(rect.data, LCD_REGION_PARAMETERS, lcdRegionHeader(x, y, rect.width, rect.height))
}

/**
 * Fill the whole screen strip. Region-capable models get a region write
 * covering the strip; fill-only models use the dedicated fill command.
 */
export function encodeLcdFill(descriptor: PanelDescriptor, image: Uint8Array): Uint8Array[] {
  const lcd = descriptor.lcd
  if (!lcd) {
    throw new UnsupportedOperationError('Screen fill', descriptor.name)
  }
  if (lcd.capability === 'region') {
    return chunkImageReports(image, LCD_REGION_PARAMETERS, lcdRegionHeader(0, 0, lcd.width, lcd.height))
  }
  return chunkImageReports(image, LCD_FILL_PARAMETERS, lcdFillHeader)
}
