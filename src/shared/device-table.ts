// SPDX-License-Identifier: GPL-2.0-or-later
// Static per-model metadata. Adding a model means adding one row here.

import {
  ELGATO_VENDOR_ID,
  PID_ORIGINAL,
  PID_ORIGINAL_V2,
  PID_MINI,
  PID_MINI_MK2,
  PID_MINI_MK2_MODULE,
  PID_XL,
  PID_XL_V2,
  PID_MK2,
  PID_MK2_SCISSOR,
  PID_PEDAL,
  PID_PLUS,
  PID_NEO,
  IMAGE_REPORT_LENGTH,
  ORIGINAL_IMAGE_REPORT_LENGTH,
  LEGACY_IMAGE_HEADER_LENGTH,
  MODERN_IMAGE_HEADER_LENGTH,
  LEGACY_FEATURE_LENGTH,
  MODERN_FEATURE_LENGTH,
} from './constants/protocol'
import { UnrecognizedDeviceError } from './errors'
import type {
  FeatureTextLayout,
  ImageFormat,
  KeyImageReportLayout,
  PanelDescriptor,
  PanelKind,
} from './types/protocol'

// --- Shared row fragments ---

const LEGACY_LARGE_IMAGES: KeyImageReportLayout = {
  family: 'legacy-large',
  reportLength: ORIGINAL_IMAGE_REPORT_LENGTH,
  headerLength: LEGACY_IMAGE_HEADER_LENGTH,
}

const LEGACY_SMALL_IMAGES: KeyImageReportLayout = {
  family: 'legacy-small',
  reportLength: IMAGE_REPORT_LENGTH,
  headerLength: LEGACY_IMAGE_HEADER_LENGTH,
}

const MODERN_IMAGES: KeyImageReportLayout = {
  family: 'modern',
  reportLength: IMAGE_REPORT_LENGTH,
  headerLength: MODERN_IMAGE_HEADER_LENGTH,
}

const MODERN_SERIAL: FeatureTextLayout = { reportId: 0x06, length: MODERN_FEATURE_LENGTH, offset: 2 }
const MODERN_FIRMWARE: FeatureTextLayout = { reportId: 0x05, length: MODERN_FEATURE_LENGTH, offset: 6 }
const LEGACY_FIRMWARE: FeatureTextLayout = { reportId: 0x04, length: LEGACY_FEATURE_LENGTH, offset: 5 }

function jpeg(size: number, mirror: ImageFormat['mirror'] = 'xy'): ImageFormat {
  return { mode: 'jpeg', width: size, height: size, rotation: 0, mirror }
}

const MINI_KEY_FORMAT: ImageFormat = { mode: 'bmp', width: 80, height: 80, rotation: 90, mirror: 'y' }

/** Fills in the fields every 5×3 / 8×4 modern model shares. */
function modern(
  kind: PanelKind,
  name: string,
  productId: number,
  rows: number,
  columns: number,
  keyImageFormat: ImageFormat | null,
): PanelDescriptor {
  const keyCount = rows * columns
  return {
    kind,
    name,
    vendorId: ELGATO_VENDOR_ID,
    productId,
    keyCount,
    rows,
    columns,
    encoderCount: 0,
    touchPointCount: 0,
    visual: keyImageFormat !== null,
    keyImageFormat,
    lcd: null,
    keyImageReport: MODERN_IMAGES,
    inputReport: { layout: 'modern', length: 4 + keyCount },
    serialReport: MODERN_SERIAL,
    firmwareReport: MODERN_FIRMWARE,
    controlFamily: 'modern',
  }
}

function mini(kind: PanelKind, name: string, productId: number, serialLength: number, firmware: FeatureTextLayout): PanelDescriptor {
  return {
    kind,
    name,
    vendorId: ELGATO_VENDOR_ID,
    productId,
    keyCount: 6,
    rows: 2,
    columns: 3,
    encoderCount: 0,
    touchPointCount: 0,
    visual: true,
    keyImageFormat: MINI_KEY_FORMAT,
    lcd: null,
    keyImageReport: LEGACY_SMALL_IMAGES,
    inputReport: { layout: 'legacy', length: 1 + 6 },
    serialReport: { reportId: 0x03, length: serialLength, offset: 5 },
    firmwareReport: firmware,
    controlFamily: 'legacy',
  }
}

// --- The table ---

const DESCRIPTORS: readonly PanelDescriptor[] = [
  {
    kind: 'original',
    name: 'Stream Deck Original',
    vendorId: ELGATO_VENDOR_ID,
    productId: PID_ORIGINAL,
    keyCount: 15,
    rows: 3,
    columns: 5,
    encoderCount: 0,
    touchPointCount: 0,
    visual: true,
    keyImageFormat: { mode: 'bmp', width: 72, height: 72, rotation: 0, mirror: 'xy' },
    lcd: null,
    keyImageReport: LEGACY_LARGE_IMAGES,
    inputReport: { layout: 'legacy-mirrored', length: 1 + 15 },
    serialReport: { reportId: 0x03, length: LEGACY_FEATURE_LENGTH, offset: 5 },
    firmwareReport: LEGACY_FIRMWARE,
    controlFamily: 'legacy',
  },
  modern('originalV2', 'Stream Deck Original V2', PID_ORIGINAL_V2, 3, 5, jpeg(72)),
  mini('mini', 'Stream Deck Mini', PID_MINI, LEGACY_FEATURE_LENGTH, LEGACY_FIRMWARE),
  mini('miniMk2', 'Stream Deck Mini Mk2', PID_MINI_MK2, MODERN_FEATURE_LENGTH, LEGACY_FIRMWARE),
  mini('miniMk2Module', 'Stream Deck Mini Mk2 Module', PID_MINI_MK2_MODULE, MODERN_FEATURE_LENGTH, {
    reportId: 0xa1,
    length: LEGACY_FEATURE_LENGTH,
    offset: 5,
  }),
  modern('xl', 'Stream Deck XL', PID_XL, 4, 8, jpeg(96)),
  modern('xlV2', 'Stream Deck XL V2', PID_XL_V2, 4, 8, jpeg(96)),
  modern('mk2', 'Stream Deck Mk2', PID_MK2, 3, 5, jpeg(72)),
  modern('mk2Scissor', 'Stream Deck Mk2 Scissor Keys', PID_MK2_SCISSOR, 3, 5, jpeg(72)),
  modern('pedal', 'Stream Deck Pedal', PID_PEDAL, 1, 3, null),
  {
    ...modern('plus', 'Stream Deck Plus', PID_PLUS, 2, 4, jpeg(120, 'none')),
    encoderCount: 4,
    lcd: {
      width: 800,
      height: 100,
      format: { mode: 'jpeg', width: 800, height: 100, rotation: 0, mirror: 'none' },
      capability: 'region',
    },
    // Fixed size: touch reports carry coordinates up to byte 13
    inputReport: { layout: 'touch-strip', length: 14 },
  },
  {
    ...modern('neo', 'Stream Deck Neo', PID_NEO, 2, 4, jpeg(96)),
    touchPointCount: 2,
    lcd: {
      width: 248,
      height: 58,
      format: { mode: 'jpeg', width: 248, height: 58, rotation: 180, mirror: 'none' },
      capability: 'fill',
    },
    inputReport: { layout: 'modern', length: 4 + 8 + 2 },
  },
]

function pairKey(vendorId: number, productId: number): string {
  return `${vendorId}:${productId}`
}

const BY_PAIR: ReadonlyMap<string, PanelDescriptor> = new Map(
  DESCRIPTORS.map((d) => [pairKey(d.vendorId, d.productId), d]),
)

const BY_KIND: ReadonlyMap<PanelKind, PanelDescriptor> = new Map(
  DESCRIPTORS.map((d) => [d.kind, d]),
)

const FAMILIAR_VENDORS: ReadonlySet<number> = new Set(DESCRIPTORS.map((d) => d.vendorId))

export function allDescriptors(): readonly PanelDescriptor[] {
  return DESCRIPTORS
}

export function lookupDescriptor(vendorId: number, productId: number): PanelDescriptor | undefined {
  return BY_PAIR.get(pairKey(vendorId, productId))
}

/**
 * Like lookupDescriptor, but unknown pairs throw UnrecognizedDeviceError.
 */
export function getDescriptor(vendorId: number, productId: number): PanelDescriptor {
  const descriptor = lookupDescriptor(vendorId, productId)
  if (!descriptor) throw new UnrecognizedDeviceError(vendorId, productId)
  return descriptor
}

export function descriptorForKind(kind: PanelKind): PanelDescriptor {
  const descriptor = BY_KIND.get(kind)
  if (!descriptor) throw new Error(`No descriptor for kind ${kind}`)
  return descriptor
}

export function isVendorFamiliar(vendorId: number): boolean {
  return FAMILIAR_VENDORS.has(vendorId)
}

/**
 * Mirror a key index horizontally within its row.
 * Used by models whose firmware numbers keys right-to-left.
 */
export function flipKeyIndex(descriptor: PanelDescriptor, key: number): number {
  const col = key % descriptor.columns
  return key - col + (descriptor.columns - 1 - col)
}
