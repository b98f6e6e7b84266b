// SPDX-License-Identifier: GPL-2.0-or-later

/** Panel model tag */
export type PanelKind =
  | 'original'
  | 'originalV2'
  | 'mini'
  | 'miniMk2'
  | 'miniMk2Module'
  | 'xl'
  | 'xlV2'
  | 'mk2'
  | 'mk2Scissor'
  | 'pedal'
  | 'plus'
  | 'neo'

export type ImageMode = 'bmp' | 'jpeg'
export type ImageRotation = 0 | 90 | 180 | 270
export type ImageMirror = 'none' | 'x' | 'y' | 'xy'

/** Encoding the image converter must produce for a surface */
export interface ImageFormat {
  mode: ImageMode
  width: number
  height: number
  rotation: ImageRotation
  mirror: ImageMirror
}

/**
 * How key images are framed on the wire.
 *   legacy-large: page numbers start at 1, payload always split in two
 *   legacy-small: page numbers start at 0
 *   modern: length and page carried as LE16
 */
export type KeyImageFamily = 'legacy-large' | 'legacy-small' | 'modern'

/**
 * Input report shape.
 *   legacy-mirrored: flat key vector from offset 1, keys mirrored within their row
 *   legacy: flat key vector from offset 1
 *   modern: flat key + touch point vector from offset 4
 *   touch-strip: report[1] selects buttons, touch screen or encoders
 */
export type InputLayout = 'legacy-mirrored' | 'legacy' | 'modern' | 'touch-strip'

/** Selects reset, brightness and touch point colour feature report layouts */
export type ControlFamily = 'legacy' | 'modern'

export type LcdCapability = 'region' | 'fill'

export interface LcdInfo {
  width: number
  height: number
  format: ImageFormat
  capability: LcdCapability
}

/** Where a text field lives inside a feature report */
export interface FeatureTextLayout {
  reportId: number
  length: number
  offset: number
}

export interface KeyImageReportLayout {
  family: KeyImageFamily
  reportLength: number
  headerLength: number
}

export interface InputReportLayout {
  layout: InputLayout
  length: number
}

/** Static per-model metadata */
export interface PanelDescriptor {
  kind: PanelKind
  name: string
  vendorId: number
  productId: number
  keyCount: number
  rows: number
  columns: number
  encoderCount: number
  touchPointCount: number
  visual: boolean
  keyImageFormat: ImageFormat | null
  lcd: LcdInfo | null
  keyImageReport: KeyImageReportLayout
  inputReport: InputReportLayout
  serialReport: FeatureTextLayout
  firmwareReport: FeatureTextLayout
  controlFamily: ControlFamily
}

export interface Point {
  x: number
  y: number
}

/** Encoded image for a screen region */
export interface ImageRect {
  width: number
  height: number
  data: Uint8Array
}

/** One decoded input report, before edge detection */
export type PanelInput =
  | { type: 'noData' }
  | { type: 'buttons'; states: boolean[] }
  | { type: 'encoders'; states: boolean[] }
  | { type: 'encoderTwist'; deltas: number[] }
  | { type: 'touchPress'; x: number; y: number }
  | { type: 'touchLongPress'; x: number; y: number }
  | { type: 'touchSwipe'; from: Point; to: Point }

/** Edge event produced by the state differ */
export type PanelStateUpdate =
  | { type: 'buttonDown'; index: number }
  | { type: 'buttonUp'; index: number }
  | { type: 'encoderDown'; index: number }
  | { type: 'encoderUp'; index: number }
  | { type: 'encoderTwist'; index: number; delta: number }
  | { type: 'touchPointDown'; index: number }
  | { type: 'touchPointUp'; index: number }
  | { type: 'touchScreenPress'; x: number; y: number }
  | { type: 'touchScreenLongPress'; x: number; y: number }
  | { type: 'touchScreenSwipe'; from: Point; to: Point }
