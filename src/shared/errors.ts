// SPDX-License-Identifier: GPL-2.0-or-later
// Typed failures raised by the panel protocol layer

export type PanelErrorCode =
  | 'BadData'
  | 'InvalidKeyIndex'
  | 'InvalidTouchPointIndex'
  | 'UnsupportedOperation'
  | 'NoScreen'
  | 'Poisoned'
  | 'TextDecode'
  | 'UnrecognizedDevice'
  | 'ImageTooLarge'

export class PanelError extends Error {
  override name = 'PanelError'
  readonly code: PanelErrorCode
  constructor(code: PanelErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.code = code
  }
}

export class BadDataError extends PanelError {
  override name = 'BadDataError'
  constructor(message: string) { super('BadData', message) }
}

export class InvalidKeyIndexError extends PanelError {
  override name = 'InvalidKeyIndexError'
  readonly key: number
  constructor(key: number, keyCount: number) {
    super('InvalidKeyIndex', `Key index ${key} out of range (key count ${keyCount})`)
    this.key = key
  }
}

export class InvalidTouchPointIndexError extends PanelError {
  override name = 'InvalidTouchPointIndexError'
  readonly point: number
  constructor(point: number, touchPointCount: number) {
    super('InvalidTouchPointIndex', `Touch point ${point} out of range (touch point count ${touchPointCount})`)
    this.point = point
  }
}

export class UnsupportedOperationError extends PanelError {
  override name = 'UnsupportedOperationError'
  constructor(operation: string, model: string) {
    super('UnsupportedOperation', `${operation} is not supported by ${model}`)
  }
}

export class NoScreenError extends PanelError {
  override name = 'NoScreenError'
  constructor(model: string) { super('NoScreen', `${model} has no visual surface`) }
}

export class PoisonedError extends PanelError {
  override name = 'PoisonedError'
  constructor(resource: string, cause: unknown) {
    super('Poisoned', `${resource} is poisoned by an earlier failure`, { cause })
  }
}

export class TextDecodeError extends PanelError {
  override name = 'TextDecodeError'
  constructor(field: string, cause: unknown) {
    super('TextDecode', `Failed to decode ${field}`, { cause })
  }
}

export class UnrecognizedDeviceError extends PanelError {
  override name = 'UnrecognizedDeviceError'
  constructor(vendorId: number, productId: number) {
    super('UnrecognizedDevice', `Unrecognized device ${hex16(vendorId)}:${hex16(productId)}`)
  }
}

export class ImageTooLargeError extends PanelError {
  override name = 'ImageTooLargeError'
  constructor(length: number, capacity: number) {
    super('ImageTooLarge', `Image payload of ${length} bytes exceeds per-report capacity of ${capacity}`)
  }
}

function hex16(value: number): string {
  return `0x${value.toString(16).padStart(4, '0')}`
}

export function isPanelError(err: unknown, code?: PanelErrorCode): err is PanelError {
  return err instanceof PanelError && (code === undefined || err.code === code)
}
