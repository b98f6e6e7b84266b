// SPDX-License-Identifier: GPL-2.0-or-later
// node-hid based panel transport.
// Opens one panel and moves fixed-size output, input and feature reports.

import HID, { type HIDAsync } from 'node-hid'
import { pLimit, type LimitFunction } from '../shared/concurrency'
import type { DeviceStrings, PanelTransport } from '../shared/types/transport'
import { log, logHidPacket } from './logger'

export interface OpenPanelOptions {
  vendorId: number
  productId: number
  /** Picks one panel when several of the same model are attached */
  serialNumber?: string
}

/**
 * Fit a buffer to exactly `length` bytes, truncating or zero-filling.
 */
export function normalizeReport(buf: Uint8Array, length: number): Uint8Array {
  const result = new Uint8Array(length)
  result.set(buf.subarray(0, Math.min(buf.length, length)))
  return result
}

/**
 * Some platforms return feature reports without the leading report id.
 * Put it back so callers can rely on fixed field offsets.
 */
export function normalizeFeatureReport(buf: Uint8Array, reportId: number, length: number): Uint8Array {
  if (buf.length === length - 1 && buf[0] !== reportId) {
    const withId = new Uint8Array(length)
    withId[0] = reportId
    withId.set(buf, 1)
    return withId
  }
  return normalizeReport(buf, length)
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

export class HidTransport implements PanelTransport {
  private readonly device: HIDAsync
  private readonly label: string
  // Output and feature reports share the control pipe on most platforms
  private readonly serialize: LimitFunction = pLimit(1)
  private closed = false

  constructor(device: HIDAsync, label: string) {
    this.device = device
    this.label = label
  }

  getFeatureReport(reportId: number, length: number): Promise<Uint8Array> {
    return this.serialize(async () => {
      const raw = await this.device.getFeatureReport(reportId, length)
      const result = normalizeFeatureReport(raw, reportId, length)
      logHidPacket('FEATURE_RX', result)
      return result
    })
  }

  sendFeatureReport(data: Uint8Array): Promise<void> {
    return this.serialize(async () => {
      logHidPacket('FEATURE_TX', data)
      await this.device.sendFeatureReport(Array.from(data))
    })
  }

  write(data: Uint8Array): Promise<void> {
    return this.serialize(async () => {
      logHidPacket('TX', data)
      await this.device.write(Array.from(data))
    })
  }

  async read(length: number, timeoutMs?: number): Promise<Uint8Array | null> {
    let response: Buffer | undefined
    try {
      response = await this.device.read(timeoutMs)
    } catch (err) {
      throw toError(err)
    }
    if (!response || response.length === 0) return null

    const result = normalizeReport(response, length)
    logHidPacket('RX', result)
    return result
  }

  async getDeviceStrings(): Promise<DeviceStrings> {
    const info = await this.device.getDeviceInfo()
    return {
      manufacturer: info.manufacturer ?? null,
      product: info.product ?? null,
    }
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    await this.device.close()
    log('info', `Closed ${this.label}`)
  }
}

/**
 * Open a panel by vendorId/productId, optionally narrowed by serial number.
 * Uses the device path for precise matching.
 */
export async function openHidTransport(options: OpenPanelOptions): Promise<HidTransport> {
  const { vendorId, productId, serialNumber } = options
  const devices = await HID.devicesAsync()
  const deviceInfo = devices.find(
    (d) =>
      d.vendorId === vendorId &&
      d.productId === productId &&
      (serialNumber === undefined || d.serialNumber === serialNumber),
  )

  if (!deviceInfo?.path) {
    throw new Error(`No panel ${vendorId.toString(16)}:${productId.toString(16)} is attached`)
  }

  const label = `${deviceInfo.product ?? 'panel'} (${deviceInfo.serialNumber ?? deviceInfo.path})`
  let device: HIDAsync
  try {
    device = await HID.HIDAsync.open(deviceInfo.path)
  } catch (err) {
    const error = toError(err)
    log('error', `Failed to open ${label}: ${error.message}`)
    throw error
  }
  log('info', `Opened ${label}`)
  return new HidTransport(device, label)
}
