// SPDX-License-Identifier: GPL-2.0-or-later

/**
 * High-level Panel class.
 * Binds one transport to its model descriptor and routes every operation
 * through the protocol layer:
 *   - key images are queued and sent in insertion order on flush()
 *   - screen writes are chunked and sent immediately
 *   - input reads decode one report into a PanelInput
 */

import { UNKNOWN_DEVICE_STRING } from '../shared/constants/protocol'
import { Guarded, pLimit, type LimitFunction } from '../shared/concurrency'
import { getDescriptor } from '../shared/device-table'
import {
  buildBrightnessReport,
  buildResetReport,
  buildTouchPointColorReport,
  extractString,
} from '../shared/feature-reports'
import {
  encodeKeyImage,
  encodeLcdFill,
  encodeLcdRegion,
  validateKeyImage,
  validateKeyImageSize,
  writeImageReports,
} from '../shared/image-transfer'
import { decodeInput } from '../shared/input-decoder'
import type {
  FeatureTextLayout,
  ImageRect,
  PanelDescriptor,
  PanelInput,
  PanelKind,
} from '../shared/types/protocol'
import type { PanelTransport } from '../shared/types/transport'
import { PanelStateReader } from './state-reader'

export interface PanelOptions {
  /** Used by readInput() when no timeout is passed; undefined blocks */
  readTimeoutMs?: number
}

interface PendingImage {
  key: number
  data: Uint8Array
}

export class Panel {
  readonly descriptor: PanelDescriptor
  private readonly transport: PanelTransport
  private readonly readTimeoutMs: number | undefined
  private readonly imageCache = new Guarded<PendingImage[]>('image cache', [])
  private readonly flushLimit: LimitFunction = pLimit(1)

  constructor(transport: PanelTransport, descriptor: PanelDescriptor, options: PanelOptions = {}) {
    this.transport = transport
    this.descriptor = descriptor
    this.readTimeoutMs = options.readTimeoutMs
  }

  /**
   * Bind an opened transport to the model identified by vendorId/productId.
   * Throws UnrecognizedDeviceError for unsupported models.
   */
  static connect(transport: PanelTransport, vendorId: number, productId: number, options?: PanelOptions): Panel {
    return new Panel(transport, getDescriptor(vendorId, productId), options)
  }

  get kind(): PanelKind {
    return this.descriptor.kind
  }

  // --- Device information ---

  async manufacturer(): Promise<string> {
    const strings = await this.transport.getDeviceStrings()
    return strings.manufacturer ?? UNKNOWN_DEVICE_STRING
  }

  async product(): Promise<string> {
    const strings = await this.transport.getDeviceStrings()
    return strings.product ?? UNKNOWN_DEVICE_STRING
  }

  serialNumber(): Promise<string> {
    return this.readText(this.descriptor.serialReport, 'serial number')
  }

  firmwareVersion(): Promise<string> {
    return this.readText(this.descriptor.firmwareReport, 'firmware version')
  }

  private async readText(layout: FeatureTextLayout, field: string): Promise<string> {
    const bytes = await this.transport.getFeatureReport(layout.reportId, layout.length)
    return extractString(bytes, layout.offset, field)
  }

  // --- Input ---

  /**
   * Read and decode one input report. A timed-out read yields noData.
   */
  async readInput(timeoutMs: number | undefined = this.readTimeoutMs): Promise<PanelInput> {
    const report = await this.transport.read(this.descriptor.inputReport.length, timeoutMs)
    if (!report) return { type: 'noData' }
    return decodeInput(this.descriptor, report)
  }

  getReader(): PanelStateReader {
    return new PanelStateReader(this)
  }

  // --- Settings ---

  reset(): Promise<void> {
    return this.transport.sendFeatureReport(buildResetReport(this.descriptor.controlFamily))
  }

  /** Percent is clamped to 0..100. */
  setBrightness(percent: number): Promise<void> {
    return this.transport.sendFeatureReport(buildBrightnessReport(this.descriptor.controlFamily, percent))
  }

  async setTouchPointColor(point: number, red: number, green: number, blue: number): Promise<void> {
    const report = buildTouchPointColorReport(this.descriptor, point, red, green, blue)
    await this.transport.sendFeatureReport(report)
  }

  // --- Key images ---

  /**
   * Queue an already-encoded key image. Nothing reaches the device until flush().
   * Images the model cannot take are rejected here and never queued.
   */
  writeImage(key: number, data: Uint8Array): void {
    validateKeyImage(this.descriptor, key)
    validateKeyImageSize(this.descriptor, data.length)
    const copy = Uint8Array.from(data)
    this.imageCache.with((cache) => {
      cache.push({ key, data: copy })
    })
  }

  /** Queue a caller-encoded blank image for one key. */
  clearButtonImage(key: number, blank: Uint8Array): void {
    this.writeImage(key, blank)
  }

  clearAllButtonImages(blank: Uint8Array): void {
    for (let key = 0; key < this.descriptor.keyCount; key++) {
      this.writeImage(key, blank)
    }
  }

  pendingImageCount(): number {
    return this.imageCache.with((cache) => cache.length)
  }

  /**
   * Send every queued image in insertion order, then drop the sent entries.
   * If a write fails the queue is left untouched, so a retried flush
   * resends entries that already reached the device.
   */
  flush(): Promise<void> {
    return this.flushLimit(async () => {
      const pending = this.imageCache.with((cache) => cache.slice())
      if (pending.length === 0) return

      for (const image of pending) {
        await this.sendImage(image.key, image.data)
      }

      this.imageCache.with((cache) => {
        cache.splice(0, pending.length)
      })
    })
  }

  private sendImage(key: number, data: Uint8Array): Promise<void> {
    return writeImageReports((r) => this.transport.write(r), encodeKeyImage(this.descriptor, key, data))
  }

  // --- Screen ---

  /** Write an image to a region of the screen strip. */
  async writeLcd(x: number, y: number, rect: ImageRect): Promise<void> {
    const reports = encodeLcdRegion(this.descriptor, x, y, rect)
    await writeImageReports((r) => this.transport.write(r), reports)
  }

  /** Replace the whole screen strip. */
  async writeLcdFill(data: Uint8Array): Promise<void> {
    const reports = encodeLcdFill(this.descriptor, data)
    await writeImageReports((r) => this.transport.write(r), reports)
  }

  close(): Promise<void> {
    return this.transport.close()
  }
}
