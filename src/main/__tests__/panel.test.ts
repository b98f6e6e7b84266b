// SPDX-License-Identifier: GPL-2.0-or-later

import { describe, it, expect, beforeEach } from 'vitest'
import { Panel } from '../panel'
import { FakeTransport, inputReport } from './fake-transport'
import {
  ELGATO_VENDOR_ID,
  PID_MINI,
  PID_MK2,
  PID_NEO,
  PID_ORIGINAL,
  PID_PEDAL,
  PID_PLUS,
} from '../../shared/constants/protocol'
import {
  BadDataError,
  ImageTooLargeError,
  InvalidKeyIndexError,
  InvalidTouchPointIndexError,
  NoScreenError,
  UnrecognizedDeviceError,
  UnsupportedOperationError,
} from '../../shared/errors'

function image(length: number, seed: number): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => (seed + i) & 0xff)
}

function ascii(s: string): number[] {
  return Array.from(s, (c) => c.charCodeAt(0))
}

let transport: FakeTransport

beforeEach(() => {
  transport = new FakeTransport()
})

describe('Panel.connect', () => {
  it('binds the descriptor for a supported model', () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_PLUS)
    expect(panel.kind).toBe('plus')
    expect(panel.descriptor.encoderCount).toBe(4)
  })

  it('rejects unknown models', () => {
    expect(() => Panel.connect(transport, 0x1234, 0x0001)).toThrow(UnrecognizedDeviceError)
  })
})

describe('device information', () => {
  it('returns transport strings, Unknown when missing', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_MK2)
    await expect(panel.manufacturer()).resolves.toBe('Elgato')

    transport.strings = { manufacturer: null, product: null }
    await expect(panel.product()).resolves.toBe('Unknown')
  })

  it('reads serial and firmware from modern feature reports', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_MK2)
    transport.featureResponses.set(0x06, Uint8Array.from([0x06, 0x0c, ...ascii('CL12345678'), 0]))
    transport.featureResponses.set(0x05, Uint8Array.from([0x05, 0x0c, 0, 0, 0, 0, ...ascii('1.00.012'), 0]))

    await expect(panel.serialNumber()).resolves.toBe('CL12345678')
    await expect(panel.firmwareVersion()).resolves.toBe('1.00.012')
    expect(transport.featureReads).toEqual([
      { reportId: 0x06, length: 32 },
      { reportId: 0x05, length: 32 },
    ])
  })

  it('reads serial from the legacy layout at offset 5', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_MINI)
    transport.featureResponses.set(0x03, Uint8Array.from([0x03, 0x55, 0xaa, 0xd3, 0x03, ...ascii('BL09'), 0]))

    await expect(panel.serialNumber()).resolves.toBe('BL09')
    expect(transport.featureReads).toEqual([{ reportId: 0x03, length: 17 }])
  })
})

describe('settings', () => {
  it('reset sends the modern layout', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_MK2)
    await panel.reset()
    expect(Array.from(transport.featureWrites[0].subarray(0, 3))).toEqual([0x03, 0x02, 0])
    expect(transport.featureWrites[0].length).toBe(32)
  })

  it('reset sends the legacy layout', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_ORIGINAL)
    await panel.reset()
    expect(Array.from(transport.featureWrites[0].subarray(0, 3))).toEqual([0x0b, 0x63, 0])
    expect(transport.featureWrites[0].length).toBe(17)
  })

  it('setBrightness clamps before encoding', async () => {
    const modern = Panel.connect(transport, ELGATO_VENDOR_ID, PID_MK2)
    await modern.setBrightness(150)
    expect(Array.from(transport.featureWrites[0].subarray(0, 3))).toEqual([0x03, 0x08, 100])

    const legacy = Panel.connect(transport, ELGATO_VENDOR_ID, PID_MINI)
    await legacy.setBrightness(255)
    expect(Array.from(transport.featureWrites[1].subarray(0, 6))).toEqual([0x05, 0x55, 0xaa, 0xd1, 0x01, 100])
  })

  it('setTouchPointColor addresses points after the keys', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_NEO)
    await panel.setTouchPointColor(0, 255, 128, 0)
    expect(Array.from(transport.featureWrites[0])).toEqual([0x03, 0x06, 8, 255, 128, 0])
  })

  it('setTouchPointColor rejects models without touch points, without I/O', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_MK2)
    await expect(panel.setTouchPointColor(0, 1, 2, 3)).rejects.toThrow(InvalidTouchPointIndexError)
    expect(transport.ioCount).toBe(0)
  })
})

describe('key images', () => {
  it('writeImage only queues; flush sends in insertion order', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_MK2)
    panel.writeImage(2, image(10, 0x10))
    panel.writeImage(0, image(10, 0x20))
    panel.writeImage(2, image(10, 0x30))

    expect(transport.writes).toHaveLength(0)
    expect(panel.pendingImageCount()).toBe(3)

    await panel.flush()

    expect(transport.writes.map((w) => w[2])).toEqual([2, 0, 2])
    // The last image for key 2 is the one sent last
    expect(transport.writes[2][8]).toBe(0x30)
    expect(panel.pendingImageCount()).toBe(0)
  })

  it('flush with an empty queue does no I/O', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_MK2)
    await panel.flush()
    expect(transport.ioCount).toBe(0)
  })

  it('copies the caller buffer on writeImage', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_MK2)
    const data = image(4, 1)
    panel.writeImage(0, data)
    data[0] = 0xee
    await panel.flush()
    expect(transport.writes[0][8]).toBe(1)
  })

  it('rejects key >= keyCount before any I/O', () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_MK2)
    expect(() => panel.writeImage(15, image(10, 0))).toThrow(InvalidKeyIndexError)
    expect(panel.pendingImageCount()).toBe(0)
    expect(transport.ioCount).toBe(0)
  })

  it('rejects an oversize image at enqueue time so later images still flush', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_ORIGINAL)
    expect(() => panel.writeImage(0, image(20000, 0))).toThrow(ImageTooLargeError)
    expect(panel.pendingImageCount()).toBe(0)
    expect(transport.ioCount).toBe(0)

    panel.writeImage(1, image(100, 0))
    await panel.flush()

    expect(transport.writes).toHaveLength(2)
    expect(panel.pendingImageCount()).toBe(0)
  })

  it('rejects images for a model with no visual surface', () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_PEDAL)
    expect(() => panel.writeImage(0, image(10, 0))).toThrow(NoScreenError)
  })

  it('leaves the queue intact when a write fails, so a retry resends everything', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_MK2)
    panel.writeImage(0, image(10, 0))
    panel.writeImage(1, image(10, 0))
    panel.writeImage(2, image(10, 0))
    transport.failWriteAt = 1

    await expect(panel.flush()).rejects.toThrow('HID write failed')
    expect(panel.pendingImageCount()).toBe(3)
    expect(transport.writes).toHaveLength(1)

    await panel.flush()
    expect(transport.writes.map((w) => w[2])).toEqual([0, 0, 1, 2])
    expect(panel.pendingImageCount()).toBe(0)
  })

  it('keeps images queued while a flush is running for the next flush', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_MK2)
    panel.writeImage(0, image(10, 0))

    const flushing = panel.flush()
    panel.writeImage(5, image(10, 0))
    await flushing

    expect(transport.writes.map((w) => w[2])).toEqual([0])
    expect(panel.pendingImageCount()).toBe(1)

    await panel.flush()
    expect(transport.writes.map((w) => w[2])).toEqual([0, 5])
  })

  it('sends legacy-large images as two mirrored reports', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_ORIGINAL)
    panel.writeImage(0, image(15606, 0))
    await panel.flush()

    expect(transport.writes).toHaveLength(2)
    expect(Array.from(transport.writes[0].subarray(0, 6))).toEqual([0x02, 0x01, 1, 0, 0, 5])
    expect(Array.from(transport.writes[1].subarray(0, 6))).toEqual([0x02, 0x01, 2, 0, 1, 5])
  })

  it('clearAllButtonImages queues one blank per key', () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_MINI)
    panel.clearAllButtonImages(image(8, 0))
    expect(panel.pendingImageCount()).toBe(6)
  })
})

describe('screen writes', () => {
  it('writeLcd sends immediately', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_PLUS)
    await panel.writeLcd(10, 0, { width: 100, height: 100, data: image(1500, 0) })

    expect(transport.writes).toHaveLength(2)
    expect(Array.from(transport.writes[1].subarray(0, 4))).toEqual([0x02, 0x0c, 10, 0])
  })

  it('writeLcd is unsupported on models without a region screen, without I/O', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_MK2)
    await expect(panel.writeLcd(0, 0, { width: 1, height: 1, data: image(3, 0) })).rejects.toThrow(
      UnsupportedOperationError,
    )
    expect(transport.ioCount).toBe(0)
  })

  it('writeLcd rejects out-of-range coordinates without I/O', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_PLUS)
    await expect(panel.writeLcd(70000, 0, { width: 10, height: 10, data: image(30, 0) })).rejects.toThrow(RangeError)
    await expect(panel.writeLcd(0, -1, { width: 1.5, height: 10, data: image(30, 0) })).rejects.toThrow(RangeError)
    expect(transport.ioCount).toBe(0)
  })

  it('writeLcdFill uses the fill command on fill-only screens', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_NEO)
    await panel.writeLcdFill(image(100, 0))
    expect(Array.from(transport.writes[0].subarray(0, 8))).toEqual([0x02, 0x0b, 0, 1, 100, 0, 0, 0])
  })
})

describe('input', () => {
  it('reads inputReport.length bytes with the default timeout', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_MK2, { readTimeoutMs: 250 })
    transport.inputs.push(inputReport(19, 1, 0, 0, 0, 1))

    const input = await panel.readInput()

    expect(transport.reads).toEqual([{ length: 19, timeoutMs: 250 }])
    expect(input.type).toBe('buttons')
  })

  it('an explicit timeout overrides the default', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_MK2, { readTimeoutMs: 250 })
    transport.inputs.push(null)

    await expect(panel.readInput(5)).resolves.toEqual({ type: 'noData' })
    expect(transport.reads).toEqual([{ length: 19, timeoutMs: 5 }])
  })

  it('propagates transport failures', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_MK2)
    await expect(panel.readInput()).rejects.toThrow('Device disconnected')
  })
})

describe('PanelStateReader', () => {
  it('turns consecutive reports into edge events', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_NEO)
    const reader = panel.getReader()
    transport.inputs.push(
      inputReport(14, 1, 0, 0, 0, 1, 0, 0, 0, 0, 0, 0, 0, 1),
      null,
      inputReport(14, 1, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 1),
    )

    await expect(reader.read()).resolves.toEqual([
      { type: 'buttonDown', index: 0 },
      { type: 'touchPointDown', index: 0 },
    ])
    await expect(reader.read()).resolves.toEqual([])
    await expect(reader.read()).resolves.toEqual([{ type: 'buttonUp', index: 0 }])
  })

  it('leaves state untouched when decoding fails', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_PLUS)
    const reader = panel.getReader()
    transport.inputs.push(
      inputReport(14, 1, 0x00, 0, 0, 1),
      inputReport(14, 1, 0x07),
      inputReport(14, 1, 0x00, 0, 0, 1),
    )

    await expect(reader.read()).resolves.toEqual([{ type: 'buttonDown', index: 0 }])
    await expect(reader.read()).rejects.toThrow(BadDataError)
    await expect(reader.read()).resolves.toEqual([])
  })

  it('passes encoder twists and touch gestures through', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_PLUS)
    const reader = panel.getReader()
    transport.inputs.push(
      inputReport(14, 1, 0x03, 0x05, 0, 0x01, 0, 0xfe),
      inputReport(14, 1, 0x02, 0, 0, 0x01, 0, 0x64, 0, 0x0a, 0),
    )

    await expect(reader.read(10)).resolves.toEqual([{ type: 'encoderTwist', index: 1, delta: -2 }])
    await expect(reader.read(10)).resolves.toEqual([{ type: 'touchScreenPress', x: 100, y: 10 }])
    expect(transport.reads.map((r) => r.timeoutMs)).toEqual([10, 10])
  })
})

describe('close', () => {
  it('closes the transport', async () => {
    const panel = Panel.connect(transport, ELGATO_VENDOR_ID, PID_MK2)
    await panel.close()
    expect(transport.closed).toBe(true)
  })
})
