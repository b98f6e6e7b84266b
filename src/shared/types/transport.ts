// SPDX-License-Identifier: GPL-2.0-or-later

export interface DeviceStrings {
  manufacturer: string | null
  product: string | null
}

/**
 * Raw HID channel to one opened panel.
 * Feature reports travel on the control channel; write/read move
 * fixed-size reports on the data channel.
 */
export interface PanelTransport {
  /** Returns `length` bytes, the report id first. */
  getFeatureReport(reportId: number, length: number): Promise<Uint8Array>
  sendFeatureReport(data: Uint8Array): Promise<void>
  write(data: Uint8Array): Promise<void>
  /**
   * Read one input report of `length` bytes.
   * Resolves null when `timeoutMs` elapses; rejects when the device is gone.
   */
  read(length: number, timeoutMs?: number): Promise<Uint8Array | null>
  getDeviceStrings(): Promise<DeviceStrings>
  close(): Promise<void>
}
