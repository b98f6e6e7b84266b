// SPDX-License-Identifier: GPL-2.0-or-later

import { getDescriptor } from '../shared/device-table'
import { loadAppConfig } from './app-config'
import { openHidTransport, type OpenPanelOptions } from './hid-service'
import { Panel, type PanelOptions } from './panel'

/**
 * Open a supported panel over node-hid.
 * The model is checked before the device is touched; the default read
 * timeout comes from the app config unless given.
 */
export async function connectPanel(options: OpenPanelOptions & PanelOptions): Promise<Panel> {
  const descriptor = getDescriptor(options.vendorId, options.productId)
  const readTimeoutMs = options.readTimeoutMs ?? loadAppConfig().readTimeoutMs
  const transport = await openHidTransport(options)
  return new Panel(transport, descriptor, { readTimeoutMs })
}
