// SPDX-License-Identifier: GPL-2.0-or-later
// Public entry point

export { Panel, type PanelOptions } from './panel'
export { PanelStateReader, type InputSource } from './state-reader'
export { connectPanel } from './connect'
export { HidTransport, openHidTransport, type OpenPanelOptions } from './hid-service'
export { loadAppConfig, saveAppConfig, DEFAULT_APP_CONFIG, type AppConfig } from './app-config'
export { log, getLogPath, type LogLevel } from './logger'

export {
  allDescriptors,
  lookupDescriptor,
  getDescriptor,
  descriptorForKind,
  isVendorFamiliar,
  flipKeyIndex,
} from '../shared/device-table'
export {
  chunkImageReports,
  encodeKeyImage,
  encodeLcdRegion,
  encodeLcdFill,
  keyImageParameters,
  type ImageReportParameters,
  type HeaderBuilder,
} from '../shared/image-transfer'
export { decodeInput } from '../shared/input-decoder'
export { PanelStateDiffer, type DeviceState } from '../shared/state-differ'
export { clampBrightness, extractString } from '../shared/feature-reports'
export * from '../shared/errors'
export type * from '../shared/types/protocol'
export type * from '../shared/types/transport'
