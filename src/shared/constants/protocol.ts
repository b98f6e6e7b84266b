// SPDX-License-Identifier: GPL-2.0-or-later

// USB identity
export const ELGATO_VENDOR_ID = 0x0fd9

export const PID_ORIGINAL = 0x0060
export const PID_ORIGINAL_V2 = 0x006d
export const PID_MINI = 0x0063
export const PID_MINI_MK2 = 0x0090
export const PID_MINI_MK2_MODULE = 0x00b8
export const PID_XL = 0x006c
export const PID_XL_V2 = 0x008f
export const PID_MK2 = 0x0080
export const PID_MK2_SCISSOR = 0x00a5
export const PID_PEDAL = 0x0086
export const PID_PLUS = 0x0084
export const PID_NEO = 0x009a

// Image report sizing
export const IMAGE_REPORT_LENGTH = 1024
export const ORIGINAL_IMAGE_REPORT_LENGTH = 8191
export const LEGACY_IMAGE_HEADER_LENGTH = 16
export const MODERN_IMAGE_HEADER_LENGTH = 8
export const LCD_REGION_HEADER_LENGTH = 16
export const LCD_FILL_HEADER_LENGTH = 8

// Output report ids / commands
export const REPORT_ID_IMAGE = 0x02
export const CMD_LEGACY_KEY_IMAGE = 0x01
export const CMD_KEY_IMAGE = 0x07
export const CMD_LCD_FILL = 0x0b
export const CMD_LCD_REGION = 0x0c

// Feature reports
export const LEGACY_FEATURE_LENGTH = 17
export const MODERN_FEATURE_LENGTH = 32
export const LEGACY_RESET = [0x0b, 0x63] as const
export const MODERN_RESET = [0x03, 0x02] as const
export const LEGACY_BRIGHTNESS_PREFIX = [0x05, 0x55, 0xaa, 0xd1, 0x01] as const
export const MODERN_BRIGHTNESS_PREFIX = [0x03, 0x08] as const
export const TOUCH_POINT_COLOR_PREFIX = [0x03, 0x06] as const
export const MAX_BRIGHTNESS = 100

// Input reports (touch-strip layout)
export const INPUT_KIND_BUTTONS = 0x00
export const INPUT_KIND_TOUCH_SCREEN = 0x02
export const INPUT_KIND_ENCODER = 0x03
export const TOUCH_GESTURE_PRESS = 0x01
export const TOUCH_GESTURE_LONG_PRESS = 0x02
export const TOUCH_GESTURE_SWIPE = 0x03
export const ENCODER_EVENT_PRESS = 0x00
export const ENCODER_EVENT_TWIST = 0x01

// Feature-report strings
export const SERIAL_STRIP_CHAR = '\u0001'
export const UNKNOWN_DEVICE_STRING = 'Unknown'

// Communication defaults
export const DEFAULT_READ_TIMEOUT_MS = 100
