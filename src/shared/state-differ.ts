// SPDX-License-Identifier: GPL-2.0-or-later
// Turns level-triggered input snapshots into edge events

import { Guarded } from './concurrency'
import type { PanelDescriptor, PanelInput, PanelStateUpdate } from './types/protocol'

export interface DeviceState {
  /** Keys followed by touch points */
  buttons: boolean[]
  encoders: boolean[]
}

export function initialDeviceState(descriptor: PanelDescriptor): DeviceState {
  return {
    buttons: new Array<boolean>(descriptor.keyCount + descriptor.touchPointCount).fill(false),
    encoders: new Array<boolean>(descriptor.encoderCount).fill(false),
  }
}

export class PanelStateDiffer {
  private readonly keyCount: number
  private readonly state: Guarded<DeviceState>

  constructor(descriptor: PanelDescriptor) {
    this.keyCount = descriptor.keyCount
    this.state = new Guarded('device state', initialDeviceState(descriptor))
  }

  /** Copy of the last stored vectors. */
  snapshot(): DeviceState {
    return this.state.with((s) => ({ buttons: [...s.buttons], encoders: [...s.encoders] }))
  }

  update(input: PanelInput): PanelStateUpdate[] {
    switch (input.type) {
      case 'buttons':
        return this.state.with((s) => {
          const updates = this.diffButtons(s.buttons, input.states)
          s.buttons = [...input.states]
          return updates
        })

      case 'encoders':
        return this.state.with((s) => {
          const updates = diffEncoders(s.encoders, input.states)
          s.encoders = [...input.states]
          return updates
        })

      case 'encoderTwist':
        return input.deltas.flatMap((delta, index): PanelStateUpdate[] =>
          delta !== 0 ? [{ type: 'encoderTwist', index, delta }] : [],
        )

      case 'touchPress':
        return [{ type: 'touchScreenPress', x: input.x, y: input.y }]

      case 'touchLongPress':
        return [{ type: 'touchScreenLongPress', x: input.x, y: input.y }]

      case 'touchSwipe':
        return [{ type: 'touchScreenSwipe', from: { ...input.from }, to: { ...input.to } }]

      case 'noData':
        return []
    }
  }

  private diffButtons(previous: boolean[], next: boolean[]): PanelStateUpdate[] {
    const updates: PanelStateUpdate[] = []
    const length = Math.min(previous.length, next.length)
    for (let i = 0; i < length; i++) {
      if (previous[i] === next[i]) continue
      if (i < this.keyCount) {
        updates.push({ type: next[i] ? 'buttonDown' : 'buttonUp', index: i })
      } else {
        updates.push({ type: next[i] ? 'touchPointDown' : 'touchPointUp', index: i - this.keyCount })
      }
    }
    return updates
  }
}

function diffEncoders(previous: boolean[], next: boolean[]): PanelStateUpdate[] {
  const updates: PanelStateUpdate[] = []
  const length = Math.min(previous.length, next.length)
  for (let i = 0; i < length; i++) {
    if (previous[i] !== next[i]) {
      updates.push({ type: next[i] ? 'encoderDown' : 'encoderUp', index: i })
    }
  }
  return updates
}
