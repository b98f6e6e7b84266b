// SPDX-License-Identifier: GPL-2.0-or-later

import { PanelStateDiffer } from '../shared/state-differ'
import type { PanelInput, PanelStateUpdate, PanelDescriptor } from '../shared/types/protocol'

/** What the reader needs from a panel */
export interface InputSource {
  readonly descriptor: PanelDescriptor
  readInput(timeoutMs?: number): Promise<PanelInput>
}

/**
 * Keeps the last known button/encoder state of a panel and returns
 * edge events instead of full snapshots.
 */
export class PanelStateReader {
  private readonly source: InputSource
  private readonly differ: PanelStateDiffer

  constructor(source: InputSource) {
    this.source = source
    this.differ = new PanelStateDiffer(source.descriptor)
  }

  /**
   * Read one report and diff it against the stored state.
   * The timeout only bounds the transport read; state changes happen after it.
   */
  async read(timeoutMs?: number): Promise<PanelStateUpdate[]> {
    const input = await this.source.readInput(timeoutMs)
    return this.differ.update(input)
  }
}
