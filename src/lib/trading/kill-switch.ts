// ============================================================
// Kill Switch
// ============================================================
// Process-lifetime halt flag. Activation is synchronous; the pipeline
// reports the transition from clear to active.
// ============================================================

export interface KillSwitchState {
  active: boolean
  reason: string | null
  activatedAt: number | null
}

export class KillSwitch {
  private state: KillSwitchState = { active: false, reason: null, activatedAt: null }

  get isActive(): boolean {
    return this.state.active
  }

  /**
   * Set the switch. Returns true only for the call that flipped it;
   * repeated calls keep the first reason.
   */
  activate(reason: string, now: number = Date.now()): boolean {
    if (this.state.active) return false
    this.state = { active: true, reason, activatedAt: now }
    return true
  }

  /** Returns true when the switch was set */
  clear(): boolean {
    if (!this.state.active) return false
    this.state = { active: false, reason: null, activatedAt: null }
    return true
  }

  getState(): Readonly<KillSwitchState> {
    return { ...this.state }
  }
}
