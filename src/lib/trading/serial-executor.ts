// ============================================================
// Serial Executor
// ============================================================
// Single promise chain: each task starts only after the previous one
// settled, so a check and the state change that follows it can never
// interleave with another caller's.
// ============================================================

export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve()
  private pending = 0

  /**
   * Queue a task behind every task queued before it.
   * A failing task rejects its own promise only; the chain continues.
   */
  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++
    const result = this.tail.then(task)
    this.tail = result.then(
      () => {
        this.pending--
      },
      () => {
        this.pending--
      },
    )
    return result
  }

  /** Tasks queued or running */
  get size(): number {
    return this.pending
  }

  /** Resolves once everything queued so far has settled */
  idle(): Promise<void> {
    return this.tail
  }
}
