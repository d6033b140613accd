import { TaskStateError } from "@pipeline-errors"

export type TaskOutcome<T> = { status: "success"; value: T } | { status: "failure"; error: unknown }

export interface TaskHandle<T> {
  /** Non-blocking; safe to call as often as the caller likes. */
  isRunning(): boolean
  /**
   * Takes the outcome out of the handle. Returns the value, or rethrows the
   * exact error the task raised. Throws TaskStateError while running or once
   * the outcome has already been taken.
   */
  getOutcome(): T
  /** Reads the outcome without consuming it. Null while running or once consumed. */
  peekOutcome(): TaskOutcome<T> | null
}

export interface PollOptions {
  intervalMs?: number
  onPoll?: (tick: number) => void
}

export const DEFAULT_POLL_INTERVAL_MS = 400

/**
 * Single-slot handoff: written once by the task, read once by the caller.
 */
class OutcomeSlot<T> {
  private outcome: TaskOutcome<T> | null = null
  private written = false

  put(outcome: TaskOutcome<T>): void {
    if (this.written) {
      throw new TaskStateError("Task outcome was already written.")
    }
    this.written = true
    this.outcome = outcome
  }

  peek(): TaskOutcome<T> | null {
    return this.outcome
  }

  take(): TaskOutcome<T> | null {
    const outcome = this.outcome
    this.outcome = null
    return outcome
  }
}

class BackgroundTask<T> implements TaskHandle<T> {
  private running = true
  private readonly slot = new OutcomeSlot<T>()

  constructor(run: () => T | Promise<T>) {
    // Deferred to a later turn so start() always returns before fn runs, even when fn is synchronous.
    void new Promise<void>((resolve) => setImmediate(resolve))
      .then(run)
      .then(
        (value) => this.finish({ status: "success", value }),
        (error: unknown) => this.finish({ status: "failure", error }),
      )
  }

  private finish(outcome: TaskOutcome<T>): void {
    this.slot.put(outcome)
    this.running = false
  }

  isRunning(): boolean {
    return this.running
  }

  peekOutcome(): TaskOutcome<T> | null {
    return this.running ? null : this.slot.peek()
  }

  getOutcome(): T {
    if (this.running) {
      throw new TaskStateError("Cannot get outcome while task is still running.")
    }
    const outcome = this.slot.take()
    if (!outcome) {
      throw new TaskStateError("Task finished, but its outcome was already consumed.")
    }
    if (outcome.status === "failure") {
      throw outcome.error
    }
    return outcome.value
  }
}

export function startTask<Args extends unknown[], T>(
  fn: (...args: Args) => T | Promise<T>,
  ...args: Args
): TaskHandle<T> {
  return new BackgroundTask(() => fn(...args))
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Polls the handle until the task completes, then consumes its outcome.
 * There is no timeout: a task that never settles keeps this loop alive.
 */
export async function pollTask<T>(handle: TaskHandle<T>, options: PollOptions = {}): Promise<T> {
  const { intervalMs = DEFAULT_POLL_INTERVAL_MS, onPoll } = options
  let tick = 0
  while (handle.isRunning()) {
    await sleep(intervalMs)
    if (handle.isRunning()) {
      tick += 1
      onPoll?.(tick)
    }
  }
  return handle.getOutcome()
}
