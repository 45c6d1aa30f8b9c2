import type { Executor, Task } from "../../ports/executor"

/**
 * Holds tasks until told to run them. Lets tests step background work and
 * deliveries independently.
 */
export class ManualExecutor implements Executor {
  private readonly queue: Task[] = []

  execute(task: Task): void {
    this.queue.push(task)
  }

  get pending(): number {
    return this.queue.length
  }

  /** @returns `false` when nothing was queued. */
  runNext(): boolean {
    const task = this.queue.shift()
    if (task === undefined) return false

    task()
    return true
  }

  /**
   * Run until the queue is empty, including tasks queued while running.
   *
   * @returns the number of tasks run.
   */
  runAll(): number {
    let ran = 0

    while (this.runNext()) ran++

    return ran
  }
}
