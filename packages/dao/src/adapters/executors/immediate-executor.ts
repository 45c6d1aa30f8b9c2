import type { Executor, Task } from "../../ports/executor"

/**
 * Each task gets its own `setImmediate` turn, after pending I/O callbacks.
 */
export class ImmediateExecutor implements Executor {
  execute(task: Task): void {
    setImmediate(task)
  }
}
