import type { Executor, Task } from "../../ports/executor"

export class MicrotaskExecutor implements Executor {
  execute(task: Task): void {
    queueMicrotask(task)
  }
}
