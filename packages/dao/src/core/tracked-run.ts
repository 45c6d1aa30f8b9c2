import type { TableName } from "@tablecache/cache"
import type { Logger } from "@tablecache/logger"
import type {
  AsyncCallback,
  AsyncOutcome,
  AsyncRun,
  AsyncRunState,
} from "../ports/async-outcome"
import type { Subscription } from "../ports/subscription"
import { DaoError } from "./dao-error"
import type { DeliveryQueue } from "./delivery-queue"

export type TrackedRunDeps = {
  table: TableName
  delivery: DeliveryQueue
  logger: Logger

  /** Called once, when the run is delivered or cancelled. */
  onSettled: (run: AsyncRun) => void
}

/**
 * One async operation: work on the background executor, outcome on the
 * delivery queue.
 */
export class TrackedRun<T> implements AsyncRun {
  private current: AsyncRunState = "scheduled"
  private delivery: Subscription | undefined

  constructor(
    readonly operation: string,
    private readonly work: () => T,
    private readonly onComplete: AsyncCallback<T>,
    private readonly deps: TrackedRunDeps,
  ) {}

  get state(): AsyncRunState {
    return this.current
  }

  get closed(): boolean {
    return this.current !== "scheduled" && this.current !== "running"
  }

  /** Background entry point. Does nothing once cancelled. */
  execute(): void {
    if (this.current !== "scheduled") return

    this.current = "running"

    const outcome = this.perform()

    if (this.current !== "running") return

    this.delivery = this.deps.delivery.enqueue(() => this.deliver(outcome))
  }

  cancel(): void {
    if (this.closed) return

    this.current = "cancelled"
    this.delivery?.unsubscribe()
    this.deps.onSettled(this)
  }

  unsubscribe(): void {
    this.cancel()
  }

  private perform(): AsyncOutcome<T> {
    try {
      return { kind: "ok", value: this.work() }
    } catch (err) {
      const error = DaoError.asyncOperationFailed(this.deps.table, this.operation, err)

      this.deps.logger.error("Async operation failed", { operation: this.operation, err: error })

      return { kind: "error", error }
    }
  }

  private deliver(outcome: AsyncOutcome<T>): void {
    this.current = outcome.kind === "ok" ? "delivered" : "faulted"
    this.deps.onSettled(this)
    this.onComplete(outcome)
  }
}
