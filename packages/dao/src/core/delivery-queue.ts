import type { Logger } from "@tablecache/logger"
import type { Executor } from "../ports/executor"
import type { Subscription } from "../ports/subscription"

export type DeliveryQueueDeps = {
  /** Where drains run. */
  scheduler: Executor
  logger: Logger
}

class QueuedDelivery implements Subscription {
  private isClosed = false

  constructor(
    readonly callback: () => void,
    private readonly onCancel: (delivery: QueuedDelivery) => void,
  ) {}

  get closed(): boolean {
    return this.isClosed
  }

  /** Marks the delivery as taken; `false` if it was cancelled. */
  take(): boolean {
    if (this.isClosed) return false

    this.isClosed = true
    return true
  }

  unsubscribe(): void {
    if (this.isClosed) return

    this.isClosed = true
    this.onCancel(this)
  }
}

/**
 * Single-consumer FIFO of callbacks. Callbacks run one at a time, in the
 * order they were enqueued, never overlapping. A callback that throws is
 * logged and the queue moves on.
 */
export class DeliveryQueue {
  private readonly pending: QueuedDelivery[] = []
  private readonly logger: Logger
  private drainScheduled = false

  constructor(private readonly deps: DeliveryQueueDeps) {
    this.logger = deps.logger.child({ module: "delivery-queue" })
  }

  get size(): number {
    return this.pending.length
  }

  enqueue(callback: () => void): Subscription {
    const delivery = new QueuedDelivery(callback, (d) => this.forget(d))

    this.pending.push(delivery)
    this.scheduleDrain()

    return delivery
  }

  private forget(delivery: QueuedDelivery): void {
    const index = this.pending.indexOf(delivery)

    if (index !== -1) this.pending.splice(index, 1)
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) return

    this.drainScheduled = true
    this.deps.scheduler.execute(() => this.drain())
  }

  private drain(): void {
    try {
      let next = this.pending.shift()

      while (next !== undefined) {
        if (next.take()) this.deliver(next)

        next = this.pending.shift()
      }
    } finally {
      this.drainScheduled = false
    }
  }

  private deliver(delivery: QueuedDelivery): void {
    try {
      delivery.callback()
    } catch (err) {
      this.logger.error("Delivery callback threw", { err })
    }
  }
}
