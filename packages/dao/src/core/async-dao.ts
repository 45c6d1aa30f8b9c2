import type { Logger } from "@tablecache/logger"
import type { AsyncCallback, AsyncRun } from "../ports/async-outcome"
import type { Executor } from "../ports/executor"
import type { TableDao } from "../ports/table-dao"
import { DaoError } from "./dao-error"
import type { DeliveryQueue } from "./delivery-queue"
import { SubscriptionGroup } from "./subscription-group"
import { TrackedRun } from "./tracked-run"

export type AsyncDaoDeps<TRecord, TId> = {
  dao: TableDao<TRecord, TId>

  /** Runs the synchronous operations. */
  background: Executor

  /** Delivers outcomes, one at a time, in completion order. */
  delivery: DeliveryQueue

  logger: Logger
}

/**
 * Async variants of every {@link TableDao} operation.
 *
 * Async calls require an active subscription group: call `subscribe()` first
 * and `unsubscribe()` when the results are no longer wanted. Unsubscribing
 * cancels everything still in flight; cancelled callbacks never fire.
 *
 * @example
 * ```ts
 * users.subscribe()
 * users.insertAsync(ada, (outcome) => {
 *   if (outcome.kind === "ok") render(outcome.value)
 * })
 * // later
 * users.unsubscribe()
 * ```
 */
export class AsyncDao<TRecord, TId> {
  private group: SubscriptionGroup | undefined
  private readonly logger: Logger

  constructor(private readonly deps: AsyncDaoDeps<TRecord, TId>) {
    this.logger = deps.logger.child({ module: "async-dao", table: deps.dao.tableName })
  }

  get isSubscribed(): boolean {
    return this.group !== undefined
  }

  /** Runs launched under the current group and not yet delivered. */
  get inFlight(): number {
    return this.group?.size ?? 0
  }

  /** No-op while a group is active. */
  subscribe(): void {
    if (this.group !== undefined) return

    this.group = new SubscriptionGroup()
  }

  unsubscribe(): void {
    const group = this.group
    if (group === undefined) return

    this.group = undefined

    const cancelled = group.size
    group.unsubscribe()

    if (cancelled > 0) this.logger.debug("Cancelled in-flight runs", { cancelled })
  }

  /**
   * Run `work` on the background executor and deliver its outcome to
   * `onComplete` on the delivery queue.
   *
   * @throws {DaoError} `subscription_required` when no group is active.
   */
  runAsync<T>(operation: string, work: () => T, onComplete: AsyncCallback<T>): AsyncRun {
    const group = this.group

    if (group === undefined) {
      throw DaoError.subscriptionRequired(this.deps.dao.tableName, operation)
    }

    const run = new TrackedRun(operation, work, onComplete, {
      table: this.deps.dao.tableName,
      delivery: this.deps.delivery,
      logger: this.logger,
      onSettled: (settled) => group.remove(settled),
    })

    group.add(run)
    this.deps.background.execute(() => run.execute())

    return run
  }

  insertAsync(record: TRecord, onComplete: AsyncCallback<boolean>): AsyncRun {
    return this.runAsync("insert", () => this.deps.dao.insert(record), onComplete)
  }

  insertBatchAsync(records: readonly TRecord[], onComplete: AsyncCallback<boolean>): AsyncRun {
    return this.runAsync("insertBatch", () => this.deps.dao.insertBatch(records), onComplete)
  }

  clearTableAsync(onComplete: AsyncCallback<boolean>): AsyncRun {
    return this.runAsync("clearTable", () => this.deps.dao.clearTable(), onComplete)
  }

  deleteByIdAsync(id: TId, onComplete: AsyncCallback<boolean>): AsyncRun {
    return this.runAsync("deleteById", () => this.deps.dao.deleteById(id), onComplete)
  }

  queryAllAsync(onComplete: AsyncCallback<TRecord[]>): AsyncRun {
    return this.runAsync("queryAll", () => this.deps.dao.queryAll(), onComplete)
  }

  /**
   * `queryAll` on the background executor, outside any subscription group.
   * Cannot be cancelled; rejects with whatever the query throws.
   */
  queryAllDeferred(): Promise<TRecord[]> {
    return new Promise<TRecord[]>((resolve, reject) => {
      this.deps.background.execute(() => {
        try {
          resolve(this.deps.dao.queryAll())
        } catch (err) {
          reject(err)
        }
      })
    })
  }
}
