import type { Subscription } from "../ports/subscription"

/**
 * Set of subscriptions cancelled together. Once closed, anything added is
 * unsubscribed immediately.
 */
export class SubscriptionGroup implements Subscription {
  private readonly members = new Set<Subscription>()
  private isClosed = false

  get closed(): boolean {
    return this.isClosed
  }

  get size(): number {
    return this.members.size
  }

  add(subscription: Subscription): void {
    if (this.isClosed) {
      subscription.unsubscribe()
      return
    }

    if (!subscription.closed) this.members.add(subscription)
  }

  /** Forget `subscription` without unsubscribing it. */
  remove(subscription: Subscription): boolean {
    return this.members.delete(subscription)
  }

  unsubscribe(): void {
    if (this.isClosed) return

    this.isClosed = true

    const members = [...this.members]
    this.members.clear()

    for (const member of members) {
      member.unsubscribe()
    }
  }
}
