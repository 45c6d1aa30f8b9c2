import type { Subscription } from "../../ports/subscription"
import { SubscriptionGroup } from "../subscription-group"

function fakeSubscription(closed = false) {
  const sub = {
    closed,
    unsubscribe: vi.fn(() => {
      sub.closed = true
    }),
  }

  return sub
}

describe("SubscriptionGroup", () => {
  let group: SubscriptionGroup

  beforeEach(() => {
    group = new SubscriptionGroup()
  })

  it("tracks added members until removed", () => {
    const a = fakeSubscription()
    const b = fakeSubscription()

    group.add(a)
    group.add(b)
    expect(group.size).toBe(2)

    expect(group.remove(a)).toBe(true)
    expect(group.remove(a)).toBe(false)
    expect(group.size).toBe(1)
    expect(a.unsubscribe).not.toHaveBeenCalled()
  })

  it("ignores members that are already closed", () => {
    group.add(fakeSubscription(true))

    expect(group.size).toBe(0)
  })

  it("unsubscribe() cancels every member and closes the group", () => {
    const members = [fakeSubscription(), fakeSubscription(), fakeSubscription()]
    for (const m of members) group.add(m)

    group.unsubscribe()

    expect(group.closed).toBe(true)
    expect(group.size).toBe(0)
    for (const m of members) expect(m.unsubscribe).toHaveBeenCalledOnce()
  })

  it("unsubscribe() is idempotent", () => {
    const member = fakeSubscription()
    group.add(member)

    group.unsubscribe()
    group.unsubscribe()

    expect(member.unsubscribe).toHaveBeenCalledOnce()
  })

  it("members removing themselves during unsubscribe() are all still cancelled", () => {
    const members: Subscription[] = []
    const calls: number[] = []

    for (const i of [0, 1, 2]) {
      const member: Subscription = {
        closed: false,
        unsubscribe: () => {
          calls.push(i)
          group.remove(member)
        },
      }
      members.push(member)
      group.add(member)
    }

    group.unsubscribe()

    expect(calls).toEqual([0, 1, 2])
  })

  it("anything added after close is unsubscribed immediately", () => {
    group.unsubscribe()
    const late = fakeSubscription()

    group.add(late)

    expect(late.unsubscribe).toHaveBeenCalledOnce()
    expect(group.size).toBe(0)
  })
})
