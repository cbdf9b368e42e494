import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import { createSilentLogger } from "@memqueue/pino-logger"
import { MemQueue } from "./memqueue"
import { MemoryKeyValueStore } from "./memory_store"
import { isMemQueueError } from "./errors"
import type { QueueHooks } from "./hooks"

const utc = (hour: number, minute = 0, second = 0) => Date.UTC(2024, 0, 15, hour, minute, second)
const T0 = utc(10, 30, 15)

async function putRange(mq: MemQueue<number>, queue: string, from: number, to: number): Promise<string[]> {
  const keys: string[] = []
  for (let i = from; i <= to; i++) {
    keys.push(await mq.put(queue, i))
  }
  return keys
}

describe("MemQueue", () => {
  let store: MemoryKeyValueStore
  let mq: MemQueue<number>

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] })
    vi.setSystemTime(T0)
    store = new MemoryKeyValueStore()
    mq = new MemQueue<number>({ store, logger: createSilentLogger() })
  })

  afterEach(() => {
    store.clear()
    vi.useRealTimers()
  })

  describe("checkQueue()", () => {
    it("returns 0 for a queue that was never written", async () => {
      expect(await mq.checkQueue("test1")).toBe(0)
    })

    it("returns the time of the last write after a put", async () => {
      await mq.put("testQe", 12345)
      expect(await mq.checkQueue("testQe")).toBe(T0)
    })

    it("reports a marker that is not a timestamp", async () => {
      await store.set("broken", "yesterday")
      await expect(mq.checkQueue("broken")).rejects.toSatisfy((e: unknown) => isMemQueueError(e, "corrupt-marker"))
    })
  })

  describe("createClientID()", () => {
    it("returns a fresh value every call", () => {
      const c1 = mq.createClientID()
      const c2 = mq.createClientID()
      expect(c1).not.toBe(c2)
    })
  })

  describe("put() / get() / last() / delete()", () => {
    it("last() returns the newest message", async () => {
      await putRange(mq, "testQ1", 1, 99)
      expect(await mq.last("testQ1")).toBe(99)
    })

    it("last() on an empty queue returns null and records nothing", async () => {
      expect(await mq.last("empty")).toBeNull()
      expect(await store.get("empty_LASTMSG_UnknownClient")).toBeNull()
    })

    it("get() after delete() returns null", async () => {
      const keys = await putRange(mq, "testQ2", 1, 99)
      const msgid = keys[keys.length - 1]

      expect(await mq.delete("testQ2", msgid)).toBe(true)
      expect(await mq.get("testQ2", msgid)).toBeNull()
      expect(await mq.delete("testQ2", msgid)).toBe(false)
    })

    it("builds keys from queue, client, time and a unique id", async () => {
      const key = await mq.put("orders", 1, "client-a")
      expect(key).toMatch(new RegExp(`^orders_client-a_${T0}_[0-9a-f-]{36}$`))
    })

    it("gives same-client same-instant writes distinct keys", async () => {
      const k1 = await mq.put("orders", 1, "client-a")
      const k2 = await mq.put("orders", 2, "client-a")
      expect(k1).not.toBe(k2)
    })

    it("records the delivery on the client's cursor", async () => {
      const key = await mq.put("orders", 7)
      vi.setSystemTime(T0 + 5_000)
      await mq.get("orders", key, "client-a")

      expect(await store.get("orders_LASTMSG_client-a")).toBe(key)
      expect(await store.get("orders_LASTTIME_client-a")).toBe(String(T0 + 5_000))
    })

    it("round-trips structured payloads", async () => {
      const typed = new MemQueue<{ at: Date; tags: Set<string> }>({ store, logger: createSilentLogger() })
      const key = await typed.put("events", { at: new Date(T0), tags: new Set(["a", "b"]) })

      const got = await typed.get("events", key)
      expect(got?.at).toBeInstanceOf(Date)
      expect(got?.at.getTime()).toBe(T0)
      expect(got?.tags).toEqual(new Set(["a", "b"]))
    })

    it("reports a payload that cannot be decoded, after advancing the cursor", async () => {
      await store.set("orders_x_1_abc", "not-json{{{")

      await expect(mq.get("orders", "orders_x_1_abc")).rejects.toSatisfy((e: unknown) =>
        isMemQueueError(e, "corrupt-payload"),
      )
      expect(await store.get("orders_LASTMSG_UnknownClient")).toBe("orders_x_1_abc")
    })
  })

  describe("listMessages()", () => {
    it("returns every key written in the window, in write order", async () => {
      const keys = await putRange(mq, "testQ3", 1, 99)

      const listed = await mq.listMessages("testQ3")
      expect(listed).toHaveLength(99)
      expect(listed).toEqual(keys)
    })

    it("merges several minute buckets without empty entries", async () => {
      const keys = await putRange(mq, "multi", 1, 2)
      vi.setSystemTime(utc(10, 31, 5))
      keys.push(await mq.put("multi", 3))
      vi.setSystemTime(utc(10, 32, 0))
      keys.push(await mq.put("multi", 4))

      const listed = await mq.listMessages("multi")
      expect(listed).toEqual(keys)
    })

    it("limits the view to the requested window", async () => {
      await putRange(mq, "narrow", 1, 2)
      vi.setSystemTime(utc(10, 32, 0))
      const recent = await mq.put("narrow", 3)

      expect(await mq.listMessages("narrow", 0)).toEqual([recent])
      expect(await mq.listMessages("narrow", 1)).toEqual([recent])
      expect(await mq.listMessages("narrow", 2)).toHaveLength(3)
    })

    it("spans an hour boundary", async () => {
      vi.setSystemTime(utc(10, 59, 30))
      const k1 = await mq.put("hourly", 1)
      vi.setSystemTime(utc(11, 0, 10))
      const k2 = await mq.put("hourly", 2)

      expect(await mq.listMessages("hourly", 1)).toEqual([k1, k2])
    })

    it("returns an empty list for an unknown queue", async () => {
      expect(await mq.listMessages("nothing")).toEqual([])
    })

    it("reports a corrupt bucket", async () => {
      await store.set("bad_LIST_202401151030", "bad_a_1_x")

      await expect(mq.listMessages("bad")).rejects.toSatisfy((e: unknown) => isMemQueueError(e, "corrupt-bucket"))
    })

    it("rejects a negative window", async () => {
      await expect(mq.listMessages("q", -1)).rejects.toSatisfy((e: unknown) => isMemQueueError(e, "invalid-window"))
    })
  })

  describe("nextmsg()", () => {
    it("continues after a single delivered message", async () => {
      const keys = await putRange(mq, "testQ4", 1, 49)
      expect(await mq.get("testQ4", keys[keys.length - 1])).toBe(49)
      await putRange(mq, "testQ4", 50, 99)

      expect(await mq.nextmsg("testQ4")).toBe(50)
    })

    it("continues after every prior message was delivered", async () => {
      for (let i = 1; i < 50; i++) {
        const msgid = await mq.put("testQ5", i)
        await mq.get("testQ5", msgid)
      }
      await putRange(mq, "testQ5", 50, 99)

      expect(await mq.nextmsg("testQ5")).toBe(50)
    })

    it("starts a brand-new client at the oldest message in the window", async () => {
      for (let i = 1; i < 50; i++) {
        const msgid = await mq.put("testQ6", i)
        await mq.get("testQ6", msgid)
      }
      await putRange(mq, "testQ6", 50, 99)

      expect(await mq.nextmsg("testQ6", "TestClient6")).toBe(1)
    })

    it("returns null on an empty queue", async () => {
      expect(await mq.nextmsg("empty")).toBeNull()
    })

    it("returns null repeatedly once caught up, until the next put", async () => {
      await putRange(mq, "steady", 1, 3)

      expect(await mq.nextmsg("steady")).toBe(1)
      expect(await mq.nextmsg("steady")).toBe(2)
      expect(await mq.nextmsg("steady")).toBe(3)
      expect(await mq.nextmsg("steady")).toBeNull()
      expect(await mq.nextmsg("steady")).toBeNull()

      await mq.put("steady", 4)
      expect(await mq.nextmsg("steady")).toBe(4)
      expect(await mq.nextmsg("steady")).toBeNull()
    })

    it("keeps clients independent", async () => {
      await putRange(mq, "shared", 1, 2)

      expect(await mq.nextmsg("shared", "a")).toBe(1)
      expect(await mq.nextmsg("shared", "b")).toBe(1)
      expect(await mq.nextmsg("shared", "a")).toBe(2)
      expect(await mq.nextmsg("shared", "b")).toBe(2)
    })

    it("does not fast-forward a client exactly at the lag threshold", async () => {
      await putRange(mq, "edge", 1, 5)
      expect(await mq.nextmsg("edge")).toBe(1)

      vi.setSystemTime(T0 + 120_000)
      expect(await mq.nextmsg("edge")).toBe(2)
    })

    it("fast-forwards a lagging client to the newest message", async () => {
      const onFastForward = vi.fn()
      const hooked = new MemQueue<number>({ store, logger: createSilentLogger(), hooks: { onFastForward } })

      await putRange(hooked, "lag", 1, 5)
      expect(await hooked.nextmsg("lag")).toBe(1)

      vi.setSystemTime(T0 + 121_000)
      await putRange(hooked, "lag", 6, 8)

      expect(await hooked.nextmsg("lag")).toBe(8)
      expect(onFastForward).toHaveBeenCalledWith("lag", "UnknownClient", 121_000)
      expect(await hooked.nextmsg("lag")).toBeNull()
    })

    it("starts from the oldest message when the last one left the window", async () => {
      const short = new MemQueue<number>({ store, logger: createSilentLogger(), clientLagSeconds: 2 })
      const [k1] = await putRange(short, "scroll", 1, 1)

      vi.setSystemTime(utc(10, 32, 59))
      await short.get("scroll", k1)
      await putRange(short, "scroll", 2, 3)
      // the 2-minute window now covers 10:31 to 10:33, without k1's bucket
      vi.setSystemTime(utc(10, 33, 0))

      expect(await short.nextmsg("scroll")).toBe(2)
    })

    it("lets a brand-new client catch up on messages older than the lag threshold", async () => {
      vi.setSystemTime(utc(10, 30, 0))
      await putRange(mq, "backlog", 1, 2)

      vi.setSystemTime(utc(10, 34, 0))
      expect(await mq.nextmsg("backlog", "fresh")).toBe(1)
      expect(await mq.nextmsg("backlog", "fresh")).toBe(2)
      expect(await mq.nextmsg("backlog", "fresh")).toBeNull()
    })

    it("moves the client's cursor time forward with every delivery", async () => {
      await putRange(mq, "orders", 1, 3)

      const seen: string[] = []
      for (const offset of [0, 10_000, 20_000]) {
        vi.setSystemTime(T0 + offset)
        await mq.nextmsg("orders", "c1")
        seen.push((await store.get("orders_LASTTIME_c1")) ?? "")
      }

      expect(seen).toEqual([String(T0), String(T0 + 10_000), String(T0 + 20_000)])
    })

    it("treats a client at the end of the window as caught up", async () => {
      const keys = await putRange(mq, "racy", 1, 2)
      await mq.get("racy", keys[1])
      // a concurrent producer moved the pointer to a message not yet listed
      await store.set("racy_LASTMSG", "racy_other_1_zzz")

      expect(await mq.nextmsg("racy")).toBeNull()
    })
  })

  describe("autodelete", () => {
    let auto: MemQueue<number>

    beforeEach(() => {
      auto = new MemQueue<number>({ store, logger: createSilentLogger(), autodelete: true })
    })

    it("deletes a message once it has been read", async () => {
      const key = await auto.put("once", 1)

      expect(await auto.get("once", key)).toBe(1)
      expect(await auto.get("once", key)).toBeNull()
    })

    it("still walks the queue in order", async () => {
      await putRange(auto, "walk", 1, 3)

      expect(await auto.nextmsg("walk")).toBe(1)
      expect(await auto.nextmsg("walk")).toBe(2)
      expect(await auto.nextmsg("walk")).toBe(3)
      expect(await auto.nextmsg("walk")).toBeNull()
      expect(store.keys().filter((k) => k.startsWith("walk_UnknownClient_"))).toEqual([])
    })
  })

  describe("purgeQueue()", () => {
    it("deletes every listed message and counts them", async () => {
      const keys = await putRange(mq, "purge", 1, 5)

      expect(await mq.purgeQueue("purge")).toBe(5)
      expect(await mq.get("purge", keys[0])).toBeNull()
      expect(await mq.purgeQueue("purge")).toBe(0)
    })

    it("keeps the bucket list", async () => {
      await putRange(mq, "purge", 1, 2)
      await mq.purgeQueue("purge")

      expect(await mq.listMessages("purge")).toHaveLength(2)
    })
  })

  describe("validation", () => {
    it("rejects queue names containing the bucket delimiter", async () => {
      await expect(mq.put("a,b", 1)).rejects.toSatisfy((e: unknown) => isMemQueueError(e, "invalid-name"))
      expect(store.size()).toBe(0)
    })

    it("rejects client IDs with whitespace", async () => {
      await expect(mq.nextmsg("q", "two words")).rejects.toSatisfy((e: unknown) => isMemQueueError(e, "invalid-name"))
    })

    it("rejects payloads over the size limit before writing", async () => {
      const small = new MemQueue<string>({ store, logger: createSilentLogger(), maxPayloadBytes: 10 })

      await expect(small.put("big", "x".repeat(20))).rejects.toSatisfy((e: unknown) =>
        isMemQueueError(e, "payload-too-large"),
      )
      expect(await small.checkQueue("big")).toBe(0)
    })

    it("rejects backup endpoints", () => {
      expect(
        () => new MemQueue({ store, logger: createSilentLogger(), backupEndpoints: ["redis://backup:6379"] }),
      ).toThrowError(/backupEndpoints is not supported/)
    })

    it("rejects a non-positive lag threshold", () => {
      expect(() => new MemQueue({ store, logger: createSilentLogger(), clientLagSeconds: 0 })).toThrowError(
        /clientLagSeconds/,
      )
    })
  })

  describe("hooks", () => {
    it("reports puts and deliveries", async () => {
      const hooks: QueueHooks = { onPut: vi.fn(), onDeliver: vi.fn() }
      const hooked = new MemQueue<number>({ store, logger: createSilentLogger(), hooks })

      const key = await hooked.put("h", 1)
      await hooked.get("h", key, "c1")
      await hooked.get("h", "h_missing", "c1")

      expect(hooks.onPut).toHaveBeenCalledWith("h", key)
      expect(hooks.onDeliver).toHaveBeenNthCalledWith(1, "h", "c1", key, true)
      expect(hooks.onDeliver).toHaveBeenNthCalledWith(2, "h", "c1", "h_missing", false)
    })

    it("surfaces a throwing hook after the delivery was recorded", async () => {
      const onDeliver = vi.fn(() => {
        throw new Error("counter down")
      })
      const hooked = new MemQueue<number>({ store, logger: createSilentLogger(), hooks: { onDeliver } })
      const key = await hooked.put("h", 1)

      await expect(hooked.get("h", key, "c1")).rejects.toThrowError("counter down")
      expect(await store.get("h_LASTMSG_c1")).toBe(key)
      expect(await hooked.nextmsg("h", "c1")).toBeNull()
    })
  })

  it("close() closes the store", async () => {
    const close = vi.spyOn(store, "close")
    await mq.close()
    expect(close).toHaveBeenCalledOnce()
  })
})
