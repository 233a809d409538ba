import { describe, expect, it } from "vitest";
import { Channel } from "../../runtime/channel";

describe("Channel", () => {
  it("rejects a capacity below one", () => {
    expect(() => new Channel<number>(0)).toThrow("channel capacity must be at least 1, got 0");
  });

  it("delivers values in the order they were sent", async () => {
    const ch = new Channel<string>(3);
    await ch.send("a");
    await ch.send("b");
    expect(await ch.receive()).toEqual({ ok: true, value: "a" });
    expect(await ch.receive()).toEqual({ ok: true, value: "b" });
  });

  it("refuses trySend while full", () => {
    const ch = new Channel<number>(1);
    expect(ch.trySend(1)).toBe(true);
    expect(ch.trySend(2)).toBe(false);
    expect(ch.size).toBe(1);
  });

  it("holds a send until a receive makes room", async () => {
    const ch = new Channel<number>(1);
    ch.trySend(1);
    let sent = false;
    const pending = ch.send(2).then((result) => {
      sent = true;
      return result;
    });

    await Promise.resolve();
    expect(sent).toBe(false);

    expect(ch.tryReceive()).toEqual({ ok: true, value: 1 });
    await expect(pending).resolves.toBe(true);
    expect(ch.tryReceive()).toEqual({ ok: true, value: 2 });
  });

  it("gives up a blocked send when its signal aborts", async () => {
    const ch = new Channel<number>(1);
    ch.trySend(1);
    const controller = new AbortController();
    const pending = ch.send(2, controller.signal);
    controller.abort();
    await expect(pending).resolves.toBe(false);
    expect(ch.size).toBe(1);
  });

  it("drains buffered values after close, then reports closed", async () => {
    const ch = new Channel<number>(2);
    ch.trySend(7);
    ch.close();

    expect(ch.isDrained).toBe(false);
    expect(await ch.receive()).toEqual({ ok: true, value: 7 });
    expect(await ch.receive()).toEqual({ ok: false });
    expect(ch.isDrained).toBe(true);
    await expect(ch.send(8)).resolves.toBe(false);
  });

  it("wakes a waiting receiver on close", async () => {
    const ch = new Channel<number>(1);
    const pending = ch.receive();
    ch.close();
    await expect(pending).resolves.toEqual({ ok: false });
  });

  it("resolves ready() without consuming the value", async () => {
    const ch = new Channel<number>(1);
    const ready = ch.ready();
    ch.trySend(5);
    await ready;
    expect(ch.size).toBe(1);
  });

  it("forgets a disposed watch along with its abort listener", async () => {
    const ch = new Channel<number>(1);
    const controller = new AbortController();
    const watch = ch.watch(controller.signal);
    expect(ch.waiting).toBe(1);

    watch.dispose();
    expect(ch.waiting).toBe(0);
    await watch.ready;

    controller.abort();
    ch.trySend(1);
    expect(ch.waiting).toBe(0);
  });
});
