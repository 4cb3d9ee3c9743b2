import { describe, it, expect } from "vitest";
import { AsyncChannel } from "../async-channel.js";

async function drain<T>(channel: AsyncChannel<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const value of channel) out.push(value);
  return out;
}

describe("AsyncChannel", () => {
  it("delivers values in push order and ends after close", async () => {
    const channel = new AsyncChannel<number>(4);
    await channel.push(1);
    await channel.push(2);
    channel.close();
    await expect(drain(channel)).resolves.toEqual([1, 2]);
  });

  it("makes producers wait while the buffer is full", async () => {
    const channel = new AsyncChannel<string>(1);
    await expect(channel.push("a")).resolves.toBe(true);

    let accepted: boolean | undefined;
    const blocked = channel.push("b").then((ok) => {
      accepted = ok;
    });
    await Promise.resolve();
    expect(accepted).toBeUndefined();
    expect(channel.size).toBe(1);

    const iterator = channel[Symbol.asyncIterator]();
    await expect(iterator.next()).resolves.toEqual({ value: "a", done: false });
    await blocked;
    expect(accepted).toBe(true);
    await expect(iterator.next()).resolves.toEqual({ value: "b", done: false });
  });

  it("hands a value straight to a waiting consumer", async () => {
    const channel = new AsyncChannel<number>(1);
    const iterator = channel[Symbol.asyncIterator]();
    const pending = iterator.next();
    await channel.push(42);
    await expect(pending).resolves.toEqual({ value: 42, done: false });
    expect(channel.size).toBe(0);
  });

  it("ends a waiting consumer on close", async () => {
    const channel = new AsyncChannel<number>(1);
    const iterator = channel[Symbol.asyncIterator]();
    const pending = iterator.next();
    channel.close();
    await expect(pending).resolves.toEqual({ value: undefined, done: true });
  });

  it("rejects pushes after close", async () => {
    const channel = new AsyncChannel<number>(1);
    channel.close();
    await expect(channel.push(1)).resolves.toBe(false);
    expect(channel.isClosed).toBe(true);
  });

  it("turns blocked producers away when the consumer stops early", async () => {
    const channel = new AsyncChannel<number>(1);
    await channel.push(1);
    const blocked = channel.push(2);

    for await (const value of channel) {
      expect(value).toBe(1);
      break;
    }

    // The blocked value moved into the buffer when 1 was taken, then got dropped
    await expect(blocked).resolves.toBe(true);
    expect(channel.size).toBe(0);
    await expect(channel.push(3)).resolves.toBe(false);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new AsyncChannel<number>(0)).toThrow(RangeError);
  });
});
