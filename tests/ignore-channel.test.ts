import path from "path";
import { describe, expect, it, vi } from "vitest";
import { IgnoreChannel } from "../src/core/ignore-channel";

const nextTurn = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("IgnoreChannel", () => {
  it("buffers absolute paths in the order they were sent", () => {
    const channel = new IgnoreChannel();

    expect(channel.send("/work/dist")).toBe(true);
    expect(channel.send("relative/target")).toBe(true);

    expect(channel.size).toBe(2);
    expect(channel.drain()).toEqual(["/work/dist", path.resolve("relative/target")]);
    expect(channel.size).toBe(0);
  });

  it("notifies listeners on a later turn", async () => {
    const channel = new IgnoreChannel();
    const seen: string[] = [];
    channel.on("ignore", (ignored: string) => seen.push(ignored));

    channel.send("/work/target");
    expect(seen).toEqual([]);

    await nextTurn();
    expect(seen).toEqual(["/work/target"]);
  });

  it("delivers every path to a listener, however many exceed the capacity", async () => {
    const channel = new IgnoreChannel({ capacity: 4 });
    const seen: string[] = [];
    channel.on("ignore", (ignored: string) => seen.push(ignored));

    for (let i = 0; i < 6; i++) {
      expect(channel.send(`/out/${i}`)).toBe(true);
      await nextTurn();
    }

    expect(seen).toEqual(["/out/0", "/out/1", "/out/2", "/out/3", "/out/4", "/out/5"]);
    expect(channel.dropped).toBe(0);
    expect(channel.size).toBe(0);
  });

  it("drops the newest path when full by default", () => {
    const channel = new IgnoreChannel({ capacity: 2 });

    channel.send("/a");
    channel.send("/b");
    expect(channel.send("/c")).toBe(false);

    expect(channel.drain()).toEqual(["/a", "/b"]);
    expect(channel.dropped).toBe(1);
  });

  it("can evict the oldest path instead", () => {
    const channel = new IgnoreChannel({ capacity: 2, overflow: "drop-oldest" });

    channel.send("/a");
    channel.send("/b");
    expect(channel.send("/c")).toBe(true);

    expect(channel.drain()).toEqual(["/b", "/c"]);
    expect(channel.dropped).toBe(1);
  });

  it("holds at least one path", () => {
    expect(new IgnoreChannel({ capacity: 0 }).capacity).toBe(1);
  });

  it("ignores sends once closed", () => {
    const channel = new IgnoreChannel();
    channel.send("/a");

    channel.close();

    expect(channel.send("/b")).toBe(false);
    expect(channel.size).toBe(0);
    expect(channel.dropped).toBe(1);
  });

  it("does not let a failing listener reach the sender", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const channel = new IgnoreChannel();
    channel.on("ignore", () => {
      throw new Error("watcher gone");
    });

    expect(channel.send("/a")).toBe(true);
    await nextTurn();

    expect(warn).toHaveBeenCalledWith(expect.stringContaining("ignore channel listener failed for /a: Error: watcher gone"));
  });
});
