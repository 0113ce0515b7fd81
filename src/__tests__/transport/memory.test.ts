import { describe, expect, it, vi } from "vitest";
import { createMemoryTransport } from "../../transport/memory.js";

const tick = () => new Promise<void>((r) => setTimeout(r, 0));

describe("createMemoryTransport", () => {
  it("starts both ends open", () => {
    const [a, b] = createMemoryTransport();
    expect(a.state).toBe("open");
    expect(b.state).toBe("open");
  });

  it("delivers to the peer asynchronously", async () => {
    const [a, b] = createMemoryTransport();
    const received: string[] = [];
    b.onMessage((data) => received.push(data));

    a.send("one");
    a.send("two");
    expect(received).toEqual([]);

    await tick();
    expect(received).toEqual(["one", "two"]);
  });

  it("does not echo back to the sender", async () => {
    const [a] = createMemoryTransport();
    const handler = vi.fn();
    a.onMessage(handler);
    a.send("hello");
    await tick();
    expect(handler).not.toHaveBeenCalled();
  });

  it("stops delivering to a disposed handler", async () => {
    const [a, b] = createMemoryTransport();
    const handler = vi.fn();
    const sub = b.onMessage(handler);
    sub.dispose();
    a.send("ignored");
    await tick();
    expect(handler).not.toHaveBeenCalled();
  });

  // --- Close ---

  it("closing one end closes both and fires close handlers once", () => {
    const [a, b] = createMemoryTransport();
    const closedA = vi.fn();
    const closedB = vi.fn();
    a.onClose(closedA);
    b.onClose(closedB);

    a.close();
    a.close();

    expect(a.state).toBe("closed");
    expect(b.state).toBe("closed");
    expect(closedA).toHaveBeenCalledTimes(1);
    expect(closedB).toHaveBeenCalledTimes(1);
  });

  it("throws when sending on a closed end", () => {
    const [a] = createMemoryTransport();
    a.close();
    expect(() => a.send("late")).toThrow('Cannot send in "closed" state');
  });

  it("drops messages in flight when the receiver closes", async () => {
    const [a, b] = createMemoryTransport();
    const handler = vi.fn();
    b.onMessage(handler);
    a.send("in flight");
    b.close();
    await tick();
    expect(handler).not.toHaveBeenCalled();
  });

  it("closes through Symbol.dispose", () => {
    const [a, b] = createMemoryTransport();
    a[Symbol.dispose]();
    expect(b.state).toBe("closed");
  });
});
