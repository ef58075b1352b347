import { describe, expect, it, vi } from "vitest";

import { SessionRegistry } from "./registry.ts";
import { MemoryTransport } from "./testing.ts";

function createRegistry() {
  const onOpen = vi.fn();
  const registry = new SessionRegistry({ onMessage: async () => undefined, hooks: { onOpen } });
  return { registry, onOpen };
}

function activeIds(registry: SessionRegistry): number[] {
  return registry
    .lookupAllExcept(0)
    .map((s) => s.id)
    .sort((a, b) => a - b);
}

describe("SessionRegistry.register", () => {
  it("assigns increasing ids starting at 1", () => {
    const { registry, onOpen } = createRegistry();
    const ids = [1, 2, 3].map(() => registry.register(new MemoryTransport()).id);

    expect(ids).toEqual([1, 2, 3]);
    expect(registry.size).toBe(3);
    expect(onOpen).toHaveBeenCalledTimes(3);
  });

  it("registers sessions in the active state", () => {
    const { registry } = createRegistry();
    const session = registry.register(new MemoryTransport());

    expect(session.state).toBe("active");
    expect(registry.get(session.id)).toBe(session);
  });

  it("does not reuse a freed id before wrapping around", () => {
    const { registry } = createRegistry();
    const first = registry.register(new MemoryTransport());
    registry.register(new MemoryTransport());
    first.close();

    expect(registry.register(new MemoryTransport()).id).toBe(3);
  });

  it("fills all 255 ids, then reuses freed ids after wrapping", () => {
    const { registry } = createRegistry();
    for (let i = 0; i < 255; i++) {
      registry.register(new MemoryTransport());
    }
    expect(registry.ids()[0]).toBe(1);
    expect(registry.ids()[254]).toBe(255);

    expect(() => registry.register(new MemoryTransport())).toThrow("no free client id");

    registry.get(7)?.close();
    expect(registry.register(new MemoryTransport()).id).toBe(7);

    try {
      registry.register(new MemoryTransport());
      expect.unreachable();
    } catch (e) {
      expect(e).toMatchObject({ kind: "registry-full" });
    }
  });
});

describe("SessionRegistry.lookupAllExcept", () => {
  it("excludes only the given id", () => {
    const { registry } = createRegistry();
    for (let i = 0; i < 3; i++) registry.register(new MemoryTransport());

    expect(registry.lookupAllExcept(2).map((s) => s.id)).toEqual([1, 3]);
    expect(activeIds(registry)).toEqual([1, 2, 3]);
  });

  it("returns a snapshot unaffected by later removals", () => {
    const { registry } = createRegistry();
    registry.register(new MemoryTransport());
    registry.register(new MemoryTransport());

    const snapshot = registry.lookupAllExcept(0);
    registry.get(1)?.close();

    expect(snapshot).toHaveLength(2);
    expect(activeIds(registry)).toEqual([2]);
  });

  it("always matches the set of active sessions", () => {
    const { registry } = createRegistry();
    const sessions = [0, 1, 2, 3].map(() => registry.register(new MemoryTransport()));

    sessions[1].close();
    sessions[3].fail(new Error("reset"));

    expect(activeIds(registry)).toEqual([1, 3]);
    expect(registry.ids()).toEqual([1, 3]);
    expect(sessions.filter((s) => s.isActive()).map((s) => s.id)).toEqual([1, 3]);
  });
});

describe("SessionRegistry.remove", () => {
  it("is idempotent", () => {
    const { registry } = createRegistry();
    const session = registry.register(new MemoryTransport());

    expect(registry.remove(session.id)).toBe(true);
    expect(registry.remove(session.id)).toBe(false);
    expect(registry.has(session.id)).toBe(false);
  });

  it("happens when a session starts closing", () => {
    const { registry } = createRegistry();
    const io = new MemoryTransport();
    const session = registry.register(io);

    session.close();
    session.close();

    expect(registry.has(session.id)).toBe(false);
    expect(registry.size).toBe(0);
    expect(io.closeCalls).toBe(1);
  });
});
