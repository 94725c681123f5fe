import { describe, it, expect, vi } from "vitest";
import { ReferenceStore } from "./ReferenceStore.js";
import { ref } from "../testing/fakes.js";

describe("ReferenceStore", () => {
  it("should find an entry by display name and node id", () => {
    const store = new ReferenceStore();
    const handler = vi.fn();
    store.put(ref("Temperature", "ns=2;s=Temperature"), handler);

    expect(store.find("Temperature", "ns=2;s=Temperature")?.handler).toBe(handler);
    expect(store.find("Temperature", "ns=2;s=Other")).toBeUndefined();
    expect(store.has(ref("Temperature", "ns=2;s=Temperature"))).toBe(true);
  });

  it("should replace instead of duplicating an entry for the same target", () => {
    const store = new ReferenceStore();
    const first = vi.fn();
    const second = vi.fn();

    expect(store.put(ref("Speed", "ns=2;s=Speed"), first)).toBeUndefined();
    const previous = store.put(ref("Speed", "ns=2;s=Speed"), second);

    expect(previous?.handler).toBe(first);
    expect(store.size).toBe(1);
    expect(store.find("Speed", "ns=2;s=Speed")?.handler).toBe(second);
  });

  it("should treat the same node id under another display name as a separate entry", () => {
    const store = new ReferenceStore();
    store.put(ref("Speed", "ns=2;s=Speed"), vi.fn());
    store.put(ref("Speed (rpm)", "ns=2;s=Speed"), vi.fn());

    expect(store.size).toBe(2);
  });

  it("should keep insertion order when an entry is replaced", () => {
    const store = new ReferenceStore();
    store.put(ref("A", "ns=2;s=A"), vi.fn());
    store.put(ref("B", "ns=2;s=B"), vi.fn());
    store.put(ref("A", "ns=2;s=A"), vi.fn());

    expect(store.snapshot().map((entry) => entry.reference.displayName)).toEqual(["A", "B"]);
  });

  it("should delete and clear entries", () => {
    const store = new ReferenceStore();
    store.put(ref("A", "ns=2;s=A"), vi.fn());
    store.put(ref("B", "ns=2;s=B"), vi.fn());

    expect(store.delete(ref("A", "ns=2;s=A"))).toBe(true);
    expect(store.delete(ref("A", "ns=2;s=A"))).toBe(false);
    expect(store.size).toBe(1);

    store.clear();
    expect(store.size).toBe(0);
  });

  it("should return a snapshot that is not affected by later changes", () => {
    const store = new ReferenceStore();
    store.put(ref("A", "ns=2;s=A"), vi.fn());
    const snapshot = store.snapshot();

    store.clear();

    expect(snapshot).toHaveLength(1);
  });
});
