import { beforeEach, describe, expect, it } from "vitest";
import { matches, MemoryStore } from "@/lib/memoryStore";
import type { Counter } from "@/lib/types";

type Doc = { id: string; tag?: string; n?: number; list?: string[] };

describe("matches", () => {
  it("treats a missing field as not matching !=", () => {
    expect(matches<Doc>({ id: "a" }, ["tag", "!=", "x"])).toBe(false);
    expect(matches<Doc>({ id: "a", tag: "y" }, ["tag", "!=", "x"])).toBe(true);
    expect(matches<Doc>({ id: "a", tag: "x" }, ["tag", "!=", "x"])).toBe(false);
  });

  it("compares only values of the same type", () => {
    expect(matches<Doc>({ id: "a", n: 5 }, ["n", ">", 4])).toBe(true);
    expect(matches<Doc>({ id: "a", n: 5 }, ["n", ">", "4"])).toBe(false);
    expect(matches<Doc>({ id: "a", n: 5 }, ["n", "<=", 5])).toBe(true);
  });

  it("supports in and array-contains", () => {
    expect(matches<Doc>({ id: "a", tag: "b" }, ["tag", "in", ["a", "b"]])).toBe(true);
    expect(matches<Doc>({ id: "a", tag: "c" }, ["tag", "in", ["a", "b"]])).toBe(false);
    expect(matches<Doc>({ id: "a", list: ["u1", "u2"] }, ["list", "array-contains", "u2"])).toBe(true);
    expect(matches<Doc>({ id: "a" }, ["list", "array-contains", "u2"])).toBe(false);
  });
});

describe("MemoryStore", () => {
  let store: MemoryStore;

  beforeEach(async () => {
    store = new MemoryStore();
    for (const [id, value] of [
      ["a", 3],
      ["b", 1],
      ["c", 2]
    ] as const) {
      await store.create("counters", { id, value });
    }
  });

  it("orders, offsets and limits list results", async () => {
    const docs = await store.list("counters", { orderBy: { field: "value", direction: "desc" }, offset: 1, limit: 1 });
    expect(docs.map((d) => d.id)).toEqual(["c"]);
  });

  it("returns copies that do not write through", async () => {
    const doc = await store.get("counters", "a");
    if (doc) doc.value = 99;
    expect((await store.get("counters", "a"))?.value).toBe(3);
  });

  it("reports whether update found the document", async () => {
    expect(await store.update("counters", "a", { value: 10 })).toBe(true);
    expect(await store.update("counters", "missing", { value: 10 })).toBe(false);
    expect((await store.get("counters", "a"))?.value).toBe(10);
  });

  it("ignores undefined values in a patch", async () => {
    const patch: Partial<Counter> = { value: undefined };
    await store.update("counters", "b", patch);
    expect((await store.get("counters", "b"))?.value).toBe(1);
  });

  it("increments numeric fields", async () => {
    await store.increment("counters", "b", "value", 4);
    expect((await store.get("counters", "b"))?.value).toBe(5);
  });

  it("counts, updates and deletes by filter", async () => {
    expect(await store.count("counters", [["value", ">=", 2]])).toBe(2);
    expect(await store.updateWhere("counters", [["value", "<", 3]], { value: 0 })).toBe(2);
    expect(await store.deleteWhere("counters", [["value", "==", 0]])).toBe(2);
    expect((await store.list("counters")).map((d) => d.id)).toEqual(["a"]);
  });

  it("hands out sequences starting at 1 per name", async () => {
    expect(await store.nextSequence("invoices-2024")).toBe(1);
    expect(await store.nextSequence("invoices-2024")).toBe(2);
    expect(await store.nextSequence("invoices-2025")).toBe(1);
  });
});
