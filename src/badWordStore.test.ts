import { BadWordStore } from "./badWordStore";

describe("BadWordStore", () => {
  test("should seed from the constructor", () => {
    const store = new BadWordStore(["a", "b", "a"]);
    expect(store.size).toBe(2);
    expect(store.has("a")).toBe(true);
  });

  test("should count only new words on add", () => {
    const store = new BadWordStore(["a"]);
    expect(store.add("a", "b", "c")).toBe(2);
    expect(store.size).toBe(3);
  });

  test("should ignore absent words on delete", () => {
    const store = new BadWordStore(["a", "b"]);
    expect(store.delete("a", "missing")).toBe(1);
    expect(store.list()).toEqual(["b"]);
  });

  test("should return a copy from list", () => {
    const store = new BadWordStore(["a"]);
    const listed = store.list();
    listed.push("b");
    expect(store.list()).toEqual(["a"]);
  });

  test("should be iterable", () => {
    const store = new BadWordStore(["a", "b"]);
    expect([...store].sort()).toEqual(["a", "b"]);
  });
});
