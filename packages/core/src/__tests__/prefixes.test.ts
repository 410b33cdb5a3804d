import { describe, it, expect } from "vitest";
import { iterPrefixes } from "../prefixes";

describe("iterPrefixes", () => {
  it("yields every prefix smallest first", () => {
    expect([...iterPrefixes([1, 2, 3])]).toEqual([[1], [1, 2], [1, 2, 3]]);
  });

  it("yields nothing for an empty sequence", () => {
    expect([...iterPrefixes([])]).toEqual([]);
    expect([...iterPrefixes([]).reversed()]).toEqual([]);
  });

  it("yields N prefixes whose k-th item has length k", () => {
    for (let n = 0; n <= 6; n++) {
      const items = Array.from({ length: n }, (_, i) => `seg${i}`);
      const prefixes = [...iterPrefixes(items)];

      expect(prefixes).toHaveLength(n);
      prefixes.forEach((prefix, index) => expect(prefix).toHaveLength(index + 1));
      if (n > 0) {
        expect(prefixes[n - 1]).toEqual(items);
      }
    }
  });

  it("can be consumed longest first", () => {
    expect([...iterPrefixes(["a", "b", "c"]).reversed()]).toEqual([["a", "b", "c"], ["a", "b"], ["a"]]);
  });

  it("restarts from the shortest prefix on every iteration", () => {
    const prefixes = iterPrefixes(["std", "hash"]);

    const first = [...prefixes];
    const second = [...prefixes];

    expect(second).toEqual(first);
    expect(second).toEqual([["std"], ["std", "hash"]]);
  });

  it("reports its length", () => {
    expect(iterPrefixes(["a", "b"]).length).toBe(2);
  });

  it("does not hand out the input array itself", () => {
    const items = ["a"];
    const [only] = [...iterPrefixes(items)];

    expect(only).toEqual(items);
    expect(only).not.toBe(items);
  });
});
