import { describe, test, expect, vi } from "vitest";
import { PostTypeCache } from "./cache.js";
import type { PostTypeMap } from "./types/post-types.js";
import type { PostTypeKey, RestBase } from "./types/common.js";

function listing(name: string): PostTypeMap {
  return {
    [name]: { slug: name as PostTypeKey, name, rest_base: `${name}s` as RestBase, hierarchical: false },
  };
}

function clock(start = 1_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("PostTypeCache", () => {
  test("fetches once while the entry is fresh", async () => {
    const time = clock();
    const cache = new PostTypeCache({ ttlMs: 1000, now: time.now });
    const fetcher = vi.fn(async () => listing("post"));

    await cache.get("https://a.example", fetcher);
    time.advance(999);
    const second = await cache.get("https://a.example", fetcher);

    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(second).toEqual(listing("post"));
  });

  test("refetches once the freshness window has passed", async () => {
    const time = clock();
    const cache = new PostTypeCache({ ttlMs: 1000, now: time.now });
    const fetcher = vi.fn().mockResolvedValueOnce(listing("post")).mockResolvedValueOnce(listing("page"));

    await cache.get("https://a.example", fetcher);
    time.advance(1000);
    expect(await cache.get("https://a.example", fetcher)).toEqual(listing("page"));
    expect(fetcher).toHaveBeenCalledTimes(2);
  });

  test("keeps one entry per base URL", async () => {
    const cache = new PostTypeCache();
    await cache.get("https://a.example", async () => listing("post"));
    await cache.get("https://b.example", async () => listing("book"));
    expect(await cache.get("https://a.example", async () => listing("other"))).toEqual(listing("post"));
    expect(await cache.get("https://b.example", async () => listing("other"))).toEqual(listing("book"));
  });

  test("refresh invalidates one site or all of them", async () => {
    const cache = new PostTypeCache();
    await cache.get("https://a.example", async () => listing("post"));
    await cache.get("https://b.example", async () => listing("book"));

    cache.refresh("https://a.example");
    expect(await cache.get("https://a.example", async () => listing("page"))).toEqual(listing("page"));
    expect(await cache.get("https://b.example", async () => listing("other"))).toEqual(listing("book"));

    cache.refresh();
    expect(await cache.get("https://b.example", async () => listing("other"))).toEqual(listing("other"));
  });

  test("does not cache a failed fetch", async () => {
    const cache = new PostTypeCache();
    await expect(
      cache.get("https://a.example", async () => {
        throw new Error("offline");
      }),
    ).rejects.toThrow("offline");
    expect(await cache.get("https://a.example", async () => listing("post"))).toEqual(listing("post"));
  });
});
