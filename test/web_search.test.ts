import { describe, it, expect } from "vitest";

import { GoogleSearchClient, formatSearchResults } from "../src/evidence/web_search";

const items = (...links: string[]) =>
  new Response(
    JSON.stringify({
      items: links.map((link) => ({ title: `T ${link}`, link, snippet: `about ${link}` })),
    }),
    { status: 200 }
  );

describe("GoogleSearchClient", () => {
  it("queries the custom search endpoint", async () => {
    const urls: string[] = [];
    const client = new GoogleSearchClient({
      apiKey: "test-key",
      cx: "test-cx",
      fetchImpl: async (input) => {
        urls.push(String(input));
        return items("https://a.test/1");
      },
    });

    expect(await client.search("solar panels", 7)).toEqual([
      { title: "T https://a.test/1", url: "https://a.test/1", snippet: "about https://a.test/1" },
    ]);
    expect(urls).toEqual([
      "https://www.googleapis.com/customsearch/v1?key=test-key&cx=test-cx&q=solar+panels&num=7",
    ]);
  });

  it("fills missing fields", async () => {
    const client = new GoogleSearchClient({
      apiKey: "test-key",
      cx: "test-cx",
      fetchImpl: async () => new Response(JSON.stringify({ items: [{ link: "https://b.test" }] })),
    });
    expect(await client.search("q")).toEqual([{ title: "No title", url: "https://b.test", snippet: "" }]);
  });

  it("returns nothing on http and network errors", async () => {
    const failing = new GoogleSearchClient({
      apiKey: "test-key",
      cx: "test-cx",
      fetchImpl: async () => new Response("quota", { status: 403 }),
    });
    expect(await failing.search("q")).toEqual([]);

    const offline = new GoogleSearchClient({
      apiKey: "test-key",
      cx: "test-cx",
      fetchImpl: async () => {
        throw new TypeError("fetch failed");
      },
    });
    expect(await offline.search("q")).toEqual([]);
  });

  it("does not call out without credentials", async () => {
    let called = false;
    const client = new GoogleSearchClient({
      fetchImpl: async () => {
        called = true;
        return items();
      },
    });
    expect(client.configured).toBe(false);
    expect(await client.search("q")).toEqual([]);
    expect(called).toBe(false);
  });

  it("merges several queries by url", async () => {
    const client = new GoogleSearchClient({
      apiKey: "test-key",
      cx: "test-cx",
      fetchImpl: async (input) =>
        String(input).includes("q=first")
          ? items("https://a.test", "https://b.test")
          : items("https://b.test", "https://c.test"),
    });

    const results = await client.searchMany(["first", "second"]);
    expect(results.map((r) => r.url)).toEqual(["https://a.test", "https://b.test", "https://c.test"]);
  });
});

describe("formatSearchResults", () => {
  it("lists results and skips video links", () => {
    const text = formatSearchResults(
      ["tides", "moon"],
      [
        { title: "Tides", url: "https://sea.test", snippet: "water" },
        { title: "Clip", url: "https://www.youtube.com/watch?v=1", snippet: "video" },
        { title: "Moon", url: "https://sky.test", snippet: "" },
      ]
    );
    expect(text).toBe(
      [
        "Search results for: tides, moon",
        "",
        "1. Tides",
        "   URL: https://sea.test",
        "   water",
        "",
        "2. Moon",
        "   URL: https://sky.test",
        "   No description",
        "",
      ].join("\n")
    );
  });

  it("reports an empty search", () => {
    expect(formatSearchResults(["nothing"], [])).toBe("No search results found for: nothing");
  });
});
