import { describe, expect, it } from "vitest";

import {
  DEFAULT_LINK_RULES,
  discoverLinks,
  extractLinks,
  filterRelevant,
  normalizeLink,
} from "../src/tools/discoverLinks";
import type { PageFetcher } from "../src/tools/fetchPage";
import { fail, ok } from "../src/utils";

const HOME_HTML = `
<html><body>
  <nav>
    <a href="/gallery">Gallery</a>
    <a href="/our-program/">Our Program</a>
    <a href="https://example.com/about#team">About</a>
    <a href="mailto:hello@example.com">Email</a>
    <a href="tel:5550100">Call</a>
    <a href="https://other.org/page">Partner</a>
    <a href="/">Home</a>
    <a href="#top">Top</a>
    <a href="/contact-us">Contact</a>
    <a href="/our-program">Program again</a>
    <a href="/menu?week=2">Menu</a>
    <a href="/files/brochure.pdf">Brochure</a>
    <a href="javascript:void(0)">Noop</a>
  </nav>
</body></html>`;

const fakeFetcher = (staticHtml: string | null): PageFetcher => ({
  fetchStatic: async () => (staticHtml === null ? fail("HTTP 500") : ok({ html: staticHtml, text: "" })),
  fetchRendered: async () => fail("not used"),
  fetchSmart: async (url) => ({ url, text: "", html: "", method: "failed" }),
});

describe("normalizeLink", () => {
  it("drops the fragment and trailing slash but keeps the query", () => {
    expect(normalizeLink(new URL("https://Example.com/programs/?age=3#infants"))).toBe(
      "https://example.com/programs?age=3"
    );
  });
});

describe("extractLinks", () => {
  it("returns same-site links, normalized and deduplicated in page order", () => {
    expect(extractLinks(HOME_HTML, "https://www.example.com/")).toEqual([
      "https://www.example.com/gallery",
      "https://www.example.com/our-program",
      "https://example.com/about",
      "https://www.example.com/contact-us",
      "https://www.example.com/menu?week=2",
      "https://www.example.com/files/brochure.pdf",
    ]);
  });

  it("drops links that are not longer than the base", () => {
    const html = '<a href="/ab">Short</a><a href="/home/infants">Infants</a>';
    expect(extractLinks(html, "https://www.example.com/home")).toEqual([
      "https://www.example.com/home/infants",
    ]);
  });

  it("treats www and bare hosts as the same page", () => {
    const html = [
      '<a href="https://www.kids.example/about">About</a>',
      '<a href="https://kids.example/about/">About again</a>',
      '<a href="http://kids.example/meals">Meals</a>',
      '<a href="https://kids.example">Home</a>',
    ].join("");
    expect(extractLinks(html, "https://kids.example/")).toEqual([
      "https://www.kids.example/about",
      "http://kids.example/meals",
    ]);
  });

  it("returns nothing for an invalid base", () => {
    expect(extractLinks(HOME_HTML, "not a url")).toEqual([]);
  });
});

describe("filterRelevant", () => {
  it("excludes contact pages and files and puts priority pages first", () => {
    const links = extractLinks(HOME_HTML, "https://www.example.com/");
    expect(filterRelevant(links, DEFAULT_LINK_RULES)).toEqual([
      "https://www.example.com/our-program",
      "https://example.com/about",
      "https://www.example.com/menu?week=2",
      "https://www.example.com/gallery",
    ]);
  });

  it("excludes feed, share and account sections without dropping similar page names", () => {
    const links = [
      "https://k.example/feeding-and-nutrition",
      "https://k.example/gallery",
      "https://k.example/feed/",
      "https://k.example/shared-values",
      "https://k.example/account/settings",
    ];
    expect(filterRelevant(links)).toEqual([
      "https://k.example/feeding-and-nutrition",
      "https://k.example/gallery",
      "https://k.example/shared-values",
    ]);
  });

  it("matches rules against the path, not the host", () => {
    const links = ["https://program-kids.example/blog/post", "https://program-kids.example/team"];
    expect(filterRelevant(links, { exclude: ["/blog"], priority: ["team"] })).toEqual([
      "https://program-kids.example/team",
    ]);
    expect(filterRelevant(["https://program-kids.example/gallery"])).toEqual([
      "https://program-kids.example/gallery",
    ]);
  });
});

describe("discoverLinks", () => {
  it("fetches the base page when no html is supplied", async () => {
    const links = await discoverLinks("https://www.example.com", fakeFetcher(HOME_HTML));
    expect(links).toContain("https://www.example.com/our-program");
    expect(links).toHaveLength(6);
  });

  it("uses supplied html without fetching", async () => {
    const links = await discoverLinks(
      "https://www.example.com",
      fakeFetcher(null),
      '<a href="/staff">Staff</a>'
    );
    expect(links).toEqual(["https://www.example.com/staff"]);
  });

  it("returns an empty list when the base page cannot be fetched", async () => {
    expect(await discoverLinks("https://www.example.com", fakeFetcher(null))).toEqual([]);
  });
});
