import { describe, expect, it } from "vitest";

import { createPlacesClient, distanceMiles } from "../src/agents/placesSearch";
import { ConfigError } from "../src/config";

type Call = { url: string; init?: RequestInit };

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });

const GEOCODE_OK = {
  status: "OK",
  results: [{ geometry: { location: { lat: 47.6, lng: -122.3 } } }],
};

const SEARCH_OK = {
  places: [
    {
      displayName: { text: "Sunrise Learning" },
      formattedAddress: "1 Elm St",
      nationalPhoneNumber: "(555) 010-0101",
      rating: 4.6,
      websiteUri: "https://sunrise.example",
      location: { latitude: 47.61, longitude: -122.3 },
    },
    {
      displayName: { text: "Far Away Academy" },
      location: { latitude: 48.6, longitude: -122.3 },
    },
    { formattedAddress: "No name given" },
    { displayName: { text: "Little Explorers" } },
  ],
};

function fakeFetch(geocode: () => Response, search: () => Response) {
  const calls: Call[] = [];
  const fetchImpl: typeof fetch = async (input: string | URL | Request, init?: RequestInit) => {
    const url = input instanceof Request ? input.url : String(input);
    calls.push({ url, init });
    return url.includes("geocode") ? geocode() : search();
  };
  return { fetchImpl, calls };
}

describe("distanceMiles", () => {
  it("computes great-circle distance rounded to a tenth of a mile", () => {
    expect(distanceMiles({ lat: 0, lng: 0 }, { lat: 0, lng: 1 })).toBe(69.1);
    expect(distanceMiles({ lat: 47.6, lng: -122.3 }, { lat: 47.6, lng: -122.3 })).toBe(0);
  });
});

describe("createPlacesClient", () => {
  it("requires an API key", () => {
    expect(() => createPlacesClient({ apiKey: undefined })).toThrow(ConfigError);
  });

  it("geocodes the address and returns named providers within the radius", async () => {
    const { fetchImpl, calls } = fakeFetch(
      () => json(GEOCODE_OK),
      () => json(SEARCH_OK)
    );
    const places = createPlacesClient({ apiKey: "test-key", fetchImpl });

    const result = await places.searchProviders("1 Main St, Seattle");

    expect(result.error).toBeUndefined();
    expect(result.origin).toEqual({ lat: 47.6, lng: -122.3 });
    expect(result.candidates).toEqual([
      {
        name: "Sunrise Learning",
        address: "1 Elm St",
        phone: "(555) 010-0101",
        rating: 4.6,
        websites: ["https://sunrise.example"],
        distance: 0.7,
      },
      {
        name: "Little Explorers",
        address: "",
        phone: "",
        rating: null,
        websites: [],
        distance: null,
      },
    ]);

    const geocodeUrl = new URL(calls[0].url);
    expect(geocodeUrl.searchParams.get("address")).toBe("1 Main St, Seattle");
    expect(geocodeUrl.searchParams.get("key")).toBe("test-key");

    const search = calls[1];
    expect(search.url).toBe("https://places.googleapis.com/v1/places:searchText");
    expect(new Headers(search.init?.headers).get("X-Goog-Api-Key")).toBe("test-key");
    expect(JSON.parse(String(search.init?.body))).toEqual({
      textQuery: "daycare",
      maxResultCount: 20,
      locationBias: {
        circle: { center: { latitude: 47.6, longitude: -122.3 }, radius: 5000 },
      },
    });
  });

  it("caps the result count at the limit", async () => {
    const { fetchImpl, calls } = fakeFetch(
      () => json(GEOCODE_OK),
      () => json(SEARCH_OK)
    );
    const places = createPlacesClient({ apiKey: "test-key", fetchImpl });

    const result = await places.searchProviders("1 Main St", { limit: 1, keyword: "preschool" });

    expect(result.candidates.map((c) => c.name)).toEqual(["Sunrise Learning"]);
    expect(JSON.parse(String(calls[1].init?.body))).toMatchObject({
      textQuery: "preschool",
      maxResultCount: 1,
    });
  });

  it("reports geocoding failures without throwing", async () => {
    const { fetchImpl, calls } = fakeFetch(
      () => json({ status: "ZERO_RESULTS", results: [] }),
      () => json(SEARCH_OK)
    );
    const places = createPlacesClient({ apiKey: "test-key", fetchImpl });

    expect(await places.searchProviders("nowhere")).toEqual({
      candidates: [],
      error: 'Geocoding failed for "nowhere": ZERO_RESULTS',
    });
    expect(calls).toHaveLength(1);
  });

  it("reports API errors from the search", async () => {
    const { fetchImpl } = fakeFetch(
      () => json(GEOCODE_OK),
      () => json({ error: { status: "PERMISSION_DENIED", message: "API key not valid" } }, 403)
    );
    const places = createPlacesClient({ apiKey: "test-key", fetchImpl });

    expect(await places.searchProviders("1 Main St")).toEqual({
      candidates: [],
      origin: { lat: 47.6, lng: -122.3 },
      error: "Google Places error: PERMISSION_DENIED - API key not valid",
    });
  });

  it("reports network errors", async () => {
    const places = createPlacesClient({
      apiKey: "test-key",
      fetchImpl: async () => {
        throw new Error("socket hang up");
      },
    });

    expect(await places.searchProviders("1 Main St")).toEqual({
      candidates: [],
      error: "Places search failed: socket hang up",
    });
  });
});
