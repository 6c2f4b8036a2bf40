import { z } from 'zod';

import { ConfigError } from '../config';
import type { ProviderCandidate, Result } from '../types';
import { log } from '../ui';
import { errorMessage, fail, ok } from '../utils';

const GEOCODE_ENDPOINT = 'https://maps.googleapis.com/maps/api/geocode/json';
const SEARCH_TEXT_ENDPOINT = 'https://places.googleapis.com/v1/places:searchText';
const FIELD_MASK = [
  'places.displayName',
  'places.formattedAddress',
  'places.nationalPhoneNumber',
  'places.rating',
  'places.websiteUri',
  'places.location',
].join(',');

const MAX_RESULTS_PER_REQUEST = 20;
const MAX_RADIUS_METERS = 50_000;
const METERS_PER_MILE = 1609.344;

const GeocodeResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z
    .array(z.object({ geometry: z.object({ location: z.object({ lat: z.number(), lng: z.number() }) }) }))
    .default([]),
});

const PlaceSchema = z.object({
  displayName: z.object({ text: z.string().optional() }).optional(),
  formattedAddress: z.string().optional(),
  nationalPhoneNumber: z.string().optional(),
  rating: z.number().optional(),
  websiteUri: z.string().optional(),
  location: z.object({ latitude: z.number(), longitude: z.number() }).optional(),
});

const SearchTextResponseSchema = z.object({
  places: z.array(PlaceSchema).default([]),
});

const ErrorResponseSchema = z.object({
  error: z.object({ message: z.string().optional(), status: z.string().optional() }).optional(),
});

export type LatLng = { lat: number; lng: number };

export type SearchOptions = {
  radiusMeters?: number;
  limit?: number;
  keyword?: string;
};

export type PlacesSearchResult = {
  candidates: ProviderCandidate[];
  origin?: LatLng;
  error?: string;
};

/** Great-circle distance in miles, rounded to one decimal. */
export function distanceMiles(a: LatLng, b: LatLng): number {
  const toRad = (deg: number) => (deg * Math.PI) / 180;
  const earthRadiusMiles = 3958.8;
  const dLat = toRad(b.lat - a.lat);
  const dLng = toRad(b.lng - a.lng);
  const h =
    Math.sin(dLat / 2) ** 2 + Math.cos(toRad(a.lat)) * Math.cos(toRad(b.lat)) * Math.sin(dLng / 2) ** 2;
  const miles = 2 * earthRadiusMiles * Math.asin(Math.sqrt(h));
  return Math.round(miles * 10) / 10;
}

export function createPlacesClient({
  apiKey,
  fetchImpl = fetch,
}: {
  apiKey: string | undefined;
  fetchImpl?: typeof fetch;
}) {
  if (!apiKey) {
    throw new ConfigError('Missing GOOGLE_MAPS_API_KEY in environment.');
  }
  const key: string = apiKey;

  const readError = async (response: Response) => {
    const body: unknown = await response.json().catch(() => ({}));
    const parsed = ErrorResponseSchema.safeParse(body);
    const err = parsed.success ? parsed.data.error : undefined;
    return `Google Places error: ${err?.status ?? response.status} - ${err?.message ?? 'Unknown error'}`;
  };

  const geocode = async (address: string): Promise<Result<LatLng>> => {
    const url = new URL(GEOCODE_ENDPOINT);
    url.searchParams.set('address', address);
    url.searchParams.set('key', key);

    const response = await fetchImpl(url);
    if (!response.ok) return fail(await readError(response));

    const data = GeocodeResponseSchema.parse(await response.json());
    const first = data.results[0];
    if (data.status !== 'OK' || !first) {
      return fail(`Geocoding failed for "${address}": ${data.status}${data.error_message ? ` - ${data.error_message}` : ''}`);
    }
    return ok(first.geometry.location);
  };

  const searchText = async (
    origin: LatLng,
    { radiusMeters, limit, keyword }: Required<SearchOptions>
  ): Promise<Result<ProviderCandidate[]>> => {
    const response = await fetchImpl(SEARCH_TEXT_ENDPOINT, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'X-Goog-Api-Key': key,
        'X-Goog-FieldMask': FIELD_MASK,
      },
      body: JSON.stringify({
        textQuery: keyword,
        maxResultCount: Math.min(limit, MAX_RESULTS_PER_REQUEST),
        locationBias: {
          circle: {
            center: { latitude: origin.lat, longitude: origin.lng },
            radius: Math.min(radiusMeters, MAX_RADIUS_METERS),
          },
        },
      }),
    });
    if (!response.ok) return fail(await readError(response));

    const data = SearchTextResponseSchema.parse(await response.json());
    const maxMiles = radiusMeters / METERS_PER_MILE;

    const candidates = data.places
      .map(
        (place): ProviderCandidate => ({
          name: place.displayName?.text ?? '',
          address: place.formattedAddress ?? '',
          phone: place.nationalPhoneNumber ?? '',
          rating: place.rating ?? null,
          websites: place.websiteUri ? [place.websiteUri] : [],
          distance: place.location
            ? distanceMiles(origin, { lat: place.location.latitude, lng: place.location.longitude })
            : null,
        })
      )
      .filter((c) => c.name)
      .filter((c) => c.distance === null || c.distance <= maxMiles)
      .slice(0, limit);

    return ok(candidates);
  };

  /**
   * Nearby providers for an address. Failures come back as zero candidates
   * with an error message, never as an exception.
   */
  const searchProviders = async (
    address: string,
    options: SearchOptions = {}
  ): Promise<PlacesSearchResult> => {
    const resolved: Required<SearchOptions> = {
      radiusMeters: options.radiusMeters ?? 5000,
      limit: Math.max(1, options.limit ?? 20),
      keyword: options.keyword ?? 'daycare',
    };

    try {
      const origin = await geocode(address);
      if (!origin.ok) {
        log.warn(`[places] ${origin.error}`);
        return { candidates: [], error: origin.error };
      }

      const found = await searchText(origin.value, resolved);
      if (!found.ok) {
        log.warn(`[places] ${found.error}`);
        return { candidates: [], origin: origin.value, error: found.error };
      }

      log.info(`[places] ${found.value.length} providers within ${resolved.radiusMeters}m of ${address}`);
      return { candidates: found.value, origin: origin.value };
    } catch (e) {
      const error = `Places search failed: ${errorMessage(e)}`;
      log.warn(`[places] ${error}`);
      return { candidates: [], error };
    }
  };

  return { searchProviders };
}
