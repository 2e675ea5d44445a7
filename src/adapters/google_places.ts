import { AxiosInstance } from 'axios';
import { SearchResult } from '../core/types';
import { createHttpClient, describeHttpError } from '../utils/httpClient';
import { log } from '../utils/logger';
import { sleep } from '../utils/rateLimiter';
import { asArray, asNumber, asString, isRecord, readPath } from './parserSupport';

export const GEOCODE_URL = 'https://maps.googleapis.com/maps/api/geocode/json';
export const PLACES_SEARCH_URL = 'https://places.googleapis.com/v1/places:searchText';
export const PLACE_DETAILS_URL = 'https://places.googleapis.com/v1/places/';

const METERS_PER_MILE = 1609.34;
const MAX_PAGE_SIZE = 20;

export interface LatLng {
  lat: number;
  lng: number;
}

export interface PlaceRecord {
  id: string;
  displayName: string;
  formattedAddress: string;
}

export interface PlaceDetails {
  websiteUri?: string;
  internationalPhoneNumber?: string;
}

export interface TextSearchPage {
  places: PlaceRecord[];
  nextPageToken?: string;
  status?: string;
}

export interface PlacesSearchStats {
  locationsTotal: number;
  locationsGeocoded: number;
  requests: number;
  lastStatus: string | null;
}

export interface PlacesSearchOptions {
  maxResults?: number;
  radiusMiles?: number;
  delayMs?: number;
}

export interface PlacesSearch {
  searchLocations(baseQuery: string, locations: string[], options?: PlacesSearchOptions): Promise<{ places: PlaceRecord[]; stats: PlacesSearchStats }>;
  placeDetails(placeId: string): Promise<PlaceDetails>;
}

const toPlaceRecord = (raw: unknown): PlaceRecord | null => {
  if (!isRecord(raw)) return null;
  const id = asString(raw.id);
  if (!id) return null;
  return {
    id,
    displayName: asString(readPath(raw, ['displayName', 'text'])) ?? '',
    formattedAddress: asString(raw.formattedAddress) ?? '',
  };
};

export const parseTextSearch = (payload: unknown): TextSearchPage => {
  const places = asArray(isRecord(payload) ? payload.places : undefined)
    .map(toPlaceRecord)
    .filter((place): place is PlaceRecord => place !== null);
  return {
    places,
    nextPageToken: asString(readPath(payload, ['nextPageToken'])) || undefined,
    status: asString(readPath(payload, ['status'])) ?? asString(readPath(payload, ['error', 'message'])),
  };
};

export const parseGeocode = (payload: unknown): LatLng | null => {
  const lat = asNumber(readPath(payload, ['results', 0, 'geometry', 'location', 'lat']));
  const lng = asNumber(readPath(payload, ['results', 0, 'geometry', 'location', 'lng']));
  return lat === undefined || lng === undefined ? null : { lat, lng };
};

export const mapsPlaceUrl = (placeId: string): string => `https://www.google.com/maps/place/?q=place_id:${placeId}`;

export const normalizePlace = (place: PlaceRecord, details: PlaceDetails = {}): SearchResult => ({
  title: place.displayName,
  link: place.id ? mapsPlaceUrl(place.id) : '',
  snippet: place.formattedAddress,
  displayLink: 'google.com',
  origin: 'places',
  phone: details.internationalPhoneNumber,
  website: details.websiteUri,
});

export class GooglePlacesClient implements PlacesSearch {
  constructor(
    private readonly apiKey: string,
    private readonly http: AxiosInstance = createHttpClient({ timeoutMs: 20000 }),
  ) {}

  async geocode(location: string): Promise<LatLng | null> {
    if (!location.trim()) return null;
    const { data } = await this.http.get<unknown>(GEOCODE_URL, { params: { address: location, key: this.apiKey } });
    return parseGeocode(data);
  }

  async textSearch(query: string, { center, radiusMeters, pageToken, maxResults = MAX_PAGE_SIZE }: { center?: LatLng; radiusMeters?: number; pageToken?: string; maxResults?: number } = {}): Promise<TextSearchPage> {
    const body: Record<string, unknown> = { textQuery: query, maxResultCount: maxResults };
    if (center && radiusMeters) {
      body.locationBias = { circle: { center: { latitude: center.lat, longitude: center.lng }, radius: radiusMeters } };
    }
    if (pageToken) body.pageToken = pageToken;

    const { data } = await this.http.post<unknown>(PLACES_SEARCH_URL, body, {
      headers: {
        'Content-Type': 'application/json',
        'X-Goog-Api-Key': this.apiKey,
        'X-Goog-FieldMask': 'places.id,places.displayName,places.formattedAddress,nextPageToken',
      },
    });
    return parseTextSearch(data);
  }

  async placeDetails(placeId: string): Promise<PlaceDetails> {
    try {
      const { data } = await this.http.get<unknown>(`${PLACE_DETAILS_URL}${placeId}`, {
        headers: {
          'X-Goog-Api-Key': this.apiKey,
          'X-Goog-FieldMask': 'id,displayName,formattedAddress,websiteUri,internationalPhoneNumber',
        },
      });
      return {
        websiteUri: asString(readPath(data, ['websiteUri'])) || undefined,
        internationalPhoneNumber: asString(readPath(data, ['internationalPhoneNumber'])) || undefined,
      };
    } catch (error) {
      log('WARN', 'place details lookup failed', `${placeId}: ${describeHttpError(error)}`);
      return {};
    }
  }

  /**
   * Geocodes each location and pages a biased text search around it until
   * `maxResults` distinct places are collected.
   */
  async searchLocations(
    baseQuery: string,
    locations: string[],
    { maxResults = 30, radiusMiles = 25, delayMs = 2000 }: PlacesSearchOptions = {},
  ): Promise<{ places: PlaceRecord[]; stats: PlacesSearchStats }> {
    const places: PlaceRecord[] = [];
    const seen = new Set<string>();
    const radiusMeters = Math.floor(radiusMiles * METERS_PER_MILE);
    const stats: PlacesSearchStats = { locationsTotal: locations.length, locationsGeocoded: 0, requests: 0, lastStatus: null };

    for (const location of locations) {
      if (places.length >= maxResults) break;

      let center: LatLng | null;
      try {
        stats.requests += 1;
        center = await this.geocode(location);
      } catch (error) {
        log('WARN', 'geocode failed', `${location}: ${describeHttpError(error)}`);
        continue;
      }
      if (!center) continue;
      stats.locationsGeocoded += 1;

      const query = `${baseQuery} in ${location}`.trim();
      let pageToken: string | undefined;
      while (places.length < maxResults) {
        let page: TextSearchPage;
        try {
          stats.requests += 1;
          page = await this.textSearch(query, { center, radiusMeters, pageToken, maxResults: Math.min(MAX_PAGE_SIZE, maxResults - places.length) });
        } catch (error) {
          stats.lastStatus = describeHttpError(error);
          log('WARN', 'places text search failed', `${query}: ${stats.lastStatus}`);
          break;
        }
        stats.lastStatus = page.status ?? stats.lastStatus;

        for (const place of page.places) {
          if (seen.has(place.id)) continue;
          seen.add(place.id);
          places.push(place);
          if (places.length >= maxResults) break;
        }

        pageToken = page.nextPageToken;
        if (!pageToken || places.length >= maxResults) break;
        if (delayMs > 0) await sleep(delayMs);
      }
    }

    log('INFO', `places search collected ${places.length} places`, stats);
    return { places, stats };
  }
}
