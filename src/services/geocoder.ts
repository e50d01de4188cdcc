import axios from "axios";
import { config } from "../config";
import logger from "../utils/logger";
import { HttpGetter } from "./positioning";

export const UNKNOWN_CITY = "Unknown";

interface KnownPoint {
  name: string;
  latitude: number;
  longitude: number;
}

/** Reference points checked in order; a point matches within half a degree on both axes */
export const KNOWN_POINTS: readonly KnownPoint[] = [
  { name: "San Jose", latitude: 37.338, longitude: -121.885 },
  { name: "Mountain View", latitude: 37.422, longitude: -122.084 },
  { name: "San Francisco", latitude: 37.774, longitude: -122.419 },
  { name: "Los Angeles", latitude: 34.052, longitude: -118.243 },
  { name: "Seattle", latitude: 47.606, longitude: -122.332 },
  { name: "New York", latitude: 40.712, longitude: -74.006 },
  { name: "Philadelphia", latitude: 39.952, longitude: -75.165 },
  { name: "Washington DC", latitude: 38.907, longitude: -77.036 },
  { name: "Boston", latitude: 42.36, longitude: -71.058 },
  { name: "London", latitude: 51.507, longitude: -0.127 },
  { name: "Paris", latitude: 48.856, longitude: 2.352 },
  { name: "Berlin", latitude: 52.52, longitude: 13.405 },
  { name: "Bengaluru", latitude: 12.971, longitude: 77.594 },
  { name: "Mumbai", latitude: 19.076, longitude: 72.877 },
  { name: "Delhi", latitude: 28.613, longitude: 77.209 },
  { name: "Chennai", latitude: 13.082, longitude: 80.27 },
  { name: "Hyderabad", latitude: 17.385, longitude: 78.486 },
  { name: "Kolkata", latitude: 22.572, longitude: 88.363 },
];

const KNOWN_POINT_RADIUS = 0.5;

interface NominatimAddress {
  city?: string;
  town?: string;
  village?: string;
  county?: string;
  state?: string;
}

interface NominatimReverseResponse {
  address?: NominatimAddress;
  error?: string;
}

export interface GeocoderOptions {
  enabled: boolean;
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
}

export class ReverseGeocoder {
  constructor(
    private readonly http: HttpGetter = axios,
    private readonly options: GeocoderOptions = config.geocoder
  ) {}

  /** City name for a coordinate. Never throws; the last resort is "Unknown". */
  async getCityName(latitude: number, longitude: number): Promise<string> {
    if (this.options.enabled) {
      const live = await this.lookup(latitude, longitude);
      if (live) return live;
    }
    return this.nearestKnownPoint(latitude, longitude) ?? UNKNOWN_CITY;
  }

  nearestKnownPoint(latitude: number, longitude: number): string | null {
    const match = KNOWN_POINTS.find(
      (point) =>
        Math.abs(point.latitude - latitude) <= KNOWN_POINT_RADIUS &&
        Math.abs(point.longitude - longitude) <= KNOWN_POINT_RADIUS
    );
    return match ? match.name : null;
  }

  private async lookup(latitude: number, longitude: number): Promise<string | null> {
    try {
      const response = await this.http.get<NominatimReverseResponse>(
        `${this.options.baseUrl}/reverse`,
        {
          params: {
            format: "jsonv2",
            lat: String(latitude),
            lon: String(longitude),
            "accept-language": "en",
            zoom: "10",
          },
          timeout: this.options.timeoutMs,
          headers: { "User-Agent": this.options.userAgent },
        }
      );
      const address = response.data.address;
      if (!address) {
        logger.debug(`Reverse geocoding returned no address: ${response.data.error ?? "empty"}`);
        return null;
      }
      const name = address.city ?? address.town ?? address.village ?? address.county ?? address.state;
      return name && name.trim().length > 0 ? name : null;
    } catch (error) {
      logger.warn("Reverse geocoding failed, using known points:", error);
      return null;
    }
  }
}
