import { describe, expect, it } from "vitest";
import { ReverseGeocoder, UNKNOWN_CITY } from "../services/geocoder";
import { FakeHttp } from "./mocks/fakeHttp";

const options = {
  enabled: true,
  baseUrl: "https://geocoder.test",
  userAgent: "ekadashi-reminders-test",
  timeoutMs: 1000,
};

describe("ReverseGeocoder", () => {
  it("should use the city from a live lookup", async () => {
    const http = new FakeHttp().reply({ address: { city: "New Delhi", state: "Delhi" } });
    const geocoder = new ReverseGeocoder(http, options);

    expect(await geocoder.getCityName(28.6139, 77.209)).toBe("New Delhi");
    expect(http.requests[0]).toEqual({
      url: "https://geocoder.test/reverse",
      params: {
        format: "jsonv2",
        lat: "28.6139",
        lon: "77.209",
        "accept-language": "en",
        zoom: "10",
      },
      headers: { "User-Agent": "ekadashi-reminders-test" },
    });
  });

  it("should walk down the address fields", async () => {
    const http = new FakeHttp()
      .reply({ address: { town: "Palo Alto", county: "Santa Clara County" } })
      .reply({ address: { county: "Marin County", state: "California" } })
      .reply({ address: { state: "Kerala" } });
    const geocoder = new ReverseGeocoder(http, options);

    expect(await geocoder.getCityName(37.44, -122.14)).toBe("Palo Alto");
    expect(await geocoder.getCityName(38.08, -122.76)).toBe("Marin County");
    expect(await geocoder.getCityName(10.0, 76.5)).toBe("Kerala");
  });

  it("should fall back to the nearest known point when the lookup fails", async () => {
    const http = new FakeHttp().fail(new Error("network down"));
    const geocoder = new ReverseGeocoder(http, options);
    expect(await geocoder.getCityName(28.7, 77.1)).toBe("Delhi");
  });

  it("should fall back when the lookup has no address", async () => {
    const http = new FakeHttp().reply({ error: "Unable to geocode" });
    const geocoder = new ReverseGeocoder(http, options);
    expect(await geocoder.getCityName(12.9, 77.6)).toBe("Bengaluru");
  });

  it("should take the first known point within half a degree", async () => {
    const geocoder = new ReverseGeocoder(new FakeHttp(), { ...options, enabled: false });
    // both San Jose and Mountain View are in range; San Jose is listed first
    expect(await geocoder.getCityName(37.4, -122.0)).toBe("San Jose");
    expect(await geocoder.getCityName(51.9, -0.5)).toBe("London");
  });

  it("should answer Unknown far from every known point", async () => {
    const http = new FakeHttp().fail(new Error("timeout"));
    const geocoder = new ReverseGeocoder(http, options);
    expect(await geocoder.getCityName(-33.868, 151.209)).toBe(UNKNOWN_CITY);
  });

  it("should not call the network when live lookups are disabled", async () => {
    const http = new FakeHttp();
    const geocoder = new ReverseGeocoder(http, { ...options, enabled: false });
    expect(await geocoder.getCityName(40.7, -74.0)).toBe("New York");
    expect(http.requests).toHaveLength(0);
  });
});
