/**
 * WeatherTool Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { WeatherTool } from './weather-tool.js';
import type { FetchLike } from './openweathermap.js';
import { createDefaultToolRegistry } from '../default-tools.js';
import { ToolRegistry } from '../tool-registry.js';

vi.mock('../../../logging/subsystem.js', () => ({
  createSubsystemLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    debug: vi.fn(),
  })),
  describeError: vi.fn((error: unknown) => ({ error: String(error) })),
}));

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const currentBody = {
  name: 'San Francisco',
  main: { temp: 61.2, feels_like: 60.1, humidity: 72 },
  weather: [{ description: 'clear sky' }],
  wind: { speed: 5.1 },
};

function forecastEntries(count: number): Array<{ dt: number; temp: number; humidity: number; weather: Array<{ description: string }> }> {
  return Array.from({ length: count }, (_, index) => ({
    dt: 1700000000 + index * 3600,
    temp: 50 + index,
    humidity: 60,
    weather: [{ description: 'few clouds' }],
  }));
}

describe('WeatherTool', () => {
  let requests: URL[];
  let responses: Array<Response | Error>;
  let tool: WeatherTool;

  const fakeFetch: FetchLike = async url => {
    requests.push(new URL(url));
    const next = responses.shift();
    if (next === undefined) {
      throw new Error(`unexpected request: ${url}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  };

  function endpoint(index: number): string {
    return `${requests[index].origin}${requests[index].pathname}`;
  }

  beforeEach(() => {
    requests = [];
    responses = [];
    tool = new WeatherTool({ apiKey: 'test-key', fetch: fakeFetch });
  });

  describe('current weather', () => {
    it('uses the default location and units', async () => {
      responses = [jsonResponse(currentBody)];

      const report = await tool.execute({ forecast_type: 'current' });

      expect(report).toEqual({
        temperature: 61.2,
        feels_like: 60.1,
        humidity: 72,
        description: 'clear sky',
        wind_speed: 5.1,
        location: 'San Francisco',
        unit: 'F',
      });
      expect(endpoint(0)).toBe('https://api.openweathermap.org/data/2.5/weather');
      expect(Object.fromEntries(requests[0].searchParams)).toEqual({
        lat: '37.7749',
        lon: '-122.4194',
        units: 'imperial',
        appid: 'test-key',
      });
    });

    it('geocodes a city before fetching', async () => {
      responses = [
        jsonResponse([{ name: 'London', lat: 51.5074, lon: -0.1278 }]),
        jsonResponse({ ...currentBody, name: '' }),
      ];

      const report = await tool.execute({ forecast_type: 'current', location: 'London', unit: 'C' });

      expect(endpoint(0)).toBe('http://api.openweathermap.org/geo/1.0/direct');
      expect(requests[0].searchParams.get('q')).toBe('London');
      expect(requests[0].searchParams.get('limit')).toBe('1');
      expect(requests[1].searchParams.get('lat')).toBe('51.5074');
      expect(requests[1].searchParams.get('lon')).toBe('-0.1278');
      expect(requests[1].searchParams.get('units')).toBe('metric');
      expect(report).toMatchObject({ location: 'Unknown', unit: 'C' });
    });

    it('rejects cities that cannot be geocoded', async () => {
      responses = [jsonResponse([])];

      await expect(tool.execute({ forecast_type: 'current', location: 'Atlantis' })).rejects.toMatchObject({
        code: 'WEATHER_NOT_FOUND',
        message: 'Could not find coordinates for city: Atlantis',
      });
      expect(requests).toHaveLength(1);
    });

    it('rejects responses missing fields', async () => {
      responses = [jsonResponse({ weather: [{ description: 'rain' }] })];

      await expect(tool.execute({ forecast_type: 'current' })).rejects.toMatchObject({ code: 'WEATHER_BAD_RESPONSE' });
    });
  });

  describe('forecasts', () => {
    it('keeps the first 24 hourly entries', async () => {
      responses = [jsonResponse({ hourly: forecastEntries(30) })];

      const report = await tool.execute({ forecast_type: 'hourly' });

      expect(endpoint(0)).toBe('https://api.openweathermap.org/data/3.0/onecall');
      expect(requests[0].searchParams.get('exclude')).toBe('current,minutely,daily,alerts');
      if (!('hourly_forecast' in report)) {
        throw new Error('expected an hourly report');
      }
      expect(report.hourly_forecast).toHaveLength(24);
      expect(report.hourly_forecast[0]).toEqual({
        time: 1700000000,
        temperature: 50,
        description: 'few clouds',
        humidity: 60,
      });
    });

    it('keeps every 5-day entry and maps K to standard units', async () => {
      const list = forecastEntries(3).map(entry => ({
        dt: entry.dt,
        main: { temp: entry.temp, humidity: entry.humidity },
        weather: entry.weather,
      }));
      responses = [jsonResponse({ list })];

      const report = await tool.execute({ forecast_type: '5day', unit: 'K' });

      expect(endpoint(0)).toBe('https://api.openweathermap.org/data/2.5/forecast');
      expect(requests[0].searchParams.get('units')).toBe('standard');
      expect(report).toEqual({
        daily_forecast: [
          { time: 1700000000, temperature: 50, description: 'few clouds', humidity: 60 },
          { time: 1700003600, temperature: 51, description: 'few clouds', humidity: 60 },
          { time: 1700007200, temperature: 52, description: 'few clouds', humidity: 60 },
        ],
        unit: 'K',
      });
    });
  });

  describe('service errors', () => {
    it.each([
      [401, 'WEATHER_INVALID_KEY', 'Invalid API key. Please check your OpenWeatherMap API key'],
      [404, 'WEATHER_NOT_FOUND', 'Location not found'],
      [500, 'WEATHER_HTTP', 'HTTP error occurred: 500'],
    ])('maps HTTP %i to %s', async (status, code, message) => {
      responses = [new Response('{}', { status })];

      await expect(tool.execute({ forecast_type: 'current' })).rejects.toMatchObject({ code, message });
    });

    it('maps network failures', async () => {
      responses = [new TypeError('fetch failed')];

      await expect(tool.execute({ forecast_type: 'current' })).rejects.toMatchObject({
        code: 'WEATHER_NETWORK',
        message: 'Failed to connect to weather service. Please check your internet connection',
      });
    });

    it('maps timeouts', async () => {
      responses = [Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' })];

      await expect(tool.execute({ forecast_type: 'current' })).rejects.toMatchObject({
        code: 'WEATHER_TIMEOUT',
        message: 'Request timed out. Please try again',
      });
    });
  });

  describe('through the registry', () => {
    it('returns invalid forecast types as error results', async () => {
      const registry = new ToolRegistry();
      registry.register(tool);

      await expect(registry.executeTool('get_weather', { forecast_type: 'weekly' })).resolves.toEqual({
        error: 'Parameter forecast_type must be one of current, hourly, 5day',
        tool: 'get_weather',
      });
      expect(requests).toHaveLength(0);
    });

    it('builds the tool from environment settings', () => {
      const registry = createDefaultToolRegistry({
        OPENWEATHERMAP_API_KEY: 'test-key',
        WEATHERTOOL_DEFAULT_LOCATION: '40.7128,-74.006',
        WEATHERTOOL_DEFAULT_UNITS: 'c',
      });

      const registered = registry.getTool('get_weather');
      expect(registered).toBeInstanceOf(WeatherTool);
      if (registered instanceof WeatherTool) {
        expect(registered.defaultLocation).toEqual([40.7128, -74.006]);
        expect(registered.defaultUnits).toBe('C');
      }
    });

    it('skips the tool without an API key', () => {
      expect(createDefaultToolRegistry({}).size).toBe(0);
    });
  });
});
