/**
 * OpenWeatherMap API client
 *
 * Geocoding, current conditions, hourly (One Call 3.0) and 5-day/3-hour
 * forecasts. Responses are validated with zod before they are formatted.
 */

import { z } from 'zod';
import { createSubsystemLogger } from '../../../logging/subsystem.js';
import { WeatherServiceError } from '../../errors.js';
import type { Coordinates } from '../tool-definition.js';

const GEOCODING_URL = 'http://api.openweathermap.org/geo/1.0/direct';
const CURRENT_URL = 'https://api.openweathermap.org/data/2.5/weather';
const ONECALL_URL = 'https://api.openweathermap.org/data/3.0/onecall';
const FORECAST_URL = 'https://api.openweathermap.org/data/2.5/forecast';

export type TemperatureUnit = 'F' | 'C' | 'K';

export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

export interface OpenWeatherMapOptions {
  apiKey: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export function unitsParam(unit: TemperatureUnit): 'imperial' | 'metric' | 'standard' {
  switch (unit) {
    case 'F':
      return 'imperial';
    case 'C':
      return 'metric';
    case 'K':
      return 'standard';
  }
}

const conditionSchema = z.object({ description: z.string() });

export const geocodingResponseSchema = z.array(
  z.object({
    name: z.string().optional(),
    lat: z.number(),
    lon: z.number(),
    country: z.string().optional(),
    state: z.string().optional(),
  }),
);

export const currentWeatherSchema = z.object({
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    humidity: z.number(),
  }),
  weather: z.array(conditionSchema).min(1),
  wind: z.object({ speed: z.number() }),
  name: z.string().optional(),
});

export const hourlyForecastSchema = z.object({
  hourly: z
    .array(
      z.object({
        dt: z.number(),
        temp: z.number(),
        humidity: z.number(),
        weather: z.array(conditionSchema).min(1),
      }),
    )
    .default([]),
});

export const fiveDayForecastSchema = z.object({
  list: z
    .array(
      z.object({
        dt: z.number(),
        main: z.object({ temp: z.number(), humidity: z.number() }),
        weather: z.array(conditionSchema).min(1),
      }),
    )
    .default([]),
});

export class OpenWeatherMapClient {
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger = createSubsystemLogger('speaker/weather');

  constructor(options: OpenWeatherMapOptions) {
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  /**
   * Resolves a free-form location ("London", "San Francisco, CA, US") to
   * coordinates; null when nothing matches
   */
  async geocode(location: string): Promise<Coordinates | null> {
    const data = await this.request(GEOCODING_URL, { q: location, limit: '1' });
    const parsed = geocodingResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new WeatherServiceError('WEATHER_BAD_RESPONSE', 'Unexpected response format from geocoding service');
    }
    const [first] = parsed.data;
    return first ? [first.lat, first.lon] : null;
  }

  async currentWeather(coordinates: Coordinates, unit: TemperatureUnit): Promise<unknown> {
    return this.request(CURRENT_URL, this.locationParams(coordinates, unit));
  }

  async hourlyForecast(coordinates: Coordinates, unit: TemperatureUnit): Promise<unknown> {
    return this.request(ONECALL_URL, {
      ...this.locationParams(coordinates, unit),
      exclude: 'current,minutely,daily,alerts',
    });
  }

  async fiveDayForecast(coordinates: Coordinates, unit: TemperatureUnit): Promise<unknown> {
    return this.request(FORECAST_URL, this.locationParams(coordinates, unit));
  }

  private locationParams(coordinates: Coordinates, unit: TemperatureUnit): Record<string, string> {
    return {
      lat: String(coordinates[0]),
      lon: String(coordinates[1]),
      units: unitsParam(unit),
    };
  }

  private async request(base: string, params: Record<string, string>): Promise<unknown> {
    const url = new URL(base);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set('appid', this.apiKey);

    this.logger.debug('Weather request', { endpoint: base, params });

    let response: Response;
    try {
      response = await this.fetchImpl(url.toString(), { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new WeatherServiceError('WEATHER_TIMEOUT', 'Request timed out. Please try again', { timeoutMs: this.timeoutMs });
      }
      throw new WeatherServiceError(
        'WEATHER_NETWORK',
        'Failed to connect to weather service. Please check your internet connection',
        { cause: error instanceof Error ? error.message : String(error) },
      );
    }

    if (!response.ok) {
      if (response.status === 401) {
        throw new WeatherServiceError('WEATHER_INVALID_KEY', 'Invalid API key. Please check your OpenWeatherMap API key', { status: 401 });
      }
      if (response.status === 404) {
        throw new WeatherServiceError('WEATHER_NOT_FOUND', 'Location not found', { status: 404 });
      }
      throw new WeatherServiceError('WEATHER_HTTP', `HTTP error occurred: ${response.status} ${response.statusText}`.trim(), {
        status: response.status,
      });
    }

    try {
      return await response.json();
    } catch {
      throw new WeatherServiceError('WEATHER_BAD_RESPONSE', 'Unexpected response format from weather service');
    }
  }
}
