/**
 * Weather Tool
 *
 * `get_weather`: current conditions, a 24-hour hourly forecast, or the 5-day
 * forecast for a city or the configured default coordinates.
 */

import { createSubsystemLogger } from '../../../logging/subsystem.js';
import { ToolError, WeatherServiceError } from '../../errors.js';
import type { ToolParameterSchema } from '../../types/index.js';
import { BaseTool, type ToolArguments } from '../base-tool.js';
import type { Coordinates, ToolDefinition } from '../tool-definition.js';
import {
  OpenWeatherMapClient,
  currentWeatherSchema,
  fiveDayForecastSchema,
  hourlyForecastSchema,
  type FetchLike,
  type TemperatureUnit,
} from './openweathermap.js';

export const FORECAST_TYPES = ['current', 'hourly', '5day'] as const;
export const TEMPERATURE_UNITS = ['F', 'C', 'K'] as const;

export type ForecastType = (typeof FORECAST_TYPES)[number];

/** San Francisco */
export const DEFAULT_LOCATION: Coordinates = [37.7749, -122.4194];

const HOURLY_ENTRIES = 24;

export type WeatherToolArguments = {
  forecast_type: ForecastType;
  location?: string;
  unit?: TemperatureUnit;
};

export interface CurrentWeatherReport {
  temperature: number;
  feels_like: number;
  humidity: number;
  description: string;
  wind_speed: number;
  location: string;
  unit: TemperatureUnit;
}

export interface ForecastEntry {
  /** Unix seconds */
  time: number;
  temperature: number;
  description: string;
  humidity: number;
}

export interface HourlyForecastReport {
  hourly_forecast: ForecastEntry[];
  unit: TemperatureUnit;
}

export interface DailyForecastReport {
  daily_forecast: ForecastEntry[];
  unit: TemperatureUnit;
}

export type WeatherReport = CurrentWeatherReport | HourlyForecastReport | DailyForecastReport;

export interface WeatherToolOptions {
  apiKey: string;
  defaultLocation?: Coordinates;
  defaultUnits?: TemperatureUnit;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export function isForecastType(value: unknown): value is ForecastType {
  return FORECAST_TYPES.some(type => type === value);
}

export function isTemperatureUnit(value: unknown): value is TemperatureUnit {
  return TEMPERATURE_UNITS.some(unit => unit === value);
}

export class WeatherTool extends BaseTool<WeatherToolArguments, WeatherReport> {
  readonly name = 'get_weather';

  readonly description =
    'Get weather information for a location. If no location is specified, uses the default location. ' +
    'Can get current weather, hourly forecast, or 5-day forecast.';

  readonly parameters: ToolParameterSchema = {
    type: 'object',
    properties: {
      location: {
        type: 'string',
        description: "City name (e.g., 'London', 'San Francisco, CA, US'). Optional, uses default if not provided.",
      },
      forecast_type: {
        type: 'string',
        enum: FORECAST_TYPES,
        description: "Type of forecast: 'current' for current weather, 'hourly' for 24-hour forecast, '5day' for 5-day forecast",
      },
      unit: {
        type: 'string',
        enum: TEMPERATURE_UNITS,
        description: 'Temperature unit: F (Fahrenheit), C (Celsius), K (Kelvin)',
      },
    },
    required: ['forecast_type'],
  };

  readonly defaultLocation: Coordinates;
  readonly defaultUnits: TemperatureUnit;
  private readonly client: OpenWeatherMapClient;
  private readonly logger = createSubsystemLogger('speaker/weather');

  constructor(options: WeatherToolOptions) {
    super();
    this.defaultLocation = options.defaultLocation ?? DEFAULT_LOCATION;
    this.defaultUnits = options.defaultUnits ?? 'F';
    this.client = new OpenWeatherMapClient({
      apiKey: options.apiKey,
      timeoutMs: options.timeoutMs,
      fetch: options.fetch,
    });
  }

  protected narrowArguments(args: ToolArguments): WeatherToolArguments {
    const forecastType = args.forecast_type;
    if (!isForecastType(forecastType)) {
      throw new ToolError('TOOL_INVALID_PARAMETERS', `Invalid forecast type: ${String(forecastType)}`, { tool: this.name });
    }
    const narrowed: WeatherToolArguments = { forecast_type: forecastType };
    if (typeof args.location === 'string') narrowed.location = args.location;
    if (isTemperatureUnit(args.unit)) narrowed.unit = args.unit;
    return narrowed;
  }

  async execute(args: WeatherToolArguments): Promise<WeatherReport> {
    const unit = args.unit ?? this.defaultUnits;
    const location = args.location?.trim() || undefined;
    this.logger.info('Fetching weather', { forecastType: args.forecast_type, location: location ?? 'default', unit });

    const coordinates = location ? await this.lookupCity(location) : this.defaultLocation;

    const data = await this.fetchForecast(args.forecast_type, coordinates, unit);
    return this.formatWeatherResponse(data, args.forecast_type, unit);
  }

  private fetchForecast(forecastType: ForecastType, coordinates: Coordinates, unit: TemperatureUnit): Promise<unknown> {
    switch (forecastType) {
      case 'current':
        return this.client.currentWeather(coordinates, unit);
      case 'hourly':
        return this.client.hourlyForecast(coordinates, unit);
      case '5day':
        return this.client.fiveDayForecast(coordinates, unit);
    }
  }

  private async lookupCity(location: string): Promise<Coordinates> {
    const coordinates = await this.client.geocode(location);
    if (!coordinates) {
      throw new WeatherServiceError('WEATHER_NOT_FOUND', `Could not find coordinates for city: ${location}`, { location });
    }
    return coordinates;
  }

  formatWeatherResponse(data: unknown, forecastType: ForecastType, unit: TemperatureUnit): WeatherReport {
    switch (forecastType) {
      case 'current':
        return this.formatCurrent(data, unit);
      case 'hourly':
        return this.formatHourly(data, unit);
      case '5day':
        return this.formatFiveDay(data, unit);
    }
  }

  formatCurrent(data: unknown, unit: TemperatureUnit): CurrentWeatherReport {
    const parsed = currentWeatherSchema.safeParse(data);
    if (!parsed.success) {
      throw badResponse(parsed.error.issues[0]?.path.join('.'));
    }
    const current = parsed.data;
    return {
      temperature: current.main.temp,
      feels_like: current.main.feels_like,
      humidity: current.main.humidity,
      description: current.weather[0].description,
      wind_speed: current.wind.speed,
      location: current.name || 'Unknown',
      unit,
    };
  }

  formatHourly(data: unknown, unit: TemperatureUnit): HourlyForecastReport {
    const parsed = hourlyForecastSchema.safeParse(data);
    if (!parsed.success) {
      throw badResponse(parsed.error.issues[0]?.path.join('.'));
    }
    return {
      hourly_forecast: parsed.data.hourly.slice(0, HOURLY_ENTRIES).map(hour => ({
        time: hour.dt,
        temperature: hour.temp,
        description: hour.weather[0].description,
        humidity: hour.humidity,
      })),
      unit,
    };
  }

  formatFiveDay(data: unknown, unit: TemperatureUnit): DailyForecastReport {
    const parsed = fiveDayForecastSchema.safeParse(data);
    if (!parsed.success) {
      throw badResponse(parsed.error.issues[0]?.path.join('.'));
    }
    return {
      daily_forecast: parsed.data.list.map(entry => ({
        time: entry.dt,
        temperature: entry.main.temp,
        description: entry.weather[0].description,
        humidity: entry.main.humidity,
      })),
      unit,
    };
  }
}

function badResponse(field: string | undefined): WeatherServiceError {
  return new WeatherServiceError('WEATHER_BAD_RESPONSE', 'Unexpected response format from weather service', {
    field: field ?? 'unknown',
  });
}

function isCoordinates(value: unknown): value is Coordinates {
  return Array.isArray(value) && value.length === 2 && value.every(part => typeof part === 'number');
}

export const weatherToolDefinition: ToolDefinition = {
  id: 'WeatherTool',
  settings: {
    apiKey: { type: 'string', fallbackEnv: 'OPENWEATHERMAP_API_KEY', required: true },
    defaultLocation: { type: 'coordinates', default: DEFAULT_LOCATION },
    defaultUnits: { type: 'string', default: 'F' },
  },
  create(settings) {
    const { apiKey, defaultLocation, defaultUnits } = settings;
    if (typeof apiKey !== 'string' || apiKey === '') {
      throw new ToolError('TOOL_INVALID_PARAMETERS', 'WeatherTool requires an API key');
    }
    const units = typeof defaultUnits === 'string' ? defaultUnits.toUpperCase() : undefined;
    return new WeatherTool({
      apiKey,
      defaultLocation: isCoordinates(defaultLocation) ? defaultLocation : DEFAULT_LOCATION,
      defaultUnits: isTemperatureUnit(units) ? units : 'F',
    });
  },
};
