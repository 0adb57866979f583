import { AxiosInstance, isAxiosError } from 'axios';
import { TemperatureCache } from '../cache/temperatureCache';
import { LookupResult } from '../interfaces/weatherResult';
import { describeError } from '../interfaces/outcome';
import { logger } from '../logger';
import { Clock, systemClock } from '../utils/time';
import { getTemperatureFromApi, WeatherApiOptions, WeatherSchemaError } from './getWeather';

export class WeatherLookup {
  constructor(
    private readonly cache: TemperatureCache,
    private readonly client: AxiosInstance,
    private readonly options: WeatherApiOptions,
    private readonly clock: Clock = systemClock
  ) {}

  // Public API
  async fetch(city: string): Promise<LookupResult> {
    const timestamp = this.clock();

    // Cache-first
    const cached = this.cache.get(city, timestamp);
    if (cached !== undefined) {
      logger.debug({ city }, 'Temperature cache hit');

      return {
        status: 'success',
        source: 'cache',
        temperature: cached,
        timestamp,
      };
    }

    logger.debug({ city }, 'Temperature cache miss');
    return this.fetchFromApi(city, timestamp);
  }

  private async fetchFromApi(city: string, timestamp: number): Promise<LookupResult> {
    try {
      const temperature = await getTemperatureFromApi(this.client, city, this.options);

      this.cache.put(city, temperature, timestamp);
      logger.debug({ city, temperature }, 'Temperature cached');

      return {
        status: 'success',
        source: 'api',
        temperature,
        timestamp,
      };
    } catch (err) {
      const reason = classifyFailure(err);

      logger.error(
        {
          city,
          reason,
          message: describeError(err),
          status: isAxiosError(err) ? err.response?.status : undefined,
          issues: err instanceof WeatherSchemaError ? err.issues : undefined,
        },
        'Weather API request failed'
      );

      return {
        status: 'unavailable',
        reason,
        timestamp,
      };
    }
  }
}

function classifyFailure(err: unknown): 'timeout' | 'api_error' | 'schema_mismatch' {
  if (err instanceof WeatherSchemaError) return 'schema_mismatch';

  if (isAxiosError(err) && (err.code === 'ETIMEDOUT' || err.code === 'ECONNABORTED')) {
    return 'timeout';
  }

  return 'api_error';
}
