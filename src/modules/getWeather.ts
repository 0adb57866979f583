import axios, { AxiosInstance } from 'axios';
import http from 'http';
import https from 'https';
import { z } from 'zod';
import { CurrentWeatherSchema } from '../schemas/weather.schema';
import { WEATHER_REQUEST_TIMEOUT_MS } from '../constants/weather';

export interface WeatherApiOptions {
  apiUrl: string;
  apiKey: string;
}

export class WeatherSchemaError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super('Weather API schema mismatch');
    this.name = 'WeatherSchemaError';
    this.issues = issues;
  }
}

export function createWeatherClient(): AxiosInstance {
  return axios.create({
    timeout: WEATHER_REQUEST_TIMEOUT_MS,
    httpAgent: new http.Agent({ keepAlive: true, maxSockets: 10 }),
    httpsAgent: new https.Agent({ keepAlive: true, maxSockets: 10 }),
    // Anything but 200 is a failed lookup
    validateStatus: (status) => status === 200,
  });
}

/**
 * Single call to the current-weather endpoint.
 * Throws on transport errors, non-200 responses and payloads without a numeric temperature.
 */
export async function getTemperatureFromApi(
  client: AxiosInstance,
  city: string,
  options: WeatherApiOptions
): Promise<number> {
  const response = await client.get<unknown>(options.apiUrl, {
    params: {
      q: city,
      appid: options.apiKey,
      units: 'metric',
    },
  });

  const parsed = CurrentWeatherSchema.safeParse(response.data);

  if (!parsed.success) {
    throw new WeatherSchemaError(parsed.error.issues);
  }

  return parsed.data.main.temp;
}
