export const DEFAULT_WEATHER_API_URL = 'http://api.openweathermap.org/data/2.5/weather';

export const TEMPERATURE_CACHE_TTL_SECONDS = 600; // 10 minutes

export const WEATHER_REQUEST_TIMEOUT_MS = 10_000;
