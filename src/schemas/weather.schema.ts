import { z } from 'zod';

// Only the fields the service reads; everything else in the payload is dropped
export const MainSchema = z.object({
  temp: z.number().finite(),
});

export const CurrentWeatherSchema = z.object({
  name: z.string().optional(),
  main: MainSchema,
});
