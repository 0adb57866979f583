import { BalanceOperation, BalanceUpdate } from '../interfaces/balance';
import { fail, Outcome } from '../interfaces/outcome';
import { BalanceOperationSchema, BalanceUpdateBodySchema } from '../schemas/balance.schema';
import { logger } from '../logger';
import { capitalize } from '../utils/format';
import { BalanceLedger, USER_NOT_FOUND } from './balanceLedger';
import { UserStore } from './userStore';
import { WeatherLookup } from './weather';

export const INVALID_OPERATION = "Invalid operation specified. Use 'increase' or 'decrease'.";

export function weatherFailureMessage(city: string): string {
  return `Failed to fetch weather in ${capitalize(city)}. Balance not changed`;
}

export function computeDelta(operation: BalanceOperation, temperature: number): number {
  return operation === 'decrease' ? -temperature : temperature;
}

export interface PathUpdateRequest {
  operation: string;
  userId: number;
  city: string;
}

/**
 * Adjusts a user's balance by the current temperature of a city.
 *
 * Both entry points share the lookup → delta → ledger pipeline. The path
 * variant resolves the user first and never rejects an operation (anything
 * but "decrease" increases). The body variant validates the operation up
 * front and leaves unknown users to the ledger.
 */
export class BalanceUpdateService {
  constructor(
    private readonly users: UserStore,
    private readonly weather: WeatherLookup,
    private readonly ledger: BalanceLedger
  ) {}

  async updateFromPath(request: PathUpdateRequest): Promise<Outcome<BalanceUpdate>> {
    const { userId, city } = request;

    const user = this.users.findById(userId);
    if (!user) {
      return fail('not_found', USER_NOT_FOUND);
    }

    const operation: BalanceOperation = request.operation === 'decrease' ? 'decrease' : 'increase';
    return this.applyTemperature(userId, city, operation);
  }

  async updateFromBody(body: unknown): Promise<Outcome<BalanceUpdate>> {
    const fields: object = typeof body === 'object' && body !== null ? body : {};
    const operation = BalanceOperationSchema.safeParse('operation' in fields ? fields.operation : undefined);
    if (!operation.success) {
      return fail('validation', INVALID_OPERATION);
    }

    const parsed = BalanceUpdateBodySchema.safeParse(body);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      return fail('validation', `Invalid request body: ${details}`);
    }

    return this.applyTemperature(parsed.data.user_id, parsed.data.city, parsed.data.operation);
  }

  private async applyTemperature(
    userId: number,
    city: string,
    operation: BalanceOperation
  ): Promise<Outcome<BalanceUpdate>> {
    const reading = await this.weather.fetch(city);

    // A reading of 0 is a real temperature, only an unavailable lookup aborts
    if (reading.status !== 'success') {
      logger.warn({ userId, city, reason: reading.reason }, 'Weather unavailable, balance unchanged');
      return fail('upstream_unavailable', weatherFailureMessage(city));
    }

    const delta = computeDelta(operation, reading.temperature);
    return this.ledger.apply(userId, delta);
  }
}
