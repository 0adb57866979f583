import { Response } from 'express';
import { FailureKind, Outcome } from '../interfaces/outcome';

export type StatusMap = Partial<Record<FailureKind, number>>;

/** Write an outcome as JSON: the mapped body on success, `{ error }` with the kind's status on failure. */
export function sendOutcome<T>(
  res: Response,
  outcome: Outcome<T>,
  options: { status: number; failures: StatusMap; body: (data: T) => unknown }
): void {
  if (outcome.status === 'failure') {
    const { kind, message } = outcome.failure;
    res.status(options.failures[kind] ?? 500).json({ error: message });
    return;
  }

  res.status(options.status).json(options.body(outcome.data));
}
