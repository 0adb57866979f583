export type FailureKind =
    | 'not_found'
    | 'upstream_unavailable'
    | 'validation'
    | 'persistence';

export interface Failure {
    kind: FailureKind;
    message: string;
}

export type Outcome<T> =
    | {
        status: 'success';
        data: T;
    }
    | {
        status: 'failure';
        failure: Failure;
    };

export function succeed<T>(data: T): Outcome<T> {
    return { status: 'success', data };
}

export function fail<T = never>(kind: FailureKind, message: string): Outcome<T> {
    return { status: 'failure', failure: { kind, message } };
}

// Shape check: errors raised by native addons may come from another realm
export function describeError(err: unknown): string {
    if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
        return err.message;
    }
    return String(err);
}
