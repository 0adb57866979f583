export type LookupResult =
    | {
        status: 'success';
        source: 'cache' | 'api';
        temperature: number;
        timestamp: number;
    }
    | {
        status: 'unavailable';
        reason: 'timeout' | 'api_error' | 'schema_mismatch';
        timestamp: number;
    };
