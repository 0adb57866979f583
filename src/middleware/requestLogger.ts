import { RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../logger';

export const REQUEST_ID_HEADER = 'x-request-id';

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,64}$/;

/** A client-supplied id is kept only when short and header-safe. */
export function resolveRequestId(supplied: string | undefined): string {
    return supplied !== undefined && REQUEST_ID_PATTERN.test(supplied) ? supplied : uuidv4();
}

// Tags every request with an id and logs its outcome once the response is sent
export const requestLogger: RequestHandler = (req, res, next) => {
    const requestId = resolveRequestId(req.get(REQUEST_ID_HEADER));
    const startedAt = process.hrtime.bigint();

    res.setHeader(REQUEST_ID_HEADER, requestId);
    res.locals.requestId = requestId;

    res.on('finish', () => {
        const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
        const entry = {
            requestId,
            method: req.method,
            path: req.originalUrl,
            status: res.statusCode,
            durationMs: Math.round(durationMs * 100) / 100,
        };

        if (res.statusCode >= 500) {
            logger.error(entry, 'Request failed');
        } else {
            logger.info(entry, 'Request completed');
        }
    });

    next();
};
