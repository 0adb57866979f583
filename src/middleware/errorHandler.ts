import { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { describeError } from '../interfaces/outcome';
import { logger } from '../logger';

/** Forward rejected handler promises to the error middleware. */
export function asyncRoute(
    handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        handler(req, res).catch(next);
    };
}

function isMalformedJson(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

/** The 4xx status express or body-parser attached to the error, if any. */
export function clientErrorStatus(err: unknown): number | undefined {
    if (typeof err !== 'object' || err === null) return undefined;

    const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
    if (typeof status !== 'number' || status < 400 || status > 499) return undefined;

    return status;
}

export const notFoundHandler: RequestHandler = (_req, res) => {
    res.status(404).json({ error: 'Not found' });
};

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
    if (res.headersSent) {
        next(err);
        return;
    }

    if (isMalformedJson(err)) {
        res.status(400).json({ error: 'Malformed JSON body' });
        return;
    }

    // Oversized bodies, bad charsets, undecodable path params: the client's fault
    const status = clientErrorStatus(err);
    if (status !== undefined) {
        logger.warn({ status, requestId: res.locals.requestId, path: req.originalUrl }, describeError(err));
        res.status(status).json({ error: describeError(err) });
        return;
    }

    logger.error({ err, requestId: res.locals.requestId, path: req.originalUrl }, 'Unhandled request error');
    res.status(500).json({ error: 'Internal server error' });
};
