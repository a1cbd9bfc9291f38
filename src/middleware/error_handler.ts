import { Request, Response, NextFunction } from 'express';
import { PortalError, errorMessage } from '../engine/errors';
import { isRecord } from '../types/portal_types';
import { createLogger } from '../utils/logger';

const log = createLogger('API');

export const notFound = (req: Request, res: Response) => {
    res.status(404).json({ error: `No route for ${req.method} ${req.path}`, code: 'ROUTE_NOT_FOUND' });
};

function isBodyParseError(error: unknown): boolean {
    return isRecord(error) && error.type === 'entity.parse.failed';
}

/**
 * Terminal handler: PortalErrors answer with their own status and body,
 * malformed JSON with 400, anything else with 500.
 */
export const errorHandler = (error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const requestId: unknown = res.locals.requestId;
    const tag = typeof requestId === 'string' ? ` [${requestId}]` : '';

    if (error instanceof PortalError) {
        const line = `${req.method} ${req.originalUrl}${tag} -> ${error.status} ${error.code}: ${error.message}`;
        if (error.status >= 500) log.error(line); else log.warn(line);
        return res.status(error.status).json({ ...error.toJSON(), requestId });
    }

    if (isBodyParseError(error)) {
        return res.status(400).json({ error: 'Malformed JSON body', code: 'VALIDATION_FAILED', requestId });
    }

    log.error(`${req.method} ${req.originalUrl}${tag} -> 500: ${errorMessage(error)}`, error);
    return res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR', requestId });
};
