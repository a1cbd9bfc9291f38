import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

const INCOMING_ID = /^[A-Za-z0-9._-]{1,64}$/;

/** Echoes a sane incoming X-Request-Id, or issues a fresh one. */
export const requestId = (req: Request, res: Response, next: NextFunction) => {
    const incoming = req.get('X-Request-Id');
    const id = incoming && INCOMING_ID.test(incoming) ? incoming : uuidv4();

    res.locals.requestId = id;
    res.setHeader('X-Request-Id', id);
    next();
};
