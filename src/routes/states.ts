import express from 'express';
import { PortalEngine } from '../engine/portal_engine';

export default function statesRoutes(engine: PortalEngine) {
    const router = express.Router();

    router.get('/', async (req, res, next) => {
        try {
            const states = await engine.listStates();
            res.json({ states, total: states.length });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
