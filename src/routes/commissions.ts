import express from 'express';
import { PortalEngine } from '../engine/portal_engine';

export default function commissionsRoutes(engine: PortalEngine) {
    const router = express.Router();

    router.get('/:stateId', async (req, res, next) => {
        try {
            const { stateId } = req.params;
            const commissions = await engine.listCommissions(stateId);
            res.json({ commissions, total: commissions.length, stateId });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
