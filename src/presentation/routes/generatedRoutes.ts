import { Router, Request, Response } from 'express';
import { GeneratedImageCache } from '../../infrastructure/cache/GeneratedImageCache';
import { asyncHandler } from '../middleware/errorHandler';

/**
 * Serves cached generated images by id.
 */
export function createGeneratedImageRoutes(cache: GeneratedImageCache): Router {
    const router = Router();

    /**
     * GET /generated/:id
     *
     * Returns the stored bytes with their media type; 404 for unknown or expired ids.
     */
    router.get(
        '/generated/:id',
        asyncHandler(async (req: Request, res: Response) => {
            const entry = cache.retrieve(req.params.id);
            res.type(entry.mediaType);
            res.set('Cache-Control', 'public, max-age=3600');
            res.send(entry.bytes);
        })
    );

    return router;
}
