import { Router, Request, Response } from 'express';
import { ImageOrchestrator } from '../../application/ImageOrchestrator';
import { KeywordExtractor } from '../../infrastructure/llm/KeywordExtractor';
import { asyncHandler } from '../middleware/errorHandler';
import { parseSlideBody, parseSlideQuery } from './slideInputParser';

/**
 * Creates the image selection routes with dependency injection.
 */
export function createImageRoutes(
    orchestrator: Pick<ImageOrchestrator, 'processSlide'>,
    keywordExtractor: Pick<KeywordExtractor, 'extract'>
): Router {
    const router = Router();

    /**
     * POST /generate-image
     *
     * Finds or generates one image for a slide. Pipeline failures come back
     * as `source: "none"` or `source: "failed"` with status 200.
     */
    router.post(
        '/generate-image',
        asyncHandler(async (req: Request, res: Response) => {
            const slide = parseSlideBody(req.body);
            const result = await orchestrator.processSlide(slide);
            res.json(result);
        })
    );

    /**
     * GET /generate-image-simple
     *
     * Same as POST /generate-image, driven by query parameters.
     */
    router.get(
        '/generate-image-simple',
        asyncHandler(async (req: Request, res: Response) => {
            const slide = parseSlideQuery(req.query);
            const result = await orchestrator.processSlide(slide);
            res.json(result);
        })
    );

    /**
     * POST /extract-keywords
     *
     * Debug entry point: returns the extracted intent and the refined search string.
     */
    router.post(
        '/extract-keywords',
        asyncHandler(async (req: Request, res: Response) => {
            const slide = parseSlideBody(req.body);
            const intent = await keywordExtractor.extract(slide);
            res.json({
                detailed: intent,
                refined: intent.searchQuery,
            });
        })
    );

    return router;
}
