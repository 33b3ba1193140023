import axios from 'axios';
import { ProviderError } from '../../domain/errors/PipelineErrors';
import { IPresentationFitClient } from '../../domain/ports/IPresentationFitClient';
import { describeHttpError } from '../resilience/HttpErrors';

interface ScoreResponse {
    presentation_score?: number;
}

/**
 * Client for the external presentation-fit scoring service (POST /score).
 */
export class PresentationFitClient implements IPresentationFitClient {
    private readonly serviceUrl: string;

    constructor(serviceUrl: string) {
        if (!serviceUrl) {
            throw new Error('Scoring service URL is required');
        }
        this.serviceUrl = serviceUrl.replace(/\/+$/, '');
    }

    async scoreFit(imageUrl: string, topic: string, signal?: AbortSignal): Promise<number> {
        try {
            const response = await axios.post<ScoreResponse>(
                `${this.serviceUrl}/score`,
                { image_url: imageUrl, topic },
                { headers: { 'Content-Type': 'application/json' }, signal }
            );
            const score = response.data?.presentation_score;
            if (typeof score !== 'number') {
                throw new Error('response contained no presentation_score');
            }
            return score;
        } catch (error) {
            const { status, message } = describeHttpError(error);
            throw new ProviderError('presentation-fit', message, status);
        }
    }
}
