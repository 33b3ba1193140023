import axios from 'axios';
import FormData from 'form-data';
import { GeneratedImage } from '../../domain/entities/GenerationRequest';
import { ProviderError, SafetyCheckUnavailable } from '../../domain/errors/PipelineErrors';
import { IImageAnalysisClient, ImageAnalysis } from '../../domain/ports/IImageAnalysisClient';
import { describeHttpError } from '../resilience/HttpErrors';

interface SightengineNudity {
    none?: number;
    suggestive_classes?: {
        cleavage_categories?: { none?: number };
    };
}

interface SightengineResponse {
    status?: 'success' | 'failure';
    error?: { type?: string; code?: number; message?: string };
    quality?: { score?: number };
    nudity?: SightengineNudity;
}

/** SightEngine reports exhausted usage limits with this error code. */
const QUOTA_ERROR_CODE = 32;

/**
 * SightEngine client for quality and nudity scoring.
 * Stock candidates are scored by URL; generated images by URL or multipart upload.
 */
export class SightengineClient implements IImageAnalysisClient {
    private readonly apiUser: string;
    private readonly apiSecret: string;
    private readonly baseUrl: string;

    constructor(apiUser: string, apiSecret: string, baseUrl: string = 'https://api.sightengine.com/1.0') {
        if (!apiUser || !apiSecret) {
            throw new Error('SightEngine API user and secret are required');
        }
        this.apiUser = apiUser;
        this.apiSecret = apiSecret;
        this.baseUrl = baseUrl;
    }

    async analyze(imageUrl: string, signal?: AbortSignal): Promise<ImageAnalysis> {
        let data: SightengineResponse;
        try {
            data = await this.checkUrl(imageUrl, 'quality,nudity-2.1', signal);
        } catch (error) {
            const { status, message } = describeHttpError(error);
            throw new ProviderError('sightengine', `analysis failed ${message}`, status);
        }

        if (data.status === 'failure') {
            throw new ProviderError('sightengine', data.error?.message ?? 'analysis failed');
        }
        const quality = data.quality?.score;
        if (typeof quality !== 'number') {
            throw new ProviderError('sightengine', 'response contained no quality score');
        }

        return {
            quality,
            safety: safetyScore(data.nudity),
        };
    }

    async checkSafety(image: GeneratedImage, signal?: AbortSignal): Promise<number> {
        let data: SightengineResponse;
        try {
            data = image.kind === 'url'
                ? await this.checkUrl(image.url, 'nudity-2.1', signal)
                : await this.checkUpload(image.bytes, image.mediaType, signal);
        } catch (error) {
            throw new SafetyCheckUnavailable(`Safety check failed: ${describeHttpError(error).message}`);
        }

        if (data.status === 'failure') {
            const quota = data.error?.code === QUOTA_ERROR_CODE
                || /quota|limit/i.test(data.error?.message ?? '');
            throw new SafetyCheckUnavailable(
                quota ? 'Safety check quota exhausted' : `Safety check failed: ${data.error?.message ?? 'unknown error'}`
            );
        }

        return safetyScore(data.nudity);
    }

    private async checkUrl(url: string, models: string, signal?: AbortSignal): Promise<SightengineResponse> {
        const response = await axios.get<SightengineResponse>(`${this.baseUrl}/check.json`, {
            params: {
                url,
                models,
                api_user: this.apiUser,
                api_secret: this.apiSecret,
            },
            signal,
        });
        return response.data;
    }

    private async checkUpload(bytes: Buffer, mediaType: string, signal?: AbortSignal): Promise<SightengineResponse> {
        const form = new FormData();
        form.append('media', bytes, { filename: 'generated', contentType: mediaType });
        form.append('models', 'nudity-2.1');
        form.append('api_user', this.apiUser);
        form.append('api_secret', this.apiSecret);

        const response = await axios.post<SightengineResponse>(`${this.baseUrl}/check.json`, form, {
            headers: form.getHeaders(),
            signal,
        });
        return response.data;
    }
}

/**
 * Safe score: `nudity.none`, else the cleavage "none" class, else 1.
 */
export function safetyScore(nudity: SightengineNudity | undefined): number {
    if (typeof nudity?.none === 'number') {
        return nudity.none;
    }
    const cleavage = nudity?.suggestive_classes?.cleavage_categories?.none;
    return typeof cleavage === 'number' ? cleavage : 1;
}
