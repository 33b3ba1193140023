import axios from 'axios';
import { GeneratedImage, GenerationRequest, toGeneratedImage } from '../../domain/entities/GenerationRequest';
import { GenerationFailure } from '../../domain/errors/PipelineErrors';
import { IImageGenerationBackend } from '../../domain/ports/IImageGenerationBackend';
import { describeHttpError } from '../resilience/HttpErrors';

interface FluxSubmitResponse {
    id?: string;
    polling_url?: string;
}

interface FluxPollResponse {
    status?: string;
    result?: { sample?: string } | null;
}

const SUCCESS_STATUSES = ['ready', 'succeeded'];
const FAILURE_STATUSES = ['error', 'failed', 'content moderated', 'request moderated'];

export interface FluxPollOptions {
    initialDelayMs?: number;
    intervalMs?: number;
    maxAttempts?: number;
    /** Growth factor of the poll interval */
    backoffMultiplier?: number;
    /** Upper bound of a single wait between polls */
    maxIntervalMs?: number;
}

const DEFAULT_POLL: Required<FluxPollOptions> = {
    initialDelayMs: 5000,
    intervalMs: 2000,
    maxAttempts: 15,
    backoffMultiplier: 1.5,
    maxIntervalMs: 10000,
};

function resolvePoll(options: FluxPollOptions): Required<FluxPollOptions> {
    return {
        initialDelayMs: options.initialDelayMs ?? DEFAULT_POLL.initialDelayMs,
        intervalMs: options.intervalMs ?? DEFAULT_POLL.intervalMs,
        maxAttempts: options.maxAttempts ?? DEFAULT_POLL.maxAttempts,
        backoffMultiplier: options.backoffMultiplier ?? DEFAULT_POLL.backoffMultiplier,
        maxIntervalMs: options.maxIntervalMs ?? DEFAULT_POLL.maxIntervalMs,
    };
}

function nextInterval(interval: number, poll: Required<FluxPollOptions>): number {
    return Math.min(Math.round(interval * poll.backoffMultiplier), poll.maxIntervalMs);
}

/**
 * Total time spent waiting by a poll run that never sees a final status.
 */
export function pollScheduleMs(options: FluxPollOptions = {}): number {
    const poll = resolvePoll(options);
    let total = poll.initialDelayMs;
    let interval = Math.min(poll.intervalMs, poll.maxIntervalMs);
    for (let attempt = 1; attempt < poll.maxAttempts; attempt++) {
        total += interval;
        interval = nextInterval(interval, poll);
    }
    return total;
}

/**
 * Black Forest Labs FLUX backend (submit/poll).
 * Submits a job, waits, then polls `polling_url` with a growing interval.
 */
export class FluxImageBackend implements IImageGenerationBackend {
    readonly model = 'flux' as const;
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly modelPath: string;
    private readonly poll: Required<FluxPollOptions>;

    constructor(
        apiKey: string,
        baseUrl: string = 'https://api.bfl.ai/v1',
        modelPath: string = 'flux-2-pro',
        poll: FluxPollOptions = {}
    ) {
        if (!apiKey) {
            throw new Error('Flux API key is required');
        }
        this.apiKey = apiKey;
        this.baseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
        this.modelPath = modelPath;
        this.poll = resolvePoll(poll);
    }

    async generate(request: GenerationRequest, signal?: AbortSignal): Promise<GeneratedImage> {
        const pollingUrl = await this.submit(request, signal);
        console.log('[Flux] Job submitted, polling for result...');

        const sample = await this.pollForCompletion(pollingUrl, signal);
        return toGeneratedImage(sample, 'image/jpeg');
    }

    private async submit(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
        const prompt = request.negativePrompt
            ? `${request.prompt} Avoid: ${request.negativePrompt}.`
            : request.prompt;

        try {
            const response = await axios.post<FluxSubmitResponse>(
                `${this.baseUrl}/${this.modelPath}`,
                {
                    prompt,
                    width: request.width,
                    height: request.height,
                    safety_tolerance: 2,
                    output_format: 'jpeg',
                },
                {
                    headers: {
                        'x-key': this.apiKey,
                        'Content-Type': 'application/json',
                    },
                    signal,
                }
            );

            const pollingUrl = response.data?.polling_url;
            if (!pollingUrl) {
                throw new GenerationFailure('Flux submit response contained no polling_url', this.model);
            }
            return pollingUrl;
        } catch (error) {
            if (error instanceof GenerationFailure) throw error;
            throw new GenerationFailure(`Flux submit failed ${describeHttpError(error).message}`, this.model);
        }
    }

    private async pollForCompletion(pollingUrl: string, signal?: AbortSignal): Promise<string> {
        const { maxAttempts } = this.poll;
        await this.wait(this.poll.initialDelayMs, signal);
        let interval = Math.min(this.poll.intervalMs, this.poll.maxIntervalMs);

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            const status = await this.fetchStatus(pollingUrl, attempt, signal);

            if (status) {
                const state = (status.status ?? '').toLowerCase();

                if (SUCCESS_STATUSES.includes(state)) {
                    const sample = status.result?.sample;
                    if (!sample) {
                        throw new GenerationFailure('Flux job finished without a sample', this.model);
                    }
                    console.log(`[Flux] Generation complete after ${attempt} poll(s)`);
                    return sample;
                }

                if (FAILURE_STATUSES.includes(state)) {
                    throw new GenerationFailure(`Flux generation failed: ${status.status}`, this.model);
                }

                if (attempt % 3 === 0) {
                    console.log(`[Flux] Status: ${status.status ?? 'Pending'} (Attempt ${attempt}/${maxAttempts})...`);
                }
            }

            if (attempt < maxAttempts) {
                await this.wait(interval, signal);
                interval = nextInterval(interval, this.poll);
            }
        }

        throw new GenerationFailure(`Flux generation not ready after ${maxAttempts} polls`, this.model);
    }

    /**
     * One poll. Transport errors count as an attempt and polling continues.
     */
    private async fetchStatus(pollingUrl: string, attempt: number, signal?: AbortSignal): Promise<FluxPollResponse | null> {
        try {
            const response = await axios.get<FluxPollResponse>(pollingUrl, {
                headers: { 'x-key': this.apiKey },
                signal,
            });
            return response.data ?? {};
        } catch (error) {
            if (axios.isAxiosError(error) && !axios.isCancel(error)) {
                console.warn(`[Flux] Polling warning (Attempt ${attempt}/${this.poll.maxAttempts}): ${describeHttpError(error).message}`);
                return null;
            }
            throw error;
        }
    }

    /**
     * Sleeps between polls; an abort ends the wait immediately.
     */
    private wait(ms: number, signal?: AbortSignal): Promise<void> {
        return new Promise((resolve, reject) => {
            const cancelled = () => new GenerationFailure('Flux generation cancelled', this.model);
            if (signal?.aborted) {
                reject(cancelled());
                return;
            }
            const onAbort = () => {
                clearTimeout(timer);
                reject(cancelled());
            };
            const timer = setTimeout(() => {
                signal?.removeEventListener('abort', onAbort);
                resolve();
            }, ms);
            signal?.addEventListener('abort', onAbort, { once: true });
        });
    }
}
