import Ajv from 'ajv';
import { ILlmClient } from '../../domain/ports/ILlmClient';
import {
    ExtractedIntent,
    IntentConstraints,
    Orientation,
    createIntentFromKeywords,
    uniqueTerms,
} from '../../domain/entities/ExtractedIntent';
import { SlideInput, hasExplicitKeywords, slideText } from '../../domain/entities/SlideInput';
import { ExtractionError } from '../../domain/errors/PipelineErrors';
import { isolate } from '../resilience/IsolatedCall';
import { parseJsonResponse } from './OpenRouterLlmClient';
import {
    KEYWORD_EXTRACTION_PROMPT,
    KEYWORD_REFINEMENT_INPUT,
    KEYWORD_REFINEMENT_PROMPT,
    fillTemplate,
} from './Prompts';

/**
 * Shape the extraction model is asked to return.
 */
interface RawExtraction {
    skip: boolean;
    topics?: string[];
    topics_de?: string[];
    english_keywords?: string[];
    style?: string[];
    negative_keywords?: string[];
    constraints?: {
        orientation?: string | null;
        color?: string | null;
    };
}

const stringArray = { type: 'array', items: { type: 'string' } } as const;

const RAW_EXTRACTION_SCHEMA = {
    type: 'object',
    required: ['skip'],
    properties: {
        skip: { type: 'boolean' },
        topics: stringArray,
        topics_de: stringArray,
        english_keywords: stringArray,
        style: stringArray,
        negative_keywords: stringArray,
        constraints: {
            type: 'object',
            properties: {
                orientation: { type: ['string', 'null'] },
                color: { type: ['string', 'null'] },
            },
        },
    },
};

const ORIENTATIONS: readonly Orientation[] = ['landscape', 'portrait', 'square'];

export interface KeywordExtractorOptions {
    /** LLM model used for both extraction and refinement */
    model?: string;
    timeoutMs?: number;
}

/**
 * Turns slide text into a structured visual-search intent.
 *
 * Explicit keywords bypass the LLM entirely. Otherwise one call extracts the
 * detailed intent and a second one refines it to a 2-3 term search query.
 * Only transport or parse failures of the extraction call throw
 * (ExtractionError); unusable slide text yields `skip: true`.
 */
export class KeywordExtractor {
    private readonly validateRaw = new Ajv({ allErrors: true, allowUnionTypes: true }).compile<RawExtraction>(RAW_EXTRACTION_SCHEMA);
    private readonly model?: string;
    private readonly timeoutMs: number;

    constructor(
        private readonly llmClient: ILlmClient,
        options: KeywordExtractorOptions = {}
    ) {
        this.model = options.model;
        this.timeoutMs = options.timeoutMs ?? 30000;
    }

    async extract(slide: SlideInput): Promise<ExtractedIntent> {
        if (hasExplicitKeywords(slide)) {
            const intent = createIntentFromKeywords(slide.keywords ?? []);
            console.log(`[KeywordExtractor] Using explicit keywords: ${intent.searchQuery}`);
            return intent;
        }

        const text = slideText(slide);
        if (text.length === 0) {
            console.log('[KeywordExtractor] Slide has no text, skipping');
            return this.skipped();
        }

        const raw = await this.runExtraction(text);
        const keywords = uniqueTerms(raw.english_keywords ?? []);

        if (raw.skip || keywords.length === 0) {
            console.log('[KeywordExtractor] Slide content not suitable for imagery');
            return this.skipped();
        }

        const searchQuery = await this.refine(keywords);

        return Object.freeze({
            skip: false,
            keywords: Object.freeze(keywords),
            topics: Object.freeze(uniqueTerms(raw.topics ?? raw.topics_de ?? [])),
            styleTags: Object.freeze(uniqueTerms(raw.style ?? [])),
            negativeKeywords: Object.freeze(uniqueTerms(raw.negative_keywords ?? [])),
            constraints: Object.freeze(this.toConstraints(raw.constraints)),
            searchQuery,
        });
    }

    private async runExtraction(text: string): Promise<RawExtraction> {
        const response = await isolate(
            'keyword extraction',
            (signal) => this.llmClient.chatCompletion(text, KEYWORD_EXTRACTION_PROMPT, {
                model: this.model,
                jsonMode: true,
                temperature: 0.2,
                signal,
            }),
            this.timeoutMs
        );
        if (!response.ok) {
            throw new ExtractionError(`Keyword extraction failed: ${response.error.message}`, response.error);
        }

        let parsed: unknown;
        try {
            parsed = parseJsonResponse(response.value);
        } catch (error) {
            throw new ExtractionError('Keyword extraction returned invalid JSON', error);
        }

        if (!this.validateRaw(parsed)) {
            const details = (this.validateRaw.errors ?? [])
                .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
                .join('; ');
            throw new ExtractionError(`Keyword extraction returned an unexpected shape: ${details}`);
        }
        return parsed;
    }

    /**
     * Reduces the keyword list to a short query. Falls back to the first three
     * keywords when the refinement call fails or answers with nothing.
     */
    private async refine(keywords: string[]): Promise<string> {
        const fallback = keywords.slice(0, 3).join(', ');
        const response = await isolate(
            'keyword refinement',
            (signal) => this.llmClient.chatCompletion(
                fillTemplate(KEYWORD_REFINEMENT_INPUT, { keywords: keywords.join(', ') }),
                KEYWORD_REFINEMENT_PROMPT,
                { model: this.model, temperature: 0.2, signal }
            ),
            this.timeoutMs
        );
        if (!response.ok) {
            return fallback;
        }

        const refined = response.value.replace(/^["'\s]+|["'\s.]+$/g, '').trim();
        return refined.length > 0 ? refined : fallback;
    }

    private toConstraints(raw: RawExtraction['constraints']): IntentConstraints {
        const constraints: IntentConstraints = {};
        const orientation = ORIENTATIONS.find((o) => o === raw?.orientation);
        if (orientation) constraints.orientation = orientation;
        if (raw?.color) constraints.color = raw.color;
        return constraints;
    }

    private skipped(): ExtractedIntent {
        return Object.freeze({
            skip: true,
            keywords: Object.freeze([]),
            topics: Object.freeze([]),
            styleTags: Object.freeze([]),
            negativeKeywords: Object.freeze([]),
            constraints: Object.freeze({}),
            searchQuery: '',
        });
    }
}
