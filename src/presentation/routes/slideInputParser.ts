import { parseAiModelSelector } from '../../domain/entities/AiModel';
import {
    ColorHints,
    IMAGE_MODES,
    ImageMode,
    SLIDE_STYLES,
    SlideInput,
    SlideStyle,
    isImageMode,
    isSlideStyle,
} from '../../domain/entities/SlideInput';
import { BadRequestError } from '../middleware/errorHandler';

type Body = Record<string, unknown>;

function isRecord(value: unknown): value is Body {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, field: string): string | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
        throw new BadRequestError(`${field} must be a string`);
    }
    return value;
}

/**
 * Bullets are plain strings or `{ bullet, sub? }` objects; sub-bullets are
 * flattened after their parent.
 */
function parseBullets(value: unknown): string[] {
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) {
        throw new BadRequestError('bullets must be an array');
    }

    const bullets: string[] = [];
    for (const item of value) {
        if (typeof item === 'string') {
            bullets.push(item);
        } else if (isRecord(item) && typeof item.bullet === 'string') {
            bullets.push(item.bullet);
            const sub = item.sub;
            if (Array.isArray(sub)) {
                bullets.push(...sub.filter((s): s is string => typeof s === 'string'));
            } else if (typeof sub === 'string') {
                bullets.push(sub);
            }
        } else {
            throw new BadRequestError('bullets must contain strings or { bullet, sub } objects');
        }
    }
    return bullets;
}

function parseKeywords(value: unknown): string[] | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'string') {
        return splitList(value);
    }
    if (!Array.isArray(value) || !value.every((k): k is string => typeof k === 'string')) {
        throw new BadRequestError('keywords must be an array of strings');
    }
    return value.map((k) => k.trim()).filter((k) => k.length > 0);
}

function parseStyle(value: unknown): SlideStyle | undefined {
    const style = optionalString(value, 'style');
    if (style === undefined || style === '') return undefined;
    if (!isSlideStyle(style)) {
        throw new BadRequestError(`style must be one of: ${SLIDE_STYLES.join(', ')}`);
    }
    return style;
}

function parseImageMode(value: unknown): ImageMode | undefined {
    const mode = optionalString(value, 'image_mode');
    if (mode === undefined || mode === '') return undefined;
    if (!isImageMode(mode)) {
        throw new BadRequestError(`image_mode must be one of: ${IMAGE_MODES.join(', ')}`);
    }
    return mode;
}

function parseAiModel(value: unknown): string | undefined {
    const model = optionalString(value, 'ai_model');
    if (model === undefined) return undefined;
    if (parseAiModelSelector(model) === undefined) {
        throw new BadRequestError(`Unknown ai_model: ${model}`);
    }
    return model;
}

function parseColors(primary: unknown, secondary: unknown): ColorHints | undefined {
    const colors: ColorHints = {
        primary: optionalString(primary, 'colors.primary'),
        secondary: optionalString(secondary, 'colors.secondary'),
    };
    return colors.primary || colors.secondary ? colors : undefined;
}

function buildSlide(fields: {
    title: unknown;
    bullets: string[];
    keywords?: string[];
    style: unknown;
    imageMode: unknown;
    aiModel: unknown;
    colors?: ColorHints;
}): SlideInput {
    const title = optionalString(fields.title, 'title') ?? '';
    const keywords = fields.keywords;

    if (title.trim().length === 0 && (!keywords || keywords.length === 0)) {
        throw new BadRequestError('title is required when no keywords are given');
    }

    return Object.freeze({
        title,
        bullets: Object.freeze(fields.bullets),
        ...(keywords && keywords.length > 0 ? { keywords: Object.freeze(keywords) } : {}),
        style: parseStyle(fields.style),
        imageMode: parseImageMode(fields.imageMode),
        aiModel: parseAiModel(fields.aiModel),
        colors: fields.colors,
    });
}

export function splitList(value: string): string[] {
    return value.split(',').map((part) => part.trim()).filter((part) => part.length > 0);
}

/**
 * Parses the JSON body of POST /generate-image and POST /extract-keywords.
 */
export function parseSlideBody(body: unknown): SlideInput {
    if (!isRecord(body)) {
        throw new BadRequestError('Request body must be a JSON object');
    }

    let colors: ColorHints | undefined;
    if (body.colors !== undefined && body.colors !== null) {
        if (!isRecord(body.colors)) {
            throw new BadRequestError('colors must be an object');
        }
        colors = parseColors(body.colors.primary, body.colors.secondary);
    }

    return buildSlide({
        title: body.title,
        bullets: parseBullets(body.bullets),
        keywords: parseKeywords(body.keywords ?? body.unsplashSearchTerms),
        style: body.style,
        imageMode: body.image_mode,
        aiModel: body.ai_model,
        colors,
    });
}

/**
 * Parses the query of GET /generate-image-simple. Lists are comma-separated.
 */
export function parseSlideQuery(query: Record<string, unknown>): SlideInput {
    const bullets = optionalString(query.bullets, 'bullets');
    const keywords = optionalString(query.keywords, 'keywords');

    return buildSlide({
        title: query.title,
        bullets: bullets ? splitList(bullets) : [],
        keywords: keywords ? splitList(keywords) : undefined,
        style: query.style,
        imageMode: query.image_mode,
        aiModel: query.ai_model,
        colors: parseColors(query.primary_color, query.secondary_color),
    });
}
