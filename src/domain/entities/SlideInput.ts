/**
 * SlideInput Domain Entity
 *
 * Describes one presentation slide that needs an image.
 * Immutable for the duration of a request.
 */

/**
 * How the pipeline may source the image.
 * - stock_only: never generate
 * - ai_only: never search stock providers
 * - auto: stock first, generation as fallback
 */
export type ImageMode = 'stock_only' | 'ai_only' | 'auto';

export const IMAGE_MODES: readonly ImageMode[] = ['stock_only', 'ai_only', 'auto'];

/**
 * Visual scenario of the slide. Illustration styles force AI generation.
 */
export type SlideStyle = 'photorealistic' | 'flat_illustration' | 'fine_line';

export const SLIDE_STYLES: readonly SlideStyle[] = ['photorealistic', 'flat_illustration', 'fine_line'];

export const ILLUSTRATION_STYLES: readonly SlideStyle[] = ['flat_illustration', 'fine_line'];

export interface ColorHints {
    primary?: string;
    secondary?: string;
}

export interface SlideInput {
    /** May be empty when explicit keywords are given */
    readonly title: string;

    /** Bullet texts in slide order */
    readonly bullets: readonly string[];

    /** Explicit search keywords; bypasses extraction */
    readonly keywords?: readonly string[];

    readonly style?: SlideStyle;

    /** Defaults to auto */
    readonly imageMode?: ImageMode;

    /** Requested AI model selector ('auto' or a model identifier) */
    readonly aiModel?: string;

    readonly colors?: ColorHints;
}

export function isImageMode(value: unknown): value is ImageMode {
    return typeof value === 'string' && (IMAGE_MODES as readonly string[]).includes(value);
}

export function isSlideStyle(value: unknown): value is SlideStyle {
    return typeof value === 'string' && (SLIDE_STYLES as readonly string[]).includes(value);
}

export function isIllustrationStyle(style: SlideStyle | undefined): boolean {
    return style !== undefined && ILLUSTRATION_STYLES.includes(style);
}

/**
 * True when the slide carries at least one usable explicit keyword.
 */
export function hasExplicitKeywords(slide: SlideInput): boolean {
    return (slide.keywords ?? []).some((k) => k.length > 0);
}

/**
 * Joins title and bullets into the text sent to keyword extraction.
 */
export function slideText(slide: SlideInput): string {
    return [slide.title, ...slide.bullets]
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
        .join(' ');
}
