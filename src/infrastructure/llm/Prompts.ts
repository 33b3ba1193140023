import { SlideStyle } from '../../domain/entities/SlideInput';

export const KEYWORD_EXTRACTION_PROMPT = `You extract stock-photo search terms from presentation slide text.

RULES:
- No brands, personal names, confidential data, or numbers/IDs without visual meaning.
- Produce generic, visual English terms (e.g. "teamwork", "data analytics").
- Focus on subject, scene, object, mood and setting.
- If the text is unusable for imagery (agenda, table of contents, pure number mix), return "skip": true and empty lists.

Respond with ONLY a JSON object with these keys, in this order:
{
  "skip": boolean,
  "topics": string[],            // 3-6 short topic labels in the slide's language
  "english_keywords": string[],  // 10-15 search-optimized terms, English, lower case
  "style": string[],             // 2-4 (e.g. "minimal", "isometric", "aerial")
  "negative_keywords": string[], // 5-10 (e.g. "text", "watermark", "logo", "diagram", "screenshot")
  "constraints": { "orientation": "landscape" | "portrait" | "square", "color": string | null }
}
All arrays must be free of duplicates and filler words.`;

export const KEYWORD_REFINEMENT_PROMPT = `Reduce the following image search keywords to the 2-3 most important ones, in English.

Context: the keywords are used to find a fitting image for a presentation slide.

Answer with 2-3 comma-separated keywords only, e.g. "dog, meadow". Nothing else.`;

export const KEYWORD_REFINEMENT_INPUT = `All keywords found: {{keywords}}`;

const CONTENT_PROMPT_CORE = `You turn a presentation slide into a concise English "content prompt" for an image generation model.

From the slide topic, keywords and text, describe in 1-3 sentences what should be visible in an image that supports the main idea of the slide.
- Pick one simple, didactic interpretation: a small scene with 1-3 people or key objects, a simple process, or a symbolic metaphor.
- Describe only the semantic content: who or what is visible and what they are doing.
- The image must be suitable for a professional slide deck; nothing that only fits a private context.
- Always write natural English, even when the input is in another language.
- Output exactly one paragraph of plain prose. No lists, no JSON, no explanations.`;

const NO_STYLE_RULES = `
- Do not mention any visual style or medium (flat, vector, line art, sketch, photorealistic, 3D, watercolor).
- Do not mention colours, lighting, aspect ratio, resolution or composition terms.
- Do not include negative instructions such as "no text" or "no logo".`;

/**
 * System prompts for building the content description, per scenario.
 * Style, colour and negative blocks are appended afterwards, so the
 * illustration scenarios ask for style-free content.
 */
export const CONTENT_PROMPTS: Record<SlideStyle, string> = {
    photorealistic: `${CONTENT_PROMPT_CORE}
- Prefer realistic scenes that could be photographed.`,
    flat_illustration: `${CONTENT_PROMPT_CORE}${NO_STYLE_RULES}`,
    fine_line: `${CONTENT_PROMPT_CORE}${NO_STYLE_RULES}`,
};

export const CONTENT_PROMPT_INPUT = `Topic: {{topic}}
Keywords: {{keywords}}
Slide text: {{text}}`;

/**
 * Style blocks appended to the content description.
 */
export const STYLE_BLOCKS: Record<SlideStyle, string> = {
    photorealistic: 'Style: photorealistic, natural lighting, professional stock photography, clean composition.',
    flat_illustration: 'Style: flat vector illustration, simple geometric shapes, limited palette, plain light background, generous whitespace.',
    fine_line: 'Style: minimalist fine line drawing, thin uniform strokes, mostly monochrome, plain white background.',
};

export const NO_TEXT_INSTRUCTION = 'No text in the image.';

/**
 * Fills {{placeholders}} in a prompt template.
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
    return template.replace(/{{(\w+)}}/g, (match: string, key: string) => values[key] ?? match);
}
