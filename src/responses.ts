import { z } from 'zod';

import { ResponseParseError } from './errors.js';
import type { RatingBounds, RatingResult, SummaryResult, SummarySection } from './types.js';

export const summaryResultSchema = z.object({
    kind: z.literal('summary'),
    sections: z.array(z.object({ focus: z.string(), points: z.array(z.string()), missing: z.boolean() })),
});

export const ratingResultSchema = z.object({
    kind: z.literal('rating'),
    rating: z.number(),
    rationale: z.string().nullable(),
});

const pointsSchema = z.union([z.array(z.string()), z.string()]);
const sectionsResponseSchema = z.object({
    sections: z.array(z.object({ focus: z.string(), points: pointsSchema })),
});
const mappingResponseSchema = z.record(pointsSchema);

const ratingResponseSchema = z.object({
    rating: z.number().finite().optional(),
    AI_rating: z.number().finite().optional(),
    rationale: z.string().optional(),
});

const BULLET = /^\s*(?:[-*•]|\d+[.)])\s+/;

const stripFences = (text: string): string => {
    const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
    return (fenced ? fenced[1] : text).trim();
};

const tryParseJson = (text: string): unknown => {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
};

/** Lower-cases, drops list numbering, markdown and punctuation so "**2. Transportation:**" matches "transportation". */
export const normalizeFocus = (label: string): string =>
    label
        .toLowerCase()
        .replace(/[*_#`]/g, '')
        .trim()
        .replace(/^\d+[.)]?\s*/, '')
        .replace(/[^\p{L}\p{N}\s]/gu, ' ')
        .replace(/\s+/g, ' ')
        .trim();

const toPoints = (value: string | string[]): string[] =>
    (Array.isArray(value) ? value : value.split('\n'))
        .map((point) => point.replace(BULLET, '').trim())
        .filter((point) => point.length > 0);

/** Reads "Heading" lines followed by bullet lines, for models that ignore the JSON instruction. */
const parseMarkdownSections = (text: string, focusAreas: readonly string[]): Map<string, string[]> => {
    const wanted = new Set(focusAreas.map(normalizeFocus));
    const sections = new Map<string, string[]>();
    let current: string | null = null;

    for (const line of text.split('\n')) {
        if (!line.trim()) continue;
        const heading = normalizeFocus(line.replace(/:.*$/, ''));
        if (wanted.has(heading)) {
            current = heading;
            const inline = line.includes(':') ? line.slice(line.indexOf(':') + 1).replace(/^[\s*_]+/, '').trim() : '';
            sections.set(current, inline ? [inline] : []);
            continue;
        }
        if (current !== null && BULLET.test(line)) {
            sections.get(current)?.push(line.replace(BULLET, '').trim());
        }
    }
    return sections;
};

const collectSections = (text: string, focusAreas: readonly string[]): Map<string, string[]> => {
    const json = tryParseJson(stripFences(text));

    const asSections = sectionsResponseSchema.safeParse(json);
    if (asSections.success) {
        return new Map(asSections.data.sections.map((section) => [normalizeFocus(section.focus), toPoints(section.points)]));
    }
    const asMapping = mappingResponseSchema.safeParse(json);
    if (asMapping.success) {
        return new Map(Object.entries(asMapping.data).map(([focus, points]) => [normalizeFocus(focus), toPoints(points)]));
    }
    return parseMarkdownSections(text, focusAreas);
};

/**
 * Builds one section per configured focus area, in configured order. Areas the model left out are
 * kept with no points and `missing: true`; a response that matches none of them is a parse error.
 */
export const parseSummary = (text: string, focusAreas: readonly string[]): SummaryResult => {
    const found = collectSections(text, focusAreas);
    const sections = focusAreas.map((focus): SummarySection => {
        const points = found.get(normalizeFocus(focus));
        return { focus, points: points ?? [], missing: points === undefined };
    });

    if (sections.every((section) => section.missing)) {
        throw new ResponseParseError('Summary response did not address any configured focus area');
    }
    return { kind: 'summary', sections };
};

/**
 * Reads the rating from a function-call payload or JSON text. A missing field or a value outside
 * `bounds` is a parse error; values are never clamped.
 */
export const parseRating = (text: string, bounds: RatingBounds): RatingResult => {
    const body = stripFences(text);
    const json = tryParseJson(body) ?? tryParseJson(/\{[^{}]*\}/.exec(body)?.[0] ?? '');
    const parsed = ratingResponseSchema.safeParse(json);
    if (!parsed.success) {
        throw new ResponseParseError(`Rating response is not a valid rating object: ${body.slice(0, 200)}`);
    }

    const rating = parsed.data.rating ?? parsed.data.AI_rating;
    if (rating === undefined) {
        throw new ResponseParseError('Rating response is missing the required "rating" field');
    }
    if (rating < bounds.min || rating > bounds.max) {
        throw new ResponseParseError(`Rating ${rating} is outside the allowed range ${bounds.min}-${bounds.max}`);
    }

    const rationale = parsed.data.rationale?.trim();
    return { kind: 'rating', rating, rationale: rationale ? rationale : null };
};
