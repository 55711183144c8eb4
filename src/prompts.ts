import { MAX_FOCUS_AREAS, STRICT_RATING_INSTRUCTION, STRICT_SUMMARY_INSTRUCTION } from './constants.js';
import { ConfigInvalidError } from './errors.js';
import type { FunctionSchema, LlmRequest } from './llm/client.js';
import { contentVersion } from './review-cache.js';
import type { AnalysisConfig, PromptTemplate, RatingBounds } from './types.js';

const PLACEHOLDER = /\{\{\s*([a-z0-9_]+)\s*\}\}/gi;

export const RATING_FUNCTION_NAME = 'rate_listing';

export const templateVariables = (focusAreas: readonly string[], bounds: RatingBounds): Record<string, string> => {
    const variables: Record<string, string> = {
        focus_list: focusAreas.map((focus, i) => `${i + 1}. ${focus}`).join('\n'),
        min_rating: String(bounds.min),
        max_rating: String(bounds.max),
    };
    focusAreas.forEach((focus, i) => {
        variables[`focus_${i + 1}`] = focus;
    });
    return variables;
};

/** Lists placeholders in `text` that `variables` cannot fill. */
export const unresolvedPlaceholders = (text: string, variables: Record<string, string>): string[] => {
    const missing = new Set<string>();
    for (const match of text.matchAll(PLACEHOLDER)) {
        const name = match[1].toLowerCase();
        if (!(name in variables)) missing.add(name);
    }
    return [...missing];
};

export const renderTemplate = (text: string, variables: Record<string, string>): string => {
    const missing = unresolvedPlaceholders(text, variables);
    if (missing.length > 0) {
        throw new ConfigInvalidError(missing.map((name) => `template placeholder "{{ ${name} }}" has no value`));
    }
    return text.replace(PLACEHOLDER, (_, name: string) => variables[name.toLowerCase()]);
};

/** Configuration problems in the templates, described for `ConfigInvalidError`. */
export const templateIssues = (config: Pick<AnalysisConfig, 'focusAreas' | 'ratingBounds' | 'summaryTemplate' | 'ratingTemplate'>): string[] => {
    const variables = templateVariables(config.focusAreas, config.ratingBounds);
    const issues: string[] = [];
    const check = (label: string, template: PromptTemplate): void => {
        if (!template.rolePrompt.trim()) issues.push(`${label} role prompt is empty`);
        if (template.questions.length === 0) issues.push(`${label} template needs at least one question`);
        for (const text of [template.rolePrompt, ...template.questions]) {
            for (const name of unresolvedPlaceholders(text, variables)) {
                const position = /^focus_(\d+)$/.exec(name);
                issues.push(
                    position && Number(position[1]) <= MAX_FOCUS_AREAS
                        ? `${label} template references focus area ${position[1]} but only ${config.focusAreas.length} are configured`
                        : `${label} template uses unknown placeholder "{{ ${name} }}"`,
                );
            }
        }
    };
    check('summary', config.summaryTemplate);
    check('rating', config.ratingTemplate);
    return [...new Set(issues)];
};

export const ratingFunctionSchema = (bounds: RatingBounds): FunctionSchema => ({
    name: RATING_FUNCTION_NAME,
    description: `Evaluate the given reviews and return a rating between ${bounds.min} and ${bounds.max}.`,
    parameters: {
        type: 'object',
        properties: {
            rating: {
                type: 'number',
                minimum: bounds.min,
                maximum: bounds.max,
                description: 'Overall rating.',
            },
            rationale: { type: 'string', description: 'One or two sentences explaining the rating.' },
        },
        required: ['rating'],
    },
});

const summaryFormatHint = (focusAreas: readonly string[]): string =>
    `Return JSON: {"sections":[${focusAreas.map((focus) => `{"focus":${JSON.stringify(focus)},"points":["..."]}`).join(',')}]}`;

interface RenderedTemplate {
    system: string;
    questions: string;
}

const render = (template: PromptTemplate, variables: Record<string, string>): RenderedTemplate => ({
    system: renderTemplate(template.rolePrompt, variables),
    questions: template.questions.map((question) => renderTemplate(question, variables)).join('\n'),
});

const composePrompt = (reviewsText: string, questions: string, extra: string[]): string =>
    [`${reviewsText}\n\n###\n\n${questions}`, ...extra, 'Answer:'].join('\n');

export const buildSummaryRequest = (config: AnalysisConfig, reviewsText: string, strict: boolean): LlmRequest => {
    const variables = templateVariables(config.focusAreas, config.ratingBounds);
    const { system, questions } = render(config.summaryTemplate, variables);
    const extra = [summaryFormatHint(config.focusAreas)];
    if (strict) extra.push(STRICT_SUMMARY_INSTRUCTION);

    return {
        system,
        prompt: composePrompt(reviewsText, questions, extra),
        model: config.model,
        maxTokens: config.maxTokens,
        temperature: config.temperature,
        responseFormat: 'json',
    };
};

export const buildRatingRequest = (config: AnalysisConfig, reviewsText: string, strict: boolean): LlmRequest => {
    const variables = templateVariables(config.focusAreas, config.ratingBounds);
    const { system, questions } = render(config.ratingTemplate, variables);
    const extra = strict ? [renderTemplate(STRICT_RATING_INSTRUCTION, variables)] : [];

    return {
        system,
        prompt: composePrompt(reviewsText, questions, extra),
        model: config.model,
        maxTokens: config.maxTokens,
        temperature: config.temperature,
        responseFormat: 'text',
        schema: ratingFunctionSchema(config.ratingBounds),
    };
};

/**
 * Version of a rendered template. Anything that changes what the model is asked (role prompt,
 * questions, focus areas, bounds, token limit, temperature) yields a new version.
 */
export const promptVersion = (config: AnalysisConfig, kind: 'summary' | 'rating'): string => {
    const request = kind === 'summary' ? buildSummaryRequest(config, '', false) : buildRatingRequest(config, '', false);
    return contentVersion(kind, request.system, request.prompt, request.schema ?? null, config.maxTokens, config.temperature);
};
