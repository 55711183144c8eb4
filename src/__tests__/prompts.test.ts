import { describe, expect, it } from 'vitest';

import { STRICT_SUMMARY_INSTRUCTION } from '../constants.js';
import { ConfigInvalidError } from '../errors.js';
import {
    buildRatingRequest,
    buildSummaryRequest,
    promptVersion,
    RATING_FUNCTION_NAME,
    renderTemplate,
    templateIssues,
    templateVariables,
} from '../prompts.js';
import { analysisConfig } from './fakes.js';

describe('renderTemplate', () => {
    const variables = templateVariables(['cleanliness', 'location'], { min: 1, max: 5 });

    it('should fill numbered and list placeholders', () => {
        expect(renderTemplate('Focus on {{ focus_2 }} then {{focus_1}}', variables)).toBe('Focus on location then cleanliness');
        expect(renderTemplate('{{ focus_list }}', variables)).toBe('1. cleanliness\n2. location');
        expect(renderTemplate('{{ min_rating }}-{{ max_rating }}', variables)).toBe('1-5');
    });

    it('should throw ConfigInvalidError for a placeholder without a value', () => {
        expect(() => renderTemplate('{{ focus_3 }}', variables)).toThrow(ConfigInvalidError);
    });
});

describe('templateIssues', () => {
    it('should accept the default test configuration', () => {
        expect(templateIssues(analysisConfig())).toEqual([]);
    });

    it('should report a focus reference beyond the configured areas', () => {
        const config = analysisConfig({ focusAreas: ['cleanliness'] });

        expect(templateIssues(config)).toEqual([
            'rating template references focus area 2 but only 1 are configured',
        ]);
    });

    it('should report unknown placeholders and empty templates', () => {
        const config = analysisConfig({ summaryTemplate: { rolePrompt: ' ', questions: ['{{ vibe }}'] } });

        expect(templateIssues(config)).toEqual(['summary role prompt is empty', 'summary template uses unknown placeholder "{{ vibe }}"']);
    });
});

describe('buildSummaryRequest', () => {
    it('should put the reviews before the questions and ask for JSON', () => {
        const request = buildSummaryRequest(analysisConfig(), 'REVIEWS', false);

        expect(request.system).toBe('Summarize reviews.');
        expect(request.prompt).toBe(
            'REVIEWS\n\n###\n\nCover:\n1. cleanliness\n2. location\n' +
                'Return JSON: {"sections":[{"focus":"cleanliness","points":["..."]},{"focus":"location","points":["..."]}]}\n' +
                'Answer:',
        );
        expect(request).toMatchObject({ model: 'test-model', maxTokens: 200, temperature: 0, responseFormat: 'json' });
        expect(request.schema).toBeUndefined();
    });

    it('should add the strict instruction on retry', () => {
        expect(buildSummaryRequest(analysisConfig(), 'REVIEWS', true).prompt).toContain(STRICT_SUMMARY_INSTRUCTION);
    });
});

describe('buildRatingRequest', () => {
    it('should attach the bounded rating function', () => {
        const request = buildRatingRequest(analysisConfig({ ratingBounds: { min: 0, max: 10 } }), 'REVIEWS', false);

        expect(request.system).toBe('Rate between 0 and 10.');
        expect(request.schema?.name).toBe(RATING_FUNCTION_NAME);
        expect(request.schema?.parameters).toMatchObject({
            properties: { rating: { type: 'number', minimum: 0, maximum: 10 } },
            required: ['rating'],
        });
    });

    it('should state the bounds in the strict instruction', () => {
        const request = buildRatingRequest(analysisConfig(), 'REVIEWS', true);

        expect(request.prompt).toContain('must be a number between 1 and 5 inclusive');
    });
});

describe('promptVersion', () => {
    it('should stay the same for the same configuration', () => {
        expect(promptVersion(analysisConfig(), 'summary')).toBe(promptVersion(analysisConfig(), 'summary'));
    });

    it('should change with the template, the focus areas or the sampling settings', () => {
        const base = promptVersion(analysisConfig(), 'rating');

        expect(promptVersion(analysisConfig({ ratingTemplate: { rolePrompt: 'Be strict.', questions: ['Rate.'] } }), 'rating')).not.toBe(base);
        expect(promptVersion(analysisConfig({ focusAreas: ['cleanliness', 'noise'] }), 'rating')).not.toBe(base);
        expect(promptVersion(analysisConfig({ temperature: 0.7 }), 'rating')).not.toBe(base);
    });

    it('should not change with the model, which is a key of its own', () => {
        expect(promptVersion(analysisConfig({ model: 'other-model' }), 'summary')).toBe(promptVersion(analysisConfig(), 'summary'));
    });
});
