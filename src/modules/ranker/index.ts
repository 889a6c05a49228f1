import { AnalysisOutcome, AnalysisResponse, ScoredResult } from '../../types';
import { formatPercent } from '../scorer';

export class RankedResultBuilder {

    /** Descending confidence. Array#sort is stable, so ties keep scoring order. */
    static rank(results: readonly ScoredResult[]): ScoredResult[] {
        return [...results].sort((a, b) => b.confidence_percent - a.confidence_percent);
    }

    static build(results: readonly ScoredResult[], uniqueCount: number, message?: string): AnalysisOutcome {
        const ranked = this.rank(results);
        const outcome: AnalysisOutcome = {
            error: false,
            results: ranked,
            total_titles_found: uniqueCount,
            products_identified: ranked.length,
        };
        if (message !== undefined) outcome.message = message;
        return outcome;
    }

    static failed(message: string): AnalysisOutcome {
        return {
            error: true,
            results: [],
            total_titles_found: 0,
            products_identified: 0,
            message,
        };
    }

    static toResponse(outcome: AnalysisOutcome): AnalysisResponse {
        const response: AnalysisResponse = {
            error: outcome.error,
            results: outcome.results.map(r => ({ text: r.text, prob: formatPercent(r.confidence_percent) })),
            total_titles_found: outcome.total_titles_found,
            products_identified: outcome.products_identified,
        };
        if (outcome.message !== undefined) response.message = outcome.message;
        return response;
    }
}
