import { getConfig } from '../../config';
import { EntityOracle, ScoreOutcome, ScoredResult } from '../../types';
import { toError } from '../../utils/errors';
import { Logger } from '../../utils/logger';
import { Metrics } from '../observability';
import { isTargetEntity } from '../oracle/labels';

export interface ScorerOptions {
    target_label: string;
    min_length: number;
    max_candidates?: number;
}

/** Oracle confidence (0..1) to a whole percentage, truncated. */
export function toPercent(confidence: number): number {
    const percent = Math.floor(confidence * 100);
    return Math.max(0, Math.min(100, percent));
}

export function formatPercent(percent: number): string {
    return `${percent}%`;
}

export class ProductScorer {

    constructor(private oracle: EntityOracle, private options: ScorerOptions = getConfig().scorer) {}

    /**
     * One oracle call per candidate, awaited in order. Failures become `skipped`
     * outcomes and never stop the remaining candidates.
     */
    async score(texts: readonly string[]): Promise<ScoreOutcome[]> {
        if (!this.oracle.isLoaded()) {
            Logger.warn(`[Scorer] Oracle "${this.oracle.name}" not loaded, skipping ${texts.length} candidates`);
            return [];
        }

        const limit = this.options.max_candidates;
        const batch = limit !== undefined && texts.length > limit ? texts.slice(0, limit) : texts;
        if (batch.length < texts.length) {
            Logger.info(`[Scorer] Capped scoring at ${batch.length} of ${texts.length} candidates`);
        }

        const outcomes: ScoreOutcome[] = [];
        for (const text of batch) {
            outcomes.push(await this.scoreOne(text));
        }
        return outcomes;
    }

    async scoreOne(text: string): Promise<ScoreOutcome> {
        if (text.trim().length < this.options.min_length) {
            return { kind: 'skipped', text, reason: 'too_short' };
        }

        try {
            const findings = await this.oracle.classify(text);

            // First qualifying finding wins, even if a later one scores higher.
            const match = findings.find(f => isTargetEntity(f, this.options.target_label));
            if (!match) {
                return { kind: 'skipped', text, reason: 'not_target' };
            }

            return {
                kind: 'scored',
                result: { text, confidence_percent: toPercent(match.confidence) },
            };
        } catch (e) {
            const error = toError(e);
            Metrics.oracleFailures.inc();
            Logger.logError('[Scorer] Oracle failed on candidate', error, { text });
            return { kind: 'skipped', text, reason: 'oracle_error', error };
        }
    }

    static results(outcomes: readonly ScoreOutcome[]): ScoredResult[] {
        const results: ScoredResult[] = [];
        for (const outcome of outcomes) {
            if (outcome.kind === 'scored') results.push(outcome.result);
        }
        return results;
    }
}
