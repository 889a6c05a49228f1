import { getConfig } from '../config';
import { CandidateDeduper } from '../modules/deduper';
import { CandidateExtractor, ExtractorOptions } from '../modules/extractor';
import { Fetcher } from '../modules/fetcher';
import { Metrics } from '../modules/observability';
import { RankedResultBuilder } from '../modules/ranker';
import { ProductScorer, ScorerOptions } from '../modules/scorer';
import { AnalysisOutcome, AnalysisStatus, EntityOracle, PageFetcher, ScoreOutcome } from '../types';
import { FetchError } from '../utils/errors';
import { Logger } from '../utils/logger';

export const MESSAGES = {
    scrapingFailed: 'Failed to extract titles from this page',
    noCandidates: 'No product titles were found on this page',
    noProducts: 'No products were identified among the extracted titles',
    modelNotLoaded: 'Entity classifier is not loaded',
} as const;

export interface PipelineDeps {
    oracle: EntityOracle;
    fetcher?: PageFetcher;
    extractor?: ExtractorOptions;
    scorer?: ScorerOptions;
}

export interface PipelineRun {
    status: AnalysisStatus;
    outcome: AnalysisOutcome;
    candidates: string[]; // deduplicated, pre-scoring
    scores: ScoreOutcome[];
}

export class AnalysisPipeline {
    private fetcher: PageFetcher;
    private scorer: ProductScorer;
    private extractorOptions: ExtractorOptions;

    constructor(private deps: PipelineDeps) {
        this.fetcher = deps.fetcher ?? new Fetcher();
        this.extractorOptions = deps.extractor ?? getConfig().extractor;
        this.scorer = new ProductScorer(deps.oracle, deps.scorer ?? getConfig().scorer);
    }

    /**
     * URL → fetch → extract → dedupe → score → rank. A page that cannot be fetched
     * is `error: true`; a fetched page with nothing to report is `error: false`.
     */
    async run(url: string): Promise<PipelineRun> {
        const start = Date.now();
        const run = await this.execute(url);
        const duration = Date.now() - start;

        Metrics.record(run.status, duration / 1000);
        Logger.info(`[Pipeline] ${url} -> ${run.status} (${run.outcome.products_identified}/${run.outcome.total_titles_found})`, {
            url,
            duration_ms: duration,
        });
        return run;
    }

    async analyze(url: string): Promise<AnalysisOutcome> {
        return (await this.run(url)).outcome;
    }

    private async execute(url: string): Promise<PipelineRun> {
        const fetched = await this.fetcher.fetch(url);
        if (!fetched.ok) {
            const { failure } = fetched;
            Logger.logError('[Pipeline] Fetch failed', new FetchError(failure), {
                url,
                fetch_kind: failure.kind,
                status: failure.status,
            });
            return {
                status: 'scraping_error',
                outcome: RankedResultBuilder.failed(MESSAGES.scrapingFailed),
                candidates: [],
                scores: [],
            };
        }

        const raw = CandidateExtractor.extract(fetched.data, this.extractorOptions);
        if (raw.length === 0) {
            return {
                status: 'no_candidates',
                outcome: RankedResultBuilder.build([], 0, MESSAGES.noCandidates),
                candidates: [],
                scores: [],
            };
        }

        const unique = CandidateDeduper.dedupe(raw.map(c => c.text));
        Logger.debug(`[Pipeline] ${raw.length} candidates, ${unique.length} after dedupe`, { url });

        if (!this.deps.oracle.isLoaded()) {
            return {
                status: 'model_not_loaded',
                outcome: RankedResultBuilder.build([], unique.length, MESSAGES.modelNotLoaded),
                candidates: unique,
                scores: [],
            };
        }

        const scores = await this.scorer.score(unique);
        const results = ProductScorer.results(scores);

        if (results.length === 0) {
            return {
                status: 'no_products',
                outcome: RankedResultBuilder.build([], unique.length, MESSAGES.noProducts),
                candidates: unique,
                scores,
            };
        }

        return {
            status: 'ok',
            outcome: RankedResultBuilder.build(results, unique.length),
            candidates: unique,
            scores,
        };
    }
}
