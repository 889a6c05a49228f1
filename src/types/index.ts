export type CandidateRule = 'heading' | 'class_hint';

export type Candidate = {
    text: string; // trimmed, never empty
    rule: CandidateRule;
};

/**
 * A single span reported by the entity oracle. Backends fill either `group_label`
 * (aggregated spans) or `label` (per-token tags), sometimes both.
 */
export type EntityFinding = {
    label?: string;
    group_label?: string;
    confidence: number; // 0..1
    word?: string;
};

export type ScoredResult = {
    text: string;
    confidence_percent: number; // integer 0..100
};

export type SkipReason = 'too_short' | 'not_target' | 'oracle_error';

export type ScoreOutcome =
    | { kind: 'scored'; result: ScoredResult }
    | { kind: 'skipped'; text: string; reason: SkipReason; error?: Error };

export type AnalysisOutcome = {
    error: boolean;
    results: ScoredResult[];
    total_titles_found: number;
    products_identified: number;
    message?: string;
};

export type FetchFailureKind = 'ssl' | 'connection' | 'timeout' | 'http_status' | 'other';

export type FetchFailure = {
    kind: FetchFailureKind;
    url: string;
    status?: number;
    detail: string;
};

export type FetchResult =
    | { ok: true; url: string; status: number; data: string; finalUrl: string }
    | { ok: false; failure: FetchFailure };

export interface PageFetcher {
    fetch(url: string): Promise<FetchResult>;
}

export interface EntityOracle {
    readonly name: string;
    load(): Promise<void>;
    isLoaded(): boolean;
    classify(text: string): Promise<EntityFinding[]>;
}

/** Wire shape of a ranked result: `{ text, prob: "87%" }`. */
export type ResultView = {
    text: string;
    prob: string;
};

export type AnalysisResponse = {
    error: boolean;
    results: ResultView[];
    total_titles_found: number;
    products_identified: number;
    message?: string;
};

export type AnalysisStatus = 'ok' | 'scraping_error' | 'no_candidates' | 'no_products' | 'model_not_loaded';
