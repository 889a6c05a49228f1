import { EntityFinding, EntityOracle, FetchResult, PageFetcher } from '../src/types';
import { ExtractorOptions } from '../src/modules/extractor';
import { ScorerOptions } from '../src/modules/scorer';

export const EXTRACTOR_OPTIONS: ExtractorOptions = {
    heading_selectors: ['h1'],
    hint_elements: ['p', 'div', 'span'],
    class_hints: ['name', 'title'],
};

export const SCORER_OPTIONS: ScorerOptions = {
    target_label: 'PRODUCT',
    min_length: 2,
};

export function product(confidence: number): EntityFinding {
    return { group_label: 'PRODUCT', confidence };
}

/** Answers from a fixed table; unknown texts get no findings. */
export class FakeOracle implements EntityOracle {
    readonly name = 'fake';
    calls: string[] = [];

    constructor(
        private responses: Record<string, EntityFinding[] | Error> = {},
        private loaded = true
    ) {}

    async load(): Promise<void> {}

    isLoaded(): boolean {
        return this.loaded;
    }

    async classify(text: string): Promise<EntityFinding[]> {
        this.calls.push(text);
        const response = this.responses[text];
        if (response instanceof Error) throw response;
        return response ?? [];
    }
}

export class FakeFetcher implements PageFetcher {
    calls: string[] = [];

    constructor(private pages: Record<string, FetchResult>) {}

    async fetch(url: string): Promise<FetchResult> {
        this.calls.push(url);
        const page = this.pages[url];
        if (!page) {
            return { ok: false, failure: { kind: 'connection', url, detail: 'getaddrinfo ENOTFOUND' } };
        }
        return page;
    }
}

export function page(url: string, html: string): FetchResult {
    return { ok: true, url, status: 200, data: html, finalUrl: url };
}
