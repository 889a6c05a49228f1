import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import { EntityFinding, EntityOracle } from '../../types';
import { OracleError, toError } from '../../utils/errors';
import { Logger } from '../../utils/logger';

/**
 * Token-classification inference server response, aggregated or not:
 * `[{ entity_group: "PRODUCT", score: 0.87, word: "Oak Chair" }]`.
 * Some servers wrap single inputs in an extra array.
 */
const SpanSchema = z.object({
    entity_group: z.string().optional(),
    entity: z.string().optional(),
    score: z.number(),
    word: z.string().optional(),
});

const ResponseSchema = z.union([z.array(SpanSchema), z.array(z.array(SpanSchema))]);

type Span = z.infer<typeof SpanSchema>;

function flattenSpans(data: Span[] | Span[][]): Span[] {
    const spans: Span[] = [];
    for (const item of data) {
        if (Array.isArray(item)) spans.push(...item);
        else spans.push(item);
    }
    return spans;
}

export interface EndpointOracleOptions {
    endpoint_url: string;
    api_token?: string;
    timeout_ms?: number;
}

const WARMUP_TEXT = 'Oak dining chair';

export class EndpointOracle implements EntityOracle {
    readonly name = 'endpoint';
    private client: AxiosInstance;
    private loaded = false;

    constructor(private options: EndpointOracleOptions, adapter?: AxiosAdapter) {
        this.client = axios.create({
            adapter,
            timeout: options.timeout_ms,
            headers: {
                'Content-Type': 'application/json',
                ...(options.api_token ? { Authorization: `Bearer ${options.api_token}` } : {}),
            },
        });
    }

    async load(): Promise<void> {
        try {
            await this.request(WARMUP_TEXT);
            this.loaded = true;
            Logger.info(`[Oracle] Inference endpoint ready at ${this.options.endpoint_url}`);
        } catch (error) {
            this.loaded = false;
            Logger.logError('[Oracle] Inference endpoint warm-up failed, classifier not loaded', toError(error), {
                url: this.options.endpoint_url,
            });
        }
    }

    isLoaded(): boolean {
        return this.loaded;
    }

    async classify(text: string): Promise<EntityFinding[]> {
        if (!this.loaded) {
            throw new OracleError('Entity classifier is not loaded');
        }
        return this.request(text);
    }

    private async request(text: string): Promise<EntityFinding[]> {
        let data: unknown;
        try {
            const response = await this.client.post<unknown>(this.options.endpoint_url, { inputs: text });
            data = response.data;
        } catch (error) {
            throw new OracleError(`Inference request failed: ${toError(error).message}`, {
                endpoint: this.options.endpoint_url,
            });
        }

        const parsed = ResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw new OracleError('Inference endpoint returned an unexpected payload', {
                issues: parsed.error.issues.length,
            });
        }

        const spans = flattenSpans(parsed.data);
        return spans.map(span => ({
            group_label: span.entity_group,
            label: span.entity,
            confidence: span.score,
            word: span.word,
        }));
    }
}
