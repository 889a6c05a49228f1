import OpenAI from 'openai';
import { z } from 'zod';
import { EntityFinding, EntityOracle } from '../../types';
import { OracleError, toError } from '../../utils/errors';
import { Logger } from '../../utils/logger';

export interface OpenAIOracleOptions {
    api_key?: string;
    model: string;
    target_label: string;
    timeout_ms?: number;
}

/** Sends one prompt, resolves to the raw message content. */
export type CompletionFn = (prompt: string) => Promise<string | null>;

const EntitiesSchema = z.object({
    entities: z.array(z.object({
        label: z.string(),
        confidence: z.number().min(0).max(1),
        text: z.string().optional(),
    })),
});

export class OpenAIOracle implements EntityOracle {
    readonly name = 'openai';
    private complete: CompletionFn | null;

    constructor(private options: OpenAIOracleOptions, complete?: CompletionFn) {
        this.complete = complete ?? null;
    }

    async load(): Promise<void> {
        if (this.complete) return;

        const apiKey = this.options.api_key;
        if (!apiKey) {
            Logger.warn('[Oracle] OPENAI_API_KEY not configured, classifier not loaded');
            return;
        }

        const client = new OpenAI({ apiKey, timeout: this.options.timeout_ms });
        const model = this.options.model;
        this.complete = async (prompt: string) => {
            const response = await client.chat.completions.create({
                model,
                messages: [{ role: 'user', content: prompt }],
                temperature: 0,
                max_tokens: 300,
                response_format: { type: 'json_object' },
            });
            return response.choices[0]?.message?.content ?? null;
        };
        Logger.info(`[Oracle] OpenAI classifier ready (${model})`);
    }

    isLoaded(): boolean {
        return this.complete !== null;
    }

    async classify(text: string): Promise<EntityFinding[]> {
        if (!this.complete) {
            throw new OracleError('Entity classifier is not loaded');
        }

        let content: string | null;
        try {
            content = await this.complete(this.buildPrompt(text));
        } catch (error) {
            throw new OracleError(`Completion failed: ${toError(error).message}`, { model: this.options.model });
        }
        if (!content) {
            throw new OracleError('Completion returned no content', { model: this.options.model });
        }

        let json: unknown;
        try {
            json = JSON.parse(content);
        } catch {
            throw new OracleError('Completion is not valid JSON', { model: this.options.model });
        }

        const parsed = EntitiesSchema.safeParse(json);
        if (!parsed.success) {
            throw new OracleError('Completion does not match the entity schema', { model: this.options.model });
        }

        return parsed.data.entities.map(entity => ({
            group_label: entity.label,
            confidence: entity.confidence,
            word: entity.text,
        }));
    }

    private buildPrompt(text: string): string {
        const label = this.options.target_label;
        return `You are a named-entity tagger for furniture and home-goods web shops.

Find entity spans in the text below. Tag a span "${label}" when it names a concrete product (for example a chair, sofa, table or lamp model). Tag anything else as "O" or leave it out.

Text: ${JSON.stringify(text)}

Reply ONLY with JSON in this exact shape:
{"entities": [{"label": "${label}", "confidence": 0.87, "text": "Oak Chair"}]}

confidence is your probability (0 to 1) that the tag is correct. Use {"entities": []} when nothing matches.`;
    }
}
