import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { getConfig } from '../../config';
import { Candidate } from '../../types';

export interface ExtractorOptions {
    heading_selectors: string[];
    hint_elements: string[];
    class_hints: string[];
}

/**
 * Normalizes a class attribute into its token set. Parsers hand it over either
 * as a single space-separated string or as a list of tokens.
 */
export function classTokens(value: string | readonly string[] | undefined | null): Set<string> {
    if (!value) return new Set();
    const raw = typeof value === 'string' ? value.split(/\s+/) : value.flatMap(v => v.split(/\s+/));
    return new Set(raw.filter(token => token.length > 0));
}

export function hasClassHint(tokens: Set<string>, hints: readonly string[]): boolean {
    const lowerHints = hints.map(h => h.toLowerCase());
    for (const token of tokens) {
        const lower = token.toLowerCase();
        if (lowerHints.some(hint => lower.includes(hint))) return true;
    }
    return false;
}

const HIDDEN_ELEMENTS = 'script, style, noscript, template';

/**
 * Text a reader would see: text nodes in document order, each trimmed, empty ones
 * dropped, joined by a single space. Nothing under script/style/noscript/template.
 */
export function visibleText($: CheerioAPI, node: AnyNode): string {
    const pieces: string[] = [];

    const walk = (parent: AnyNode) => {
        $(parent).contents().each((_, child) => {
            if (child.nodeType === 3) {
                const piece = $(child).text().trim();
                if (piece) pieces.push(piece);
                return;
            }
            if (child.nodeType === 1 && !$(child).is(HIDDEN_ELEMENTS)) {
                walk(child);
            }
        });
    };

    walk(node);
    return pieces.join(' ');
}

export class CandidateExtractor {

    /**
     * Two passes over the document: headings first, then elements whose class
     * hints at a name or title. Each pass keeps document order.
     */
    static extract(html: string, options: ExtractorOptions = getConfig().extractor): Candidate[] {
        const $ = cheerio.load(html);
        const candidates: Candidate[] = [];

        $(options.heading_selectors.join(', ')).each((_, el) => {
            const text = visibleText($, el);
            if (text) candidates.push({ text, rule: 'heading' });
        });

        $(options.hint_elements.join(', ')).each((_, el) => {
            const tokens = classTokens($(el).attr('class'));
            if (!hasClassHint(tokens, options.class_hints)) return;

            const text = visibleText($, el);
            if (text) candidates.push({ text, rule: 'class_hint' });
        });

        return candidates;
    }
}
