export class CandidateDeduper {

    /** Drops exact repeats, keeping the first occurrence in place. */
    static dedupe(texts: readonly string[]): string[] {
        const seen = new Set<string>();
        const unique: string[] = [];

        for (const text of texts) {
            if (!seen.has(text)) {
                seen.add(text);
                unique.push(text);
            }
        }

        return unique;
    }
}
