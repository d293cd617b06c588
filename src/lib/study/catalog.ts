import type { Word } from "./types";

export interface WordCatalog {
    /**
     * Words of the language with word_number >= startNumber, ascending.
     * Rejects with NotFoundError when the language does not exist.
     */
    wordsFrom(languageId: string, startNumber: number): AsyncIterable<Word>;
    count(languageId: string): Promise<number>;
}

export async function* pageThrough<T>(
    fetchPage: (offset: number, limit: number) => Promise<T[]>,
    pageSize: number
): AsyncGenerator<T[]> {
    let offset = 0;
    while (true) {
        const page = await fetchPage(offset, pageSize);
        if (page.length > 0) yield page;
        if (page.length < pageSize) return;
        offset += page.length;
    }
}
