/**
 * src/extractors/cheerioExtractor.ts
 *
 * Default Extractor: static HTML → item records with Cheerio.
 *
 * One item per element matching `spec.container`. Each configured field is
 * the trimmed text of the first match of its selector inside the container,
 * or "" when nothing matches. Fields whose name ends in `_href` take the
 * element's href attribute instead of its text. Without field selectors
 * each item is a single `text` field.
 */

import * as cheerio from 'cheerio';
import { log } from 'crawlee';
import { createExtractionResult, createItem } from '../sources/itemRecord.js';
import type { ExtractionResult, Extractor, ItemRecord, SelectorSpec } from '../sources/types.js';
import { ExtractionError, toErrorMessage } from '../utils/errors.js';

function cleanText(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

function selectAll($: cheerio.CheerioAPI, selector: string) {
    try {
        return $(selector);
    } catch (err) {
        throw new ExtractionError(`Invalid selector "${selector}": ${toErrorMessage(err)}`, false, { cause: err });
    }
}

export class CheerioExtractor implements Extractor {
    async extract(content: string, spec: SelectorSpec, sourceKey: string): Promise<ExtractionResult> {
        const $ = cheerio.load(content);
        const containers = selectAll($, spec.container);

        if (containers.length === 0 && (spec.required ?? true)) {
            log.warning(`[CheerioExtractor] ${sourceKey}: "${spec.container}" matched nothing. Layout drift?`);
            throw new ExtractionError(
                `Selector "${spec.container}" matched no elements for ${sourceKey}`,
                true,
            );
        }

        const fields = Object.entries(spec.fields ?? {});
        const items: ItemRecord[] = [];

        containers.each((_, el) => {
            const $card = $(el);
            if (fields.length === 0) {
                items.push(createItem([['text', cleanText($card.text())]]));
                return;
            }

            items.push(createItem(fields.map(([name, selector]): [string, string] => {
                const found = $card.find(selector).first();
                if (found.length === 0) return [name, ''];
                const href = name.endsWith('_href') ? found.attr('href') : undefined;
                return [name, href ? href.trim() : cleanText(found.text())];
            })));
        });

        log.debug(`[CheerioExtractor] ${sourceKey}: ${items.length} items.`);
        return createExtractionResult(sourceKey, items);
    }
}
