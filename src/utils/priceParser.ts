/**
 * src/utils/priceParser.ts
 *
 * Turns scraped price text into integer cents.
 *
 *   "$1,234.56"      → 123456
 *   "€1.234,56"      → 123456
 *   "1 299,00 kr"    → 129900
 *   "£12"            → 1200
 *   "Out of stock"   → null
 *
 * Separator rules, applied to the first number in the text:
 *   • both "." and "," present → the later one is the decimal mark
 *   • one kind, repeated       → thousands separators
 *   • one kind, once, followed by exactly three digits → thousands
 *   • otherwise                → decimal mark
 */

const NUMBER_TOKEN = /\d[\d.,]*/;

// A single space (incl. NBSP) before a three-digit group: "1 299,00".
const GROUP_SPACE = /(\d)\s(?=\d{3}(?!\d))/g;

function splitDecimal(token: string): { whole: string; fraction: string } {
    const lastDot = token.lastIndexOf('.');
    const lastComma = token.lastIndexOf(',');

    if (lastDot === -1 && lastComma === -1) {
        return { whole: token, fraction: '' };
    }

    let decimalAt: number;
    if (lastDot !== -1 && lastComma !== -1) {
        decimalAt = Math.max(lastDot, lastComma);
    } else {
        const sep = lastDot !== -1 ? '.' : ',';
        const occurrences = token.split(sep).length - 1;
        const at = token.lastIndexOf(sep);
        const digitsAfter = token.length - at - 1;
        decimalAt = occurrences > 1 || digitsAfter === 3 ? -1 : at;
    }

    if (decimalAt === -1) {
        return { whole: token.replace(/[.,]/g, ''), fraction: '' };
    }
    return {
        whole: token.slice(0, decimalAt).replace(/[.,]/g, ''),
        fraction: token.slice(decimalAt + 1).replace(/[.,]/g, ''),
    };
}

/** Returns the price in cents, or null when the text holds no number. */
export function parsePriceCents(raw: string): number | null {
    const compact = raw.replace(GROUP_SPACE, '$1');
    const match = NUMBER_TOKEN.exec(compact);
    if (!match) return null;

    const token = match[0].replace(/[.,]+$/, '');
    const { whole, fraction } = splitDecimal(token);
    if (whole === '' && fraction === '') return null;

    const value = Number(`${whole || '0'}.${fraction || '0'}`);
    if (!Number.isFinite(value)) return null;
    return Math.round(value * 100);
}

export function centsToPrice(cents: number): number {
    return cents / 100;
}

/** Rounds a plain number to whole cents. */
export function toCents(price: number): number {
    return Math.round(price * 100);
}
