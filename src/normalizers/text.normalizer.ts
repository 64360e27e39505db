/**
 * Headline text normalization
 * Removes enumeration markers that feeds and models prepend to titles and tags.
 */

// Digits (ASCII or full-width) need a separator; a circled number is a complete marker on its own.
const LEADING_MARKER = /^(?:[0-9０-９]+[.．、)）\s]+|[①-⑳]+[.．、)）\s]*)/;

// Characters that on their own never make a meaningful tag
const DEGENERATE_TAG = /^[0-9０-９①-⑳.．、()（）\s]*$/;

/**
 * Strip a leading "1." / "１．" / "3)" / "①" marker and trim.
 */
export function stripLeadingMarker(text: string | null | undefined): string {
    if (!text) {
        return '';
    }
    return text.trim().replace(LEADING_MARKER, '').trim();
}

/**
 * A tag is valid when it has at least one character besides digits, circled
 * numbers, dots, ideographic commas, parentheses and whitespace.
 */
export function isValidTag(tag: string | null | undefined): boolean {
    if (!tag) {
        return false;
    }
    return !DEGENERATE_TAG.test(tag);
}
