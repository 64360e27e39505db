/**
 * Parsing of the model's line-per-title tag answer
 */
import { isValidTag, stripLeadingMarker } from '../normalizers/text.normalizer.js';
import { MAX_TAGS_PER_ITEM } from './prompts.js';

// "3:" / "３：" index labels and bullet characters some answers still carry
const LINE_LABEL = /^\s*(?:[0-9０-９]+\s*[:：]|[-*・•])\s*/;
const TAG_SEPARATOR = /[,、，]/;

/**
 * Trimmed, non-empty lines of a completion
 */
export function splitResponseLines(text: string): string[] {
    return text
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0);
}

/**
 * Turn one answer line into at most `maxTags` valid tags
 */
export function parseTagLine(line: string, maxTags: number = MAX_TAGS_PER_ITEM): string[] {
    return line
        .replace(LINE_LABEL, '')
        .split(TAG_SEPARATOR)
        .map(fragment => stripLeadingMarker(fragment))
        .filter(tag => isValidTag(tag))
        .slice(0, maxTags);
}
