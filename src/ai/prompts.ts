/**
 * Prompt for batched headline tagging.
 *
 * The model must answer with exactly one line per title, in input order. Titles are
 * numbered only to help the model keep its place; answers are paired by position.
 */
export const MAX_TAGS_PER_ITEM = 3;

export function buildTagPrompt(titles: readonly string[]): string {
    const numbered = titles.map((title, i) => `${i + 1}. ${title}`).join('\n');

    return [
        `以下の${titles.length}件のニュースタイトルそれぞれについて、日本語のタグを最大${MAX_TAGS_PER_ITEM}個生成してください。`,
        `タイトルと同じ順番で、1タイトルにつき1行、合計${titles.length}行で出力してください。`,
        '各行は「タグ1, タグ2, タグ3」の形式のみとしてください。',
        '番号、記号、箇条書き、説明文は一切含めないでください。',
        '',
        numbered,
    ].join('\n');
}
