/**
 * Letter-spaced Cyrillic: three or more standalone letters separated by
 * spaces or tabs ("С Ч Е Т" -> "СЧЕТ").
 */
const LETTER_SPACED_RUN =
  /(?<![\p{L}\p{N}])[А-Яа-яЁё](?:[ \t]+[А-Яа-яЁё]){2,}(?![\p{L}\p{N}])/gu;

/**
 * Common OCR splits inside words, applied in order
 */
const SPLIT_TOKEN_REPAIRS: ReadonlyArray<readonly [RegExp, string]> = [
  [/(?<![\p{L}\p{N}])о\s+т(?![\p{L}\p{N}])/gu, 'от'],
  [/р\s+уб/g, 'руб'],
  [/э\s+лектр/g, 'электр'],
  [/э\s+нерг/g, 'энерг'],
  [/сч\s+ё\s+т/g, 'счёт'],
  [/о\s+снаб/g, 'оснаб'],
];

/**
 * TextNormalizer - cleanup of acquired invoice text
 *
 * Repairs the artifacts embedded text layers and OCR leave in Russian
 * documents. Line breaks are kept; the extraction prompt relies on them.
 *
 * normalize() is idempotent: `normalize(normalize(x)) === normalize(x)`.
 */
export class TextNormalizer {
  static normalize(text: string): string {
    if (!text) return '';

    // NFC, exotic spaces to plain spaces
    let normalized = text
      .normalize('NFC')
      .replace(/[\u00A0\u2000-\u200A\u202F]/g, ' ');

    normalized = normalized.replace(LETTER_SPACED_RUN, (run) =>
      run.replace(/[ \t]+/g, ''),
    );

    normalized = normalized.replace(/\s+([,.;:])/g, '$1');

    for (const [pattern, replacement] of SPLIT_TOKEN_REPAIRS) {
      normalized = normalized.replace(pattern, replacement);
    }

    normalized = normalized.replace(/ {2,}/g, ' ');

    return normalized.trim();
  }
}
