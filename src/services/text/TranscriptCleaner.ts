export interface CleanedTranscript {
  text: string;
  removedPhrases: number;
}

const stripEdgeSpaces = (value: string): string => value.replace(/^[ \t]+|[ \t]+$/g, '');

const normalizeSpacing = (value: string): string => {
  let normalized = value;

  // Collapse repeated spaces but preserve explicit newlines.
  normalized = normalized.replace(/[ \t]{2,}/g, ' ');
  normalized = normalized.replace(/[ \t]*\n[ \t]*/g, '\n');

  // Remove spaces left before punctuation once a phrase was cut out.
  normalized = normalized.replace(/[ ]+([,.;:!?)}\]])/g, '$1');

  normalized = normalized.replace(/\n{3,}/g, '\n\n');

  return stripEdgeSpaces(normalized);
};

/**
 * Removes phrases the model is known to hallucinate on silence or music
 * (subtitle credits, sign-offs) and tidies the whitespace left behind.
 */
export class TranscriptCleaner {
  private readonly patterns: RegExp[];

  public constructor(patternSources: string[] = []) {
    this.patterns = patternSources.map((source) => new RegExp(source, 'giu'));
  }

  public clean(text: string): CleanedTranscript {
    if (!text.trim()) {
      return {
        text: '',
        removedPhrases: 0
      };
    }

    let output = text;
    let removedPhrases = 0;

    for (const pattern of this.patterns) {
      output = output.replace(pattern, () => {
        removedPhrases += 1;
        return '';
      });
    }

    return {
      text: normalizeSpacing(output),
      removedPhrases
    };
  }
}
