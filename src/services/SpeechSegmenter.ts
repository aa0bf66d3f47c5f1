const SENTENCE_BOUNDARY = /[.!?][ \n]/g;

/**
 * Buffers streamed text and releases it one sentence at a time
 */
export class SpeechSegmenter {
  private buffer = '';

  /**
   * Add a fragment; returns every sentence it completed, in order
   */
  push(fragment: string): string[] {
    this.buffer += fragment;
    const units: string[] = [];

    let start = 0;
    SENTENCE_BOUNDARY.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = SENTENCE_BOUNDARY.exec(this.buffer)) !== null) {
      const end = match.index + 1;
      const unit = this.buffer.slice(start, end).trim();
      if (unit) {
        units.push(unit);
      }
      start = end + 1;
    }

    this.buffer = this.buffer.slice(start);
    return units;
  }

  /**
   * Release whatever is left once the stream has ended
   */
  flush(): string | undefined {
    const rest = this.buffer.trim();
    this.buffer = '';
    return rest || undefined;
  }
}
