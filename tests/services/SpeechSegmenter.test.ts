import { describe, it, expect } from 'vitest';
import { SpeechSegmenter } from '../../src/services/SpeechSegmenter';

describe('SpeechSegmenter', () => {
  it('releases a sentence once its boundary arrives', () => {
    const segmenter = new SpeechSegmenter();

    expect(segmenter.push('Hello')).toEqual([]);
    expect(segmenter.push(' there. How')).toEqual(['Hello there.']);
    expect(segmenter.push(' are you? I am')).toEqual(['How are you?']);
    expect(segmenter.flush()).toBe('I am');
  });

  it('splits several sentences in one fragment, including newline boundaries', () => {
    const segmenter = new SpeechSegmenter();

    expect(segmenter.push('One! Two?\nThree.\nFour')).toEqual(['One!', 'Two?', 'Three.']);
    expect(segmenter.flush()).toBe('Four');
  });

  it('does not split decimals', () => {
    const segmenter = new SpeechSegmenter();

    expect(segmenter.push('Version 2.5 shipped.')).toEqual([]);
    expect(segmenter.flush()).toBe('Version 2.5 shipped.');
  });

  it('flushes nothing when empty', () => {
    const segmenter = new SpeechSegmenter();
    segmenter.push('  ');

    expect(segmenter.flush()).toBeUndefined();
  });
});
