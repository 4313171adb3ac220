import { describe, it, expect } from 'vitest';
import { previewText, TEXT_PREVIEW_LENGTH } from './text';

describe('previewText', () => {
  it('keeps short text unchanged', () => {
    expect(previewText('Hello world')).toBe('Hello world');
    expect(previewText('a'.repeat(TEXT_PREVIEW_LENGTH))).toBe('a'.repeat(100));
  });

  it('truncates long text to 100 characters plus an ellipsis', () => {
    expect(previewText('a'.repeat(120))).toBe(`${'a'.repeat(100)}...`);
  });

  it('does not split an emoji at the cut', () => {
    const preview = previewText(`${'a'.repeat(99)}\u{1F600}bc`);

    expect(preview).toBe(`${'a'.repeat(99)}\u{1F600}...`);
  });

  it('counts an emoji as one character', () => {
    const text = `${'a'.repeat(99)}\u{1F600}`;
    expect(previewText(text)).toBe(text);
  });
});
