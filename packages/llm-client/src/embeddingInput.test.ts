import { describe, expect, it } from 'vitest';

import { multimodalExtraBody, readMultimodalInput } from './embeddingInput';

describe('readMultimodalInput', () => {
  it('joins text parts and collects image URLs', () => {
    const input = readMultimodalInput({
      content: [
        { type: 'text', text: 'a photo of' },
        { type: 'image_url', image_url: { url: '' } },
        { type: 'image_url', image_url: { url: 'https://example.test/dog.jpg' } },
        { type: 'text', text: 'a dog' },
      ],
    });

    expect(input).toEqual({ text: 'a photo of a dog', images: ['https://example.test/dog.jpg'] });
    expect(multimodalExtraBody(input)).toEqual({ image: ['https://example.test/dog.jpg'] });
  });

  it('treats string content as text only', () => {
    const input = readMultimodalInput({ content: 'just words' });
    expect(input).toEqual({ text: 'just words', images: [] });
    expect(multimodalExtraBody(input)).toBeUndefined();
  });
});
