import type { ChatCompletionContentPart } from 'openai/resources/chat/completions';

/** A chat message whose text and images are embedded together. */
export interface MultimodalBlock {
  content: string | ChatCompletionContentPart[];
}

export interface MultimodalEmbeddingInput {
  text: string;
  /** Image URLs, including `data:` URLs. */
  images: string[];
}

/**
 * Collects the text parts (joined by a space) and image URLs of a message.
 * Other part types are ignored.
 */
export function readMultimodalInput(block: MultimodalBlock): MultimodalEmbeddingInput {
  if (typeof block.content === 'string') {
    return { text: block.content, images: [] };
  }

  const textParts: string[] = [];
  const images: string[] = [];
  for (const part of block.content) {
    if (part.type === 'text') {
      textParts.push(part.text);
    } else if (part.type === 'image_url' && part.image_url.url) {
      images.push(part.image_url.url);
    }
  }
  return { text: textParts.join(' '), images };
}

/** Extra request fields for an embedding server that accepts images. */
export function multimodalExtraBody(input: MultimodalEmbeddingInput): Record<string, unknown> | undefined {
  return input.images.length > 0 ? { image: input.images } : undefined;
}
