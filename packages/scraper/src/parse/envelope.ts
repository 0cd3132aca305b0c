import { z } from 'zod';
import type { PageEnvelope } from '../api/types';

const envelopeSchema = z.object({
  items_html: z.string().nullable(),
  min_position: z.union([z.string(), z.number()]).nullable().optional(),
  has_more_items: z.boolean().optional(),
});

export class ParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ParseError';
  }
}

export function unwrapEnvelope(body: string): PageEnvelope {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new ParseError('Continuation response is not valid JSON', { cause: err });
  }

  const parsed = envelopeSchema.safeParse(json);
  if (!parsed.success) {
    throw new ParseError(`Malformed continuation envelope: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`, {
      cause: parsed.error,
    });
  }

  const minPosition = parsed.data.min_position;
  return {
    itemsHtml: parsed.data.items_html ?? '',
    minPosition: minPosition === null || minPosition === undefined || minPosition === '' ? null : String(minPosition),
  };
}
