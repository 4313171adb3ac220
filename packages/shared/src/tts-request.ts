/**
 * @fileoverview TTS request schema
 *
 * Zod schema for synthesis requests accepted by the API. Requests are validated and
 * normalised (trimmed text, defaults applied) before they reach the job manager, so
 * everything downstream can treat a `TtsRequest` as trusted and immutable.
 */

import { z } from 'zod';

/** Upper bound on accepted text length, in characters. */
export const MAX_TEXT_LENGTH = 100_000;

export const DEFAULT_VOICE = 'Joanna';

/**
 * Synthesis request schema.
 *
 * - `pitch` is a percent offset from the voice's baseline (-50..50)
 * - `speed` is a rate multiplier (0.25..4)
 * - `volume` is a gain multiplier (0..2), 0 meaning silent
 */
export const TtsRequestSchema = z.object({
  text: z
    .string({ required_error: 'Text is required', invalid_type_error: 'Text must be a string' })
    .trim()
    .min(1, 'Text is required')
    .max(MAX_TEXT_LENGTH, `Text must be at most ${MAX_TEXT_LENGTH} characters`),
  voice: z.string().trim().min(1).max(64).default(DEFAULT_VOICE),
  pitch: z.number().finite().min(-50).max(50).default(0),
  speed: z.number().finite().min(0.25).max(4).default(1),
  volume: z.number().finite().min(0).max(2).default(1)
});

export type TtsRequest = Readonly<z.infer<typeof TtsRequestSchema>>;

export type TtsRequestParseResult =
  | { success: true; data: TtsRequest }
  | { success: false; message: string; issues: { path: string; message: string }[] };

/**
 * Validates an untrusted payload against {@link TtsRequestSchema}.
 *
 * @example
 * ```typescript
 * const parsed = parseTtsRequest({ text: '  Hello world ' });
 * if (parsed.success) parsed.data.text; // 'Hello world'
 * ```
 */
export function parseTtsRequest(input: unknown): TtsRequestParseResult {
  const result = TtsRequestSchema.safeParse(input);
  if (result.success) {
    return { success: true, data: Object.freeze({ ...result.data }) };
  }
  const issues = result.error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message
  }));
  const message = issues.map(i => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');
  return { success: false, message, issues };
}
