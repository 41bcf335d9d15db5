import { z } from 'zod';
import { ExtractionError, factCandidateSchema, type FactCandidate } from '@tempora/shared';

const envelopeSchema = z.object({ facts: z.array(z.unknown()) });

/**
 * Parse a model's extraction reply. The reply must be a JSON object with a
 * `facts` array; entries that fail validation are dropped, never patched.
 */
export function parseExtraction(raw: string): FactCandidate[] {
  const body = stripCodeFence(raw.trim());
  if (!body) return [];

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new ExtractionError('model reply is not valid JSON', { cause: err });
  }

  const envelope = envelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new ExtractionError('model reply has no "facts" array');
  }

  const candidates: FactCandidate[] = [];
  for (const entry of envelope.data.facts) {
    const parsed = factCandidateSchema.safeParse(entry);
    if (parsed.success) candidates.push(parsed.data);
  }
  return candidates;
}

function stripCodeFence(text: string): string {
  const match = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(text);
  return match ? match[1] : text;
}
