import { readFileSync } from 'node:fs';
import { z } from 'zod';

/**
 * Static game data: playable classes with their specs, current raid encounters
 * and leaderboard regions. Class/spec keys use "_" for spaces (Death_Knight).
 */
const ReferenceDataSchema = z.object({
  classes: z.record(z.object({ specs: z.array(z.string().min(1)).min(1) })),
  encounters: z.array(z.object({ id: z.number().int().positive(), name: z.string().min(1) })).min(1),
  regions: z.array(z.object({ code: z.string().min(1), name: z.string().min(1) })).min(1),
});

export type ReferenceData = z.infer<typeof ReferenceDataSchema>;
export type Encounter = ReferenceData['encounters'][number];
export type Region = ReferenceData['regions'][number];

/** Region code meaning "no region filter". */
export const ALL_REGIONS = 'all';

const DEFAULT_PATH = new URL('../../data/reference.json', import.meta.url);

export function parseReferenceData(raw: unknown): ReferenceData {
  const parsed = ReferenceDataSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid reference data: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown'}`);
  }
  return parsed.data;
}

export function loadReferenceData(path: string | URL = DEFAULT_PATH): ReferenceData {
  return parseReferenceData(JSON.parse(readFileSync(path, 'utf8')));
}

let cached: ReferenceData | undefined;

export function getReferenceData(): ReferenceData {
  if (!cached) cached = loadReferenceData();
  return cached;
}

/** "Death_Knight" -> "Death Knight" */
export function displayName(key: string): string {
  return key.replace(/_/g, ' ');
}

export function specsFor(data: ReferenceData, className: string): string[] | undefined {
  return data.classes[className]?.specs;
}
