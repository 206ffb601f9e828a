import { z } from 'zod';
import { ALL_REGIONS, specsFor, type ReferenceData } from '../config/referenceData.js';
import type { QueryParameters } from '../talents/types.js';

export const STREAM_FORMATS = ['html', 'json'] as const;
export type StreamFormat = (typeof STREAM_FORMATS)[number];

export type TalentQuery = {
  params: QueryParameters;
  format: StreamFormat;
};

/**
 * Query-string schema for GET /api/talents, checked against the reference data:
 * class must exist, spec must belong to it, encounter must be a current boss.
 */
export function buildTalentQuerySchema(ref: ReferenceData) {
  const encounterIds = new Set(ref.encounters.map(e => e.id));
  const regionCodes = new Set(ref.regions.map(r => r.code));

  return z
    .object({
      class: z.string().trim().min(1),
      spec: z.string().trim().min(1),
      encounter: z.coerce.number().int().positive(),
      region: z.string().trim().optional(),
      format: z.enum(STREAM_FORMATS).default('html'),
    })
    .superRefine((q, ctx) => {
      const specs = specsFor(ref, q.class);
      if (!specs) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['class'], message: `Unknown class: ${q.class}` });
      } else if (!specs.includes(q.spec)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['spec'], message: `Unknown spec for ${q.class}: ${q.spec}` });
      }
      if (!encounterIds.has(q.encounter)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['encounter'], message: `Unknown encounter: ${q.encounter}` });
      }
      if (q.region && !regionCodes.has(q.region)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['region'], message: `Unknown region: ${q.region}` });
      }
    })
    .transform(
      (q): TalentQuery => ({
        params: {
          className: q.class,
          specName: q.spec,
          encounterId: q.encounter,
          region: q.region && q.region !== ALL_REGIONS ? q.region : undefined,
        },
        format: q.format,
      })
    );
}
