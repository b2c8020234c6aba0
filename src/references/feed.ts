/**
 * Schema for the eCFR agencies feed (`/api/admin/v1/agencies.json`)
 */

import { z } from 'zod';

/**
 * Only `title` and `chapter` are read; other reference fields (`part`,
 * `subchapter`, ...) are stripped without validation.
 */
export const CfrReferenceSchema = z.object({
  title: z.coerce.number().int().positive().optional(),
  chapter: z.union([z.string(), z.number().transform(String)]).nullish(),
});

export type CfrReference = z.infer<typeof CfrReferenceSchema>;

export interface AgencyFeedEntry {
  name: string;
  short_name?: string | null;
  display_name?: string | null;
  slug?: string | null;
  children?: AgencyFeedEntry[];
  cfr_references?: CfrReference[];
}

export const AgencyFeedEntrySchema: z.ZodType<AgencyFeedEntry, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    short_name: z.string().nullish(),
    display_name: z.string().nullish(),
    slug: z.string().nullish(),
    children: z.array(AgencyFeedEntrySchema).optional(),
    cfr_references: z.array(CfrReferenceSchema).optional(),
  })
);

export const AgencyFeedSchema = z.object({
  agencies: z.array(AgencyFeedEntrySchema),
});

export type AgencyFeed = z.infer<typeof AgencyFeedSchema>;

/**
 * The name an agency is listed and keyed by
 */
export function displayName(agency: AgencyFeedEntry): string {
  return agency.display_name || agency.name;
}

/**
 * Depth-first flattening of agencies and their children, in feed order
 */
export function flattenAgencies(agencies: AgencyFeedEntry[]): AgencyFeedEntry[] {
  const flat: AgencyFeedEntry[] = [];
  const visit = (agency: AgencyFeedEntry): void => {
    flat.push(agency);
    for (const child of agency.children ?? []) {
      visit(child);
    }
  };
  agencies.forEach(visit);
  return flat;
}
