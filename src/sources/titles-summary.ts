import { z } from 'zod';

/**
 * Schema for the eCFR titles summary (`/api/versioner/v1/titles.json`)
 */
export const TitlesSummarySchema = z.object({
  titles: z.array(
    z.object({
      number: z.number().int(),
      name: z.string(),
      latest_amended_on: z.string().nullish(),
      latest_issue_date: z.string().nullish(),
      up_to_date_as_of: z.string().nullish(),
      reserved: z.boolean().optional(),
    })
  ),
});
