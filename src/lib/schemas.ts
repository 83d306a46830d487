import { z } from 'zod';

export const GwtConfigSchema = z.object({
  rootDir: z.string().min(1),
  remote: z.string().min(1),
  debug: z.boolean(),
});

export const PartialGwtConfigSchema = GwtConfigSchema.partial();

export const PullRequestViewSchema = z.object({
  headRefName: z.string().nullable().optional(),
});
