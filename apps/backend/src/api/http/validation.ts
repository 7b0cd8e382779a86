// =============================================================================
// Request Validation
// =============================================================================
// zValidator hooks and shared query schemas. Validation failures are raised as
// InvalidArgumentError and answered by the global error handler.

import { z } from 'zod';
import { ProviderSchema, type SearchFilter } from '@chat-recall/shared-types';
import { InvalidArgumentError } from '../../domain/errors/index.js';

/**
 * Hook for zValidator: throw on failure, let the global error handler respond
 */
export function rejectInvalid(result: { success: boolean; error?: z.ZodError }): void {
  if (!result.success && result.error) {
    throw new InvalidArgumentError(
      result.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ')
    );
  }
}

const timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

/**
 * `providers=openai,google` as a provider list
 */
const providerList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((provider) => provider.trim())
      .filter((provider) => provider.length > 0)
  )
  .pipe(z.array(ProviderSchema).min(1));

export const filterQuerySchema = z.object({
  providers: providerList.optional(),
  since: timestamp.optional(),
  until: timestamp.optional(),
});

export type FilterQuery = z.infer<typeof filterQuerySchema>;

export function toSearchFilter(query: FilterQuery): SearchFilter | undefined {
  if (!query.providers && !query.since && !query.until) {
    return undefined;
  }
  return { providers: query.providers, since: query.since, until: query.until };
}
