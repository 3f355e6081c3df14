import { z } from 'zod';

import rawCatalog from './providers.json';

export const ProviderKindSchema = z.enum(['openai-compatible', 'anthropic', 'google']);

export const ProviderEntrySchema = z
  .object({
    kind: ProviderKindSchema,
    baseURL: z.string().url().optional(),
    models: z.array(z.string().min(1)).min(1),
  })
  .refine((entry) => entry.kind !== 'openai-compatible' || Boolean(entry.baseURL), {
    message: 'openai-compatible providers need a baseURL',
  });

export const ProviderCatalogSchema = z.record(z.string().min(1), ProviderEntrySchema);

export type ProviderKind = z.infer<typeof ProviderKindSchema>;
export type ProviderEntry = z.infer<typeof ProviderEntrySchema>;
export type ProviderCatalog = z.infer<typeof ProviderCatalogSchema>;

export function parseProviderCatalog(input: unknown): ProviderCatalog {
  const result = ProviderCatalogSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid provider catalogue: ${issues}`);
  }
  return result.data;
}

export const PROVIDER_CATALOG: ProviderCatalog = parseProviderCatalog(rawCatalog);

export function findProvider(
  name: string,
  catalog: ProviderCatalog = PROVIDER_CATALOG,
): ProviderEntry | undefined {
  return Object.prototype.hasOwnProperty.call(catalog, name) ? catalog[name] : undefined;
}

export function apiKeyVariable(provider: string): string {
  return `${provider.toUpperCase()}_API_KEY`;
}

export default {
  PROVIDER_CATALOG,
  parseProviderCatalog,
  findProvider,
  apiKeyVariable,
};
