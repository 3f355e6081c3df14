import { z } from 'zod';

import type { RuntimeSettings } from '../config/settings.js';
import { HttpClient, type HttpClientInterface } from '../utils/fetch.js';

const OllamaTagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

/**
 * Installed Ollama models, or an empty list when the server cannot be
 * reached or the backend is not local.
 */
export async function listLocalModels(
  settings: RuntimeSettings,
  httpClient: HttpClientInterface = new HttpClient(),
): Promise<string[]> {
  if (settings.backend.mode !== 'local') {
    return [];
  }

  try {
    const response = await httpClient.fetch(`${settings.backend.host}/api/tags`);
    if (!response.ok) {
      return [];
    }
    const parsed = OllamaTagsSchema.safeParse(JSON.parse(response.body));
    return parsed.success ? parsed.data.models.map((model) => model.name) : [];
  } catch (_error) {
    return [];
  }
}

export default listLocalModels;
