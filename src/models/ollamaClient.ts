import { z } from 'zod';
import { logger } from '../utils/logger';

export interface ModelInfo {
  id: string;
  name: string;
  description: string;
  pulled: boolean;
  sizeBytes?: number;
}

export const MODEL_ROLES = ['generative', 'review', 'summary', 'compare'] as const;
export type ModelRole = (typeof MODEL_ROLES)[number];

export interface ModelOverview {
  connected: boolean;
  message: string;
  models: ModelInfo[];
}

export interface ModelSource {
  getModelOverview(): Promise<ModelOverview>;
}

export const DEFAULT_MODEL_CATALOG: Array<Omit<ModelInfo, 'pulled'>> = [
  { id: 'llama3:8b', name: 'Llama 3 8B', description: 'General-purpose model, good balance of quality and speed' },
  { id: 'codellama:7b', name: 'Code Llama 7B', description: 'Tuned for code generation and code understanding' },
  { id: 'mistral:7b', name: 'Mistral 7B', description: 'Fast instruction-following model' },
  { id: 'phi3:mini', name: 'Phi-3 Mini', description: 'Small model for low-memory GPUs' },
  { id: 'gemma:2b', name: 'Gemma 2B', description: 'Lightweight model for quick feedback' },
];

const tagsResponseSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string(),
        size: z.number().optional(),
      }),
    )
    .default([]),
});

export type PulledModel = z.infer<typeof tagsResponseSchema>['models'][number];

function matchesId(pulledName: string, id: string): boolean {
  return pulledName === id || pulledName === `${id}:latest`;
}

/** Catalog order first, then pulled models the catalog does not know. */
export function mergeModelCatalog(
  catalog: ReadonlyArray<Omit<ModelInfo, 'pulled'>>,
  pulled: readonly PulledModel[],
): ModelInfo[] {
  const merged: ModelInfo[] = catalog.map((entry) => {
    const match = pulled.find((p) => matchesId(p.name, entry.id));
    return { ...entry, pulled: Boolean(match), ...(match?.size !== undefined ? { sizeBytes: match.size } : {}) };
  });

  for (const p of pulled) {
    if (catalog.some((entry) => matchesId(p.name, entry.id))) continue;
    merged.push({
      id: p.name,
      name: p.name,
      description: 'Pulled locally',
      pulled: true,
      ...(p.size !== undefined ? { sizeBytes: p.size } : {}),
    });
  }
  return merged;
}

export class OllamaClient implements ModelSource {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly opts: {
      baseUrl: string;
      timeoutMs: number;
      catalog?: ReadonlyArray<Omit<ModelInfo, 'pulled'>>;
      fetchImpl?: typeof fetch;
    },
  ) {
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /** Throws when the server is unreachable or answers with something unexpected. */
  async listModels(): Promise<PulledModel[]> {
    const url = new URL('/api/tags', this.opts.baseUrl).toString();
    const resp = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.opts.timeoutMs) });
    if (!resp.ok) {
      throw new Error(`Ollama responded with HTTP ${resp.status}`);
    }
    return tagsResponseSchema.parse(await resp.json()).models;
  }

  async checkConnection(): Promise<{ connected: boolean; message: string }> {
    try {
      const models = await this.listModels();
      return { connected: true, message: `Connected, ${models.length} model(s) pulled` };
    } catch (err) {
      return { connected: false, message: err instanceof Error ? err.message : String(err) };
    }
  }

  async getModelOverview(): Promise<ModelOverview> {
    const catalog = this.opts.catalog ?? DEFAULT_MODEL_CATALOG;
    try {
      const pulled = await this.listModels();
      return {
        connected: true,
        message: `Connected, ${pulled.length} model(s) pulled`,
        models: mergeModelCatalog(catalog, pulled),
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn('Cannot connect to Ollama', { baseUrl: this.opts.baseUrl, error: message });
      return { connected: false, message, models: mergeModelCatalog(catalog, []) };
    }
  }
}
