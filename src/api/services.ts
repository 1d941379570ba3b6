import type { JsonErrorRepository } from '../errors/jsonErrorRepository';
import type { GpuStatusProvider, GpuThresholds } from '../gpu/gpuStatus';
import type { ModelRole, ModelSource } from '../models/ollamaClient';
import type { ThemeName } from '../embed/styles/tokens';

/** Everything the routes need, so tests can hand in fakes. */
export interface AppServices {
  errorRepository: JsonErrorRepository;
  gpuProvider: GpuStatusProvider;
  modelSource: ModelSource;
  settings: {
    apiKey: string;
    defaultTheme: ThemeName;
    thresholds: GpuThresholds;
    roles: Record<ModelRole, string>;
  };
}
