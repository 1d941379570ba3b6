import 'dotenv/config';
import { parseTheme } from '../embed/styles/tokens';

function optional(name: string, fallback: string): string {
  return process.env[name] || fallback;
}

function optionalInt(name: string, fallback: number): number {
  const parsed = parseInt(optional(name, String(fallback)), 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

const defaultModel = optional('DEFAULT_MODEL', 'llama3:8b');

export const config = {
  api: {
    port: optionalInt('PORT', 4060),
    apiKey: optional('API_KEY', ''),
  },

  theme: {
    default: parseTheme(process.env.DEFAULT_THEME, 'light'),
  },

  errors: {
    buildErrorsPath: optional('BUILD_ERRORS_PATH', 'build_errors.json'),
    checkstyleErrorsPath: optional('CHECKSTYLE_ERRORS_PATH', 'checkstyle_error.json'),
  },

  ollama: {
    baseUrl: optional('OLLAMA_BASE_URL', 'http://localhost:11434'),
    timeoutMs: optionalInt('OLLAMA_TIMEOUT_MS', 5000),
    defaultModel,
    roles: {
      generative: optional('GENERATIVE_MODEL', defaultModel),
      review: optional('REVIEW_MODEL', defaultModel),
      summary: optional('SUMMARY_MODEL', defaultModel),
      compare: optional('COMPARE_MODEL', defaultModel),
    },
  },

  gpu: {
    nvidiaSmiPath: optional('NVIDIA_SMI_PATH', 'nvidia-smi'),
    timeoutMs: optionalInt('NVIDIA_SMI_TIMEOUT_MS', 5000),
    // percent / °C; a metric at or above the value reaches that level
    thresholds: {
      utilization: { warning: optionalInt('GPU_WARN_UTIL', 70), critical: optionalInt('GPU_CRIT_UTIL', 90) },
      temperature: { warning: optionalInt('GPU_WARN_TEMP', 75), critical: optionalInt('GPU_CRIT_TEMP', 85) },
      memory: { warning: optionalInt('GPU_WARN_MEM', 80), critical: optionalInt('GPU_CRIT_MEM', 95) },
    },
  },
};

export type AppConfig = typeof config;
