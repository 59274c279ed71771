import 'dotenv/config';
import { ZodError } from 'zod';
import { configSchema, type Config } from './validation.js';

const parseIntEnv = (value: string | undefined): number | undefined =>
  value ? parseInt(value, 10) : undefined;

const parseFloatEnv = (value: string | undefined): number | undefined =>
  value ? parseFloat(value) : undefined;

function loadConfig(): Config {
  const provider = process.env.LLM_PROVIDER;

  const rawConfig = {
    server: {
      nodeEnv: process.env.NODE_ENV,
      port: parseIntEnv(process.env.PORT),
      host: process.env.HOST || undefined,
      logLevel: process.env.LOG_LEVEL || undefined,
    },
    llm: {
      provider: provider || undefined,
      apiKey: (provider === 'anthropic'
        ? process.env.ANTHROPIC_API_KEY
        : provider === 'openrouter'
        ? process.env.OPENROUTER_API_KEY
        : process.env.OPENAI_API_KEY) || '',
      model: process.env.LLM_MODEL || undefined,
      maxTokens: parseIntEnv(process.env.LLM_MAX_TOKENS),
      temperature: parseFloatEnv(process.env.LLM_TEMPERATURE),
    },
    coaching: {
      enabled: process.env.COACHING_ENABLED !== 'false',
      dbPath: process.env.COACHING_DB_PATH || undefined,
      maxAdvisorAttempts: parseIntEnv(process.env.COACHING_ADVISOR_ATTEMPTS),
      advisorBaseDelayMs: parseIntEnv(process.env.COACHING_ADVISOR_BASE_DELAY_MS),
      goldenThreshold: parseFloatEnv(process.env.COACHING_GOLDEN_THRESHOLD),
      defaultMaxRounds: parseIntEnv(process.env.COACHING_DEFAULT_MAX_ROUNDS),
      selfEvaluationDiscount: parseFloatEnv(process.env.COACHING_SELF_EVAL_DISCOUNT),
    },
    orchestrator: {
      maxParallel: parseIntEnv(process.env.ORCHESTRATOR_MAX_PARALLEL),
      sectionPatternsPath: process.env.SECTION_PATTERNS_PATH || undefined,
    },
  };

  try {
    return configSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('\n❌ Invalid configuration:\n');
      error.issues.forEach(issue => {
        const field = issue.path.join('.');
        console.error(`  ${field}: ${issue.message}`);
      });
      console.error('\nCheck .env file and compare with .env.example\n');
    } else {
      console.error('Config error:', error);
    }
    process.exit(1);
  }
}

export const config = loadConfig();
