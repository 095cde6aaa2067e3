import dotenv from 'dotenv';

dotenv.config();

function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function flag(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function list(key: string, defaultValue: string): string[] {
  return optional(key, defaultValue)
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

const googleKey = optional('GOOGLE_AI_API_KEY', '');
const anthropicKey = optional('ANTHROPIC_API_KEY', '');

export const config = {
  // Server
  port: parseInt(optional('PORT', '4000'), 10),
  nodeEnv: optional('NODE_ENV', 'development'),
  clientUrl: optional('CLIENT_URL', 'http://localhost:3000'),

  // Without a model key every request takes the static path
  devMode: flag('DEV_MODE', false) || (!googleKey && !anthropicKey),

  // AI Providers
  ai: {
    google: googleKey,
    anthropic: anthropicKey,
    geminiModels: list('GEMINI_MODELS', 'gemini-1.5-flash,gemini-1.5-pro'),
    claudeModel: optional('CLAUDE_MODEL', 'claude-3-5-haiku-20241022'),
    geminiImageModel: optional('GEMINI_IMAGE_MODEL', 'gemini-2.0-flash-exp'),
    imageGeneration: flag('IMAGE_GENERATION', false),
  },

  // Game content & storage
  paths: {
    dataDir: optional('DATA_DIR', 'data'),
    riddlesFile: optional('RIDDLES_FILE', 'server/data/riddles.json'),
    sampleImageDir: optional('SAMPLE_IMAGE_DIR', 'sampleimg'),
  },
} as const;

export type Config = typeof config;
