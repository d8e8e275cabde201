import { cleanEnv, makeValidator, num, str, bool } from 'envalid';

export const positiveInt = makeValidator<number>(input => {
  const value = Number(input);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`Expected a positive whole number, got "${input}"`);
  }
  return value;
});


export const APP_ENV = cleanEnv(process.env, {
  NAVIDROME_URL: str({ default: '', desc: 'Base URL of the Navidrome server, e.g. http://localhost:4533' }),
  NAVIDROME_USERNAME: str({ default: '', desc: 'Navidrome username used for /auth/login' }),
  NAVIDROME_PASSWORD: str({ default: '', desc: 'Navidrome password used for /auth/login' }),
  NAVIDROME_LIBRARY_ID: str({ default: '', desc: 'Optional music folder id when the server hosts several libraries' }),
  NAVIDROME_TIMEOUT: num({ default: 30000, desc: 'Subsonic API request timeout in milliseconds' }),
  // AI curation (optional - algorithmic selection is used without it)
  AI_PROVIDER: str({ default: 'openrouter', choices: ['openrouter', 'groq', 'ollama'], desc: 'Chat-completions provider' }),
  AI_API_KEY: str({ default: '', desc: 'API key for OpenRouter or Groq (not needed for Ollama)' }),
  AI_MODEL: str({ default: '', desc: 'Model override (default: provider default model)' }),
  AI_TIMEOUT: num({ default: 30000, desc: 'Request timeout for hosted providers in milliseconds' }),
  OLLAMA_BASE_URL: str({ default: 'http://localhost:11434/v1/chat/completions', desc: 'Ollama chat-completions endpoint' }),
  OLLAMA_TIMEOUT: num({ default: 180000, desc: 'Request timeout for Ollama in milliseconds (local models can be slow)' }),
  // Storage
  DATABASE_PATH: str({ default: './data/magiclists.db' }),
  RECIPES_DIR: str({ default: './recipes', desc: 'Directory holding registry.json and recipe files' }),
  // Schedules
  REDISCOVER_CRON: str({ default: '0 6 * * 1', desc: 'Schedule for Re-Discover Weekly (default: Monday 6am)' }),
  THIS_IS_CRON: str({ default: '0 7 * * 1', desc: 'Schedule for refreshing stored This Is playlists (default: Monday 7am)' }),
  // Generation parameters
  REDISCOVER_MAX_TRACKS: positiveInt({ default: 20 }),
  REDISCOVER_USE_AI: bool({ default: true }),
  THIS_IS_MAX_TRACKS: positiveInt({ default: 20 }),
  HISTORY_ARTIST_LIMIT: positiveInt({ default: 50, desc: 'Artists scanned when building play-count history without scrobbles' }),
  HISTORY_CONCURRENCY: positiveInt({ default: 4, desc: 'Concurrent artist requests while building play-count history' }),
  LOG_LEVEL: str({ default: 'info', choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] })
});

export type AppEnv = typeof APP_ENV;
