import { createApp } from './app.js';
import { DEFAULT_AUTH_KEY, loadConfig, type AppConfig } from './config.js';
import type { Generator } from './types.js';
import { GeminiGenerator } from './services/geminiGenerator.js';
import { HoneypotService } from './services/honeypotService.js';
import { OpenRouterGenerator } from './services/openRouterGenerator.js';
import { Pipeline } from './services/pipeline.js';
import { ReplyStrategist } from './services/replyStrategist.js';
import { Reporter } from './services/reporter.js';
import { SessionStore } from './services/sessionStore.js';

function createGenerator({ generation }: AppConfig): Generator {
  const { provider, apiKey, model } = generation;
  return provider === 'gemini'
    ? new GeminiGenerator({ apiKey, model })
    : new OpenRouterGenerator({ apiKey, model });
}

const config = loadConfig();
const generator = createGenerator(config);

const store = new SessionStore({ ttlMs: config.sessionTtlMs });
const pipeline = new Pipeline({
  replies: new ReplyStrategist(generator, {
    timeoutMs: config.generation.timeoutMs,
    maxTokens: config.generation.maxTokens,
  }),
  minArtifacts: config.finalizeMinArtifacts,
});
const service = new HoneypotService({
  store,
  pipeline,
  reporter: new Reporter(config.collector),
  historyWindow: config.historyWindow,
});

const app = createApp({
  service,
  store,
  authKey: config.authKey,
  generationConfigured: generator.configured,
});

// Sessions live in memory; without a TTL the registry grows for the life of the process.
let sweeper: ReturnType<typeof setInterval> | undefined;
if (config.sessionTtlMs > 0) {
  sweeper = setInterval(() => {
    const evicted = store.sweep();
    if (evicted.length > 0) console.log(`🧹 Evicted ${evicted.length} idle session(s)`);
  }, config.sessionSweepMs);
  sweeper.unref();
}

const server = app.listen(config.port, '0.0.0.0', () => {
  console.log(`🚀 Decoy agent ready on port ${config.port}`);
  console.log(`🔐 Auth: ${config.authKey === DEFAULT_AUTH_KEY ? '⚠️ DEFAULT KEY (set AUTH_KEY env var!)' : '✅ Custom key'}`);
  console.log(`🤖 Model: ${config.generation.provider}/${config.generation.model}${generator.configured ? '' : ' (no API_KEY, fallback replies only)'}`);
  console.log(`🧾 Finalize after ${config.finalizeMinArtifacts} artifact categories`);
  if (config.sessionTtlMs <= 0) console.warn('⚠️ Session eviction disabled; memory grows with every new session');
});

function shutdown(signal: string): void {
  console.log(`🛑 ${signal} received, closing server`);
  clearInterval(sweeper);
  server.close((err) => {
    if (err) {
      console.error('❌ Error while closing server:', err.message);
      process.exitCode = 1;
    }
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
