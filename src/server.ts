// src/server.ts
import express from 'express';
import { MatcherClient } from './adapters/matcher_client';
import { createRoutingCore, type CoreOverrides } from './app/bootstrap';
import { assertConfig, cfg, loadRouterConfig } from './core/config';
import { logInfo } from './core/logger';
import { requestId } from './middleware/requestId';
import { createUtteranceWebhook } from './webhooks/utterance_webhook';

export function buildServer() {
  const config = loadRouterConfig();
  const remote = Boolean(cfg.MATCHER_BASE_URL);
  assertConfig({ remoteMatchers: remote });

  const overrides: CoreOverrides = {};
  if (remote) {
    const client = new MatcherClient({
      baseUrl: cfg.MATCHER_BASE_URL,
      token: cfg.MATCHER_API_TOKEN || undefined,
      timeoutMs: cfg.MATCHER_TIMEOUT_MS,
    });
    overrides.keyword = client.keyword();
    overrides.commonQa = client.commonQa();
    overrides.statistical = client.statistical();
  }
  const core = createRoutingCore(config, overrides);

  const app = express();
  app.use(express.json());
  app.use(requestId());
  app.get('/healthz', (_, res) => res.json({ ok: true, ts: new Date().toISOString() }));
  app.use('/webhooks', createUtteranceWebhook(core));

  return { app, core, config };
}

if (require.main === module) {
  const { app, config } = buildServer();
  const PORT = Number(cfg.PORT);
  app.listen(PORT, '0.0.0.0', () => {
    logInfo('server.listening', {
      url: `http://0.0.0.0:${PORT}`,
      lang: config.lang,
      routes: ['GET /healthz', 'POST /webhooks/utterance', 'GET /webhooks/fallbacks', 'GET /webhooks/skills/active'],
    });
  });
}
