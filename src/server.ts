import express from 'express';
import http from 'http';
import cors from 'cors';
import { Server } from 'socket.io';
import type { ServerConfig } from './config';
import type { PublicResult } from './net/dto';
import { parseScoreRequest, toPublicResult } from './net/dto';
import { getRule, listRules } from './rules/RuleRegistry';
import { score } from './scoring/score';

export const LOG_TAG = '[riichi-scorer]';

type Handled = { status: 200 | 400 | 422; body: PublicResult | { ok: false; error: { kind: 'BadRequest'; message: string } } };

/** Shared by the HTTP route and the socket event. */
export function handleScore(body: unknown, config: ServerConfig): Handled {
  const parsed = parseScoreRequest(body);
  if (!parsed.ok) {
    console.log(`${LOG_TAG} rejected request: ${parsed.message}`);
    return { status: 400, body: { ok: false, error: { kind: 'BadRequest', message: parsed.message } } };
  }

  const { hand, context, rule } = parsed.request;
  const result = toPublicResult(score(hand, context, getRule(rule ?? config.ruleSet)));
  if (!result.ok) console.log(`${LOG_TAG} ${result.error.kind}: ${result.error.message}`);
  return { status: result.ok ? 200 : 422, body: result };
}

export function createServer(config: ServerConfig) {
  const app = express();
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: '64kb' }));

  app.get('/health', (_req, res) => res.json({ ok: true }));
  app.get('/rules', (_req, res) => res.json({ default: config.ruleSet, rules: listRules() }));

  app.post('/score', (req, res) => {
    const out = handleScore(req.body, config);
    res.status(out.status).json(out.body);
  });

  const server = http.createServer(app);
  const io = new Server(server, { cors: { origin: config.corsOrigin, credentials: true } });

  io.on('connection', (socket) => {
    socket.on('score', (body: unknown) => {
      const out = handleScore(body, config);
      if (out.status === 400 && !out.body.ok) {
        socket.emit('errorMsg', { message: out.body.error.message });
        return;
      }
      socket.emit('scoreResult', out.body);
    });
  });

  return { app, server, io };
}
