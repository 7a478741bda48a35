import type { Express } from 'express';
import { explainRequestSchema, loginRequestSchema } from '../src/api/schemas';
import type { ServerInfo } from '../src/api/schemas';
import { passwordMatches, requireAccess } from './auth';
import type { AppConfig } from './config';
import type { ExplanationRequester } from './services/explanationService';

export interface RouteDeps {
  config: Readonly<AppConfig>;
  requester: ExplanationRequester;
}

export function registerRoutes(app: Express, { config, requester }: RouteDeps): void {
  app.get('/api/config', (_req, res) => {
    const info: ServerInfo = {
      passwordRequired: config.accessPassword !== null,
      model: requester.model,
      explanationConfigured: config.explanation.apiKey !== null,
    };
    res.json(info);
  });

  app.post('/api/login', (req, res) => {
    const parsed = loginRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ message: 'Password is required' });
    }
    if (!passwordMatches(config.accessPassword, parsed.data.password)) {
      return res.status(401).json({ message: 'Incorrect password. Please try again.' });
    }
    res.status(204).end();
  });

  app.post('/api/explain', requireAccess(config.accessPassword), (req, res, next) => {
    const parsed = explainRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return res.status(400).json({ message: issue ? issue.message : 'Invalid request' });
    }

    const { apiKey, ...request } = parsed.data;

    // Stop paying for a completion nobody will read
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    requester
      .explain(request, { apiKey, signal: controller.signal })
      .then((result) => {
        res.json(result);
      })
      .catch(next);
  });
}
