import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import fs from 'fs';
import path from 'path';
import { log } from './log';
import { registerRoutes } from './routes';
import type { RouteDeps } from './routes';

const MAX_LOG_LINE = 80;

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null) {
    for (const key of ['status', 'statusCode']) {
      const value: unknown = Reflect.get(err, key);
      if (typeof value === 'number' && value >= 400 && value < 600) return value;
    }
  }
  return 500;
}

export interface CreateAppOptions extends RouteDeps {
  /** Built client to serve; omitted in development and tests */
  staticDir?: string;
}

export function createApp({ staticDir, ...deps }: CreateAppOptions) {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.use((req, res, next) => {
    const start = Date.now();
    const reqPath = req.path;
    let capturedJsonResponse: unknown;

    const originalResJson = res.json;
    res.json = function (bodyJson) {
      capturedJsonResponse = bodyJson;
      return originalResJson.call(res, bodyJson);
    };

    res.on('finish', () => {
      if (!reqPath.startsWith('/api')) return;
      let logLine = `${req.method} ${reqPath} ${res.statusCode} in ${Date.now() - start}ms`;
      if (capturedJsonResponse !== undefined) {
        logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
      }
      if (logLine.length > MAX_LOG_LINE) {
        logLine = logLine.slice(0, MAX_LOG_LINE - 1) + '…';
      }
      log(logLine);
    });

    next();
  });

  registerRoutes(app, deps);

  app.use('/api', (_req, res) => {
    res.status(404).json({ message: 'Not found' });
  });

  if (staticDir) {
    app.use(express.static(staticDir));
    app.use('*', (_req, res) => {
      res.sendFile(path.resolve(staticDir, 'index.html'));
    });
  }

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const message = status < 500 && err instanceof Error ? err.message : 'Internal Server Error';
    console.error('Request failed:', err);
    if (res.headersSent) return;
    res.status(status).json({ message });
  });

  return app;
}

export function findStaticDir(dir: string): string | undefined {
  return fs.existsSync(path.join(dir, 'index.html')) ? dir : undefined;
}
