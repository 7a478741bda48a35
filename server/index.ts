import { fileURLToPath } from 'url';
import { createApp, findStaticDir } from './app';
import { configurationWarnings, loadConfig } from './config';
import { log } from './log';
import { createExplanationRequester } from './services/explanationService';

const config = loadConfig();
for (const warning of configurationWarnings(config)) {
  log(warning.message, 'config');
}

const staticDir =
  process.env.NODE_ENV === 'production'
    ? findStaticDir(fileURLToPath(new URL('../dist/public', import.meta.url)))
    : undefined;

const app = createApp({
  config,
  requester: createExplanationRequester(config.explanation),
  staticDir,
});

const server = app.listen(config.port, '0.0.0.0', () => {
  log(`serving on port ${config.port}`);
});

server.on('error', (error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
