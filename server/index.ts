import { serve } from '@hono/node-server';
import { createApp, createDeps } from './app.js';
import { loadConfig } from './config.js';

const config = loadConfig();
const app = createApp(createDeps(config));

serve({ fetch: app.fetch, port: config.port });
console.log(`[server] listening on :${config.port}`);
if (!config.newsApiKey) console.warn('[server] NEWS_API_KEY not set; scans will fall back to neutral analyses');
