// MEDIA AI SERVICES HTTP SERVER
// Loads settings from the environment and serves the app on Node

import { serve } from '@hono/node-server';
import { createApp } from './app';
import { loadSettings } from './lib/config';
import { createServices } from './providers';

const settings = loadSettings();
const services = createServices(settings);
const app = createApp(services);

serve({ fetch: app.fetch, port: settings.port }, (info) => {
  console.log(`Media AI services listening on port ${info.port}`);
  console.log(`Mode: ${services.mode}`);
});
