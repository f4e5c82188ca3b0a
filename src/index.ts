// Load environment variables from .env file
import 'dotenv/config';

import { buildServer, createServices } from './app.js';
import { env, logConfiguration } from './env.js';

const services = createServices();
const server = await buildServer(services);

try {
  await server.listen({ port: env.PORT, host: env.HOST });
  logConfiguration();
  services.sweeper.start();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}

async function shutdown(signal: string) {
  server.log.info({ signal }, 'Shutting down');
  services.sweeper.stop();
  try {
    await server.close();
    process.exit(0);
  } catch (err) {
    server.log.error(err, 'Error during shutdown');
    process.exit(1);
  }
}

process.once('SIGINT', () => void shutdown('SIGINT'));
process.once('SIGTERM', () => void shutdown('SIGTERM'));
