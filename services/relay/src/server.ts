import Fastify, { type FastifyServerOptions } from 'fastify';
import formbody from '@fastify/formbody';
import type { YoinkStorageBackend } from './contracts/yoinkStorage';
import { IngestionEncoder } from './core/ingestion';
import { RetrievalEngine } from './core/retrieval';
import type { ErrorBody } from './errors';
import { registerPageRoutes } from './routes/pages';
import { registerYoinkRoutes } from './routes/yoinks';
import type { Config } from './config';

export interface BuildAppOptions {
  /** Opened by the caller, shared by every request, closed by the caller. */
  storage: YoinkStorageBackend;
  logger?: FastifyServerOptions['logger'];
  timeouts?: Config['timeouts'];
}

export async function buildApp({ storage, logger = false, timeouts }: BuildAppOptions) {
  const app = Fastify({
    logger,
    requestTimeout: timeouts?.requestMs,
    connectionTimeout: timeouts?.connectionMs,
    keepAliveTimeout: timeouts?.keepAliveMs,
  });

  await app.register(formbody);

  app.get('/health', async (req) => {
    try {
      await storage.ping();
      return { status: 'ok', storage: 'ok' };
    } catch (err) {
      req.log.error({ err }, 'Storage health check failed');
      return { status: 'degraded', storage: 'error' };
    }
  });

  await registerPageRoutes(app);
  await registerYoinkRoutes(app, {
    ingestion: new IngestionEncoder(storage),
    retrieval: new RetrievalEngine(storage),
  });

  app.setNotFoundHandler(async (req, reply) => {
    const body: ErrorBody = { error: `route ${req.method} ${req.url} not found`, detail: 'Not Found', status: 404 };
    return reply.code(404).send(body);
  });

  app.setErrorHandler(async (err, req, reply) => {
    const status = err.statusCode && err.statusCode >= 400 ? err.statusCode : 500;
    if (status >= 500) req.log.error({ err }, 'Unhandled request error');
    const body: ErrorBody = {
      error: err.message,
      detail: status >= 500 ? 'Internal Server Error' : 'Bad Request',
      status,
    };
    return reply.code(status).send(body);
  });

  return app;
}
