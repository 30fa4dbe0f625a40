// src/routes/pages.ts
import type { FastifyInstance } from 'fastify';
import { config } from '../config';
import { quickstartHtml, welcomeHtml } from '../pages/html';

const startedAt = new Date();

export function versionInfo(): string {
  return (
    'Version information about datayoinker:' +
    `\n\tVersion: ${config.version}` +
    `\n\tRevision: ${config.revision}` +
    `\n\tStarted: ${startedAt.toISOString()}` +
    '\n'
  );
}

export async function registerPageRoutes(app: FastifyInstance) {
  app.get('/', async (_req, reply) => reply.type('text/html; charset=utf-8').send(welcomeHtml));

  app.get('/quickstart', async (_req, reply) => reply.type('text/html; charset=utf-8').send(quickstartHtml));

  app.get('/info', async (_req, reply) => reply.type('text/plain; charset=utf-8').send(versionInfo()));
}
