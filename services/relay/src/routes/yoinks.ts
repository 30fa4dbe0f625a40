import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { requireTopic } from '../core/content';
import type { IngestionEncoder } from '../core/ingestion';
import type { RetrievalEngine } from '../core/retrieval';
import { YoinkError } from '../errors';
import { collectParams, parseCount } from '../params';

// ---------- Schemas ----------
const topicParamsSchema = z.object({ topic: z.string() });
const countParamsSchema = topicParamsSchema.extend({ number: z.string() });

type Handler = (req: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply>;

export interface YoinkRouteDeps {
  ingestion: IngestionEncoder;
  retrieval: RetrievalEngine;
}

// ---------- Helper ----------
function respond(run: (req: FastifyRequest) => Promise<unknown>): Handler {
  return async (req, reply) => {
    try {
      return reply.send(await run(req));
    } catch (err) {
      if (!(err instanceof YoinkError)) throw err;
      if (!err.isClientError) req.log.error({ err, kind: err.kind }, err.detail);
      return reply.code(err.status).send(err.toBody());
    }
  };
}

// ---------- Routes ----------
export async function registerYoinkRoutes(app: FastifyInstance, { ingestion, retrieval }: YoinkRouteDeps) {
  const publish = respond((req) => {
    const { topic } = topicParamsSchema.parse(req.params);
    return ingestion.publish(topic, collectParams(req.query, req.body));
  });

  const latest = respond((req) => retrieval.getLatest(topicParamsSchema.parse(req.params).topic));

  const lastN = respond((req) => {
    const { topic, number } = countParamsSchema.parse(req.params);
    // topic first, so an empty topic wins over a bad number
    return retrieval.getLastN(requireTopic(topic), parseCount(number));
  });

  const all = respond((req) => retrieval.getAll(topicParamsSchema.parse(req.params).topic));

  // HAPI endpoints
  app.get('/publish/yoink/for/:topic', publish);
  app.get('/get/all/yoinks/from/:topic', all);
  app.get('/get/latest/yoink/from/:topic', latest);
  app.get('/get/last/:number/yoinks/from/:topic', lastN);
  app.get('/get/:number/last/yoinks/from/:topic', lastN);
  app.get('/get/latest/:number/yoinks/from/:topic', lastN);
  app.get('/get/:number/latest/yoinks/from/:topic', lastN);

  // REST endpoints
  app.post('/yoink/:topic', publish);
  app.get('/yoink/:topic', latest);
  app.get('/yoinks/:topic/:number', lastN);
  app.get('/yoinks/:topic', all);
}
