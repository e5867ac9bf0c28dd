// Load .env only in non-test environments (using dynamic import for ESM)
const _loadEnv =
  process.env.NODE_ENV !== 'test' && !process.env.VITEST ? import('dotenv/config').catch(() => {}) : Promise.resolve();
await _loadEnv;
import Fastify, { type FastifyError } from 'fastify';
import { type ZodTypeProvider, serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import { Builder, BuildError } from './build/builder.js';
import { HttpCodeSynthesizer, HttpPublisher, SharedSecretVerifier } from './build/collaborators.js';
import { openLedger, type Ledger } from './ledger/index.js';
import { buildRequestSchema, submissionBodySchema } from './schemas.js';
import { SubmissionRejectedError, ingestSubmission } from './submissions.js';
import { errorMessage } from './utils.js';

export interface ServerDeps {
  ledger: Ledger;
  // Without one, the build/revise routes answer 503.
  builder?: Builder;
  logger?: boolean;
}

// Structural so it accepts the reply of any typed route.
interface ReplyLike {
  code(statusCode: number): { send(payload: unknown): unknown };
}

function sendError(reply: ReplyLike, status: number, code: string, message: string) {
  return reply.code(status).send({ error: { code, message } });
}

export function buildServer(deps: ServerDeps) {
  const app = Fastify({ logger: deps.logger ?? false }).withTypeProvider<ZodTypeProvider>();
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.setErrorHandler<FastifyError>((err, request, reply) => {
    if (err.validation || err.code === 'FST_ERR_VALIDATION') {
      return sendError(reply, 400, 'invalid_request', err.message);
    }
    if (typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500) {
      return sendError(reply, err.statusCode, err.code || 'bad_request', err.message);
    }
    console.error(`[server] ${request.method} ${request.url} failed: ${errorMessage(err)}`);
    return sendError(reply, 500, 'internal_error', 'Internal server error');
  });

  app.get('/health', async () => ({ ok: true }));

  app.post('/api/evaluation', { schema: { body: submissionBodySchema } }, async (request, reply) => {
    try {
      const submission = await ingestSubmission(deps.ledger, request.body);
      return { success: true, submission };
    } catch (err) {
      if (err instanceof SubmissionRejectedError) return sendError(reply, 400, err.code, err.message);
      throw err;
    }
  });

  const buildFailure = (reply: ReplyLike, err: unknown) => {
    if (err instanceof BuildError) return sendError(reply, err.statusCode, err.code, err.message);
    throw err;
  };

  app.post('/api/build', { schema: { body: buildRequestSchema } }, async (request, reply) => {
    if (!deps.builder) return sendError(reply, 503, 'build_unavailable', 'Build workflow is not configured');
    try {
      return await deps.builder.build(request.body);
    } catch (err) {
      return buildFailure(reply, err);
    }
  });

  app.post('/api/revise', { schema: { body: buildRequestSchema } }, async (request, reply) => {
    if (!deps.builder) return sendError(reply, 503, 'build_unavailable', 'Build workflow is not configured');
    try {
      return await deps.builder.revise(request.body);
    } catch (err) {
      return buildFailure(reply, err);
    }
  });

  return app;
}

function builderFromEnv(ledger: Ledger): Builder | undefined {
  if (!process.env.SYNTH_URL || !process.env.PUBLISH_URL) {
    console.warn('[server] SYNTH_URL/PUBLISH_URL not set; /api/build and /api/revise disabled');
    return undefined;
  }
  return new Builder({
    ledger,
    synthesizer: new HttpCodeSynthesizer(),
    publisher: new HttpPublisher(),
    verifier: new SharedSecretVerifier(),
  });
}

if (process.env.NODE_ENV !== 'test' && import.meta.url === `file://${process.argv[1]}`) {
  const ledger = await openLedger();
  const app = buildServer({ ledger, builder: builderFromEnv(ledger), logger: true });
  app.addHook('onClose', async () => {
    await ledger.close();
  });
  const port = process.env.PORT ? Number(process.env.PORT) : 3000;
  const host = process.env.HOST ?? '0.0.0.0';
  try {
    await app.listen({ port, host });
    console.log(`[server] listening on ${host}:${port}`);
  } catch (err) {
    console.error('[server] failed to start', err);
    await ledger.close();
    process.exitCode = 1;
  }
}
