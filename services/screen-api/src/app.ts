import Fastify, { type FastifyInstance, type FastifyReply } from "fastify";
import { z } from "zod";
import { ERROR_CODES, noopLogger, type Logger, type ScreenError } from "@concrete-screen/core";
import { buildRequirement, runScreening, type ScreeningScenario } from "@concrete-screen/compliance";
import { createFileRegulationProvider, type RegulationProvider } from "@concrete-screen/regulations";

export interface AppOptions {
  readonly provider?: RegulationProvider;
  readonly logger?: Logger;
}

const scenarioBodySchema = z.object({
  regulation: z.string().trim().min(1),
  classes: z.unknown().optional(),
  user: z.unknown().optional(),
  drawing: z.unknown().optional(),
});

const checkBodySchema = scenarioBodySchema.extend({
  products: z
    .array(
      z.object({
        id: z.string().trim().min(1),
        record: z.unknown().optional(),
        error: z.string().optional(),
      }),
    )
    .min(1),
});

function statusFor(error: ScreenError): number {
  switch (error.code) {
    case ERROR_CODES.regulationNotFound:
    case ERROR_CODES.mappingNotFound:
      return 404;
    case ERROR_CODES.regulationMalformed:
    case ERROR_CODES.mappingMalformed:
      return 422;
    default:
      return 400;
  }
}

function sendError(reply: FastifyReply, error: ScreenError) {
  return reply.code(statusFor(error)).send({ error: error.code, explain: error.explain });
}

function badRequest(reply: FastifyReply, issues: z.ZodIssue[]) {
  return reply.code(400).send({
    error: "bad_request",
    issues: issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
  });
}

function scenarioOf(body: z.infer<typeof scenarioBodySchema>): ScreeningScenario {
  return {
    jurisdiction: body.regulation,
    exposureClasses: body.classes,
    user: body.user,
    drawing: body.drawing,
  };
}

export function buildApp(options: AppOptions = {}): FastifyInstance {
  const logger = options.logger ?? noopLogger;
  const provider = options.provider ?? createFileRegulationProvider({ logger: logger.child("regulations") });
  const fastify = Fastify({ logger: false });

  fastify.addHook("onResponse", async (req, reply) => {
    logger.info("request", { method: req.method, url: req.url, status: reply.statusCode });
  });

  fastify.get("/health", async () => ({ ok: true }));

  fastify.get("/regulations", async (_req, reply) => {
    const listed = provider.listJurisdictions();
    if (!listed.ok) return sendError(reply, listed.error);
    return { regulations: listed.value };
  });

  fastify.get<{ Params: { id: string } }>("/regulations/:id/classes", async (req, reply) => {
    const { id } = req.params;
    const mapping = provider.loadExposureClassMapping(id);
    if (!mapping.ok) return sendError(reply, mapping.error);
    return { regulation: id, classes: mapping.value };
  });

  fastify.post("/requirements", async (req, reply) => {
    const body = scenarioBodySchema.safeParse(req.body);
    if (!body.success) return badRequest(reply, body.error.issues);
    const built = buildRequirement(provider, scenarioOf(body.data), logger);
    if (!built.ok) return sendError(reply, built.error);
    return built.value;
  });

  fastify.post("/check", async (req, reply) => {
    const body = checkBodySchema.safeParse(req.body);
    if (!body.success) return badRequest(reply, body.error.issues);
    const report = runScreening(provider, scenarioOf(body.data), body.data.products, logger);
    if (!report.ok) return sendError(reply, report.error);
    return report.value;
  });

  return fastify;
}
