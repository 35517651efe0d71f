/**
 * pseudolex generation routes - stateless
 *
 * Every request builds its own WordGenerator from the body, so a `seed`
 * reproduces the same output across calls.
 *
 * GET  /v1/languages   → registered language names and corpus codes
 * POST /v1/words       → { words }
 * POST /v1/sentences   → { sentences }
 * POST /v1/paragraphs  → { paragraphs }
 */

import type { FastifyBaseLogger, FastifyInstance } from "fastify";
import { z } from "zod";
import { DEFAULT_PARAGRAPH_BOUNDS, DEFAULT_REAL_WORD_MIN_ZIPF } from "@pseudolex/shared-types";
import { DEFAULT_LANGUAGE } from "@pseudolex/languages";
import type { LanguageRegistry } from "@pseudolex/languages";
import { TextGenerator, WordGenerator, validateConfig } from "@pseudolex/generator";
import type { GenerationConfig } from "@pseudolex/generator";

export type GenerateRouteOptions = {
  registry: LanguageRegistry;
  maxBatch: number;
};

// ─── Body schemas ─────────────────────────────────────────────────────────────

// Generation is synchronous: these caps bound how long one request holds the event loop.
export const REQUEST_LIMITS = {
  wordLength: 40,
  syllables: 12,
  wordsPerSentence: 50,
  sentencesPerParagraph: 20,
  /** Total words per request, as a multiple of `maxBatch` */
  wordsPerBatchItem: 20,
} as const;

const GeneratorBodySchema = z.object({
  language: z.string().min(1).default(DEFAULT_LANGUAGE),
  minLength: z.number().int().max(REQUEST_LIMITS.wordLength).optional(),
  maxLength: z.number().int().max(REQUEST_LIMITS.wordLength).optional(),
  minSyllables: z.number().int().max(REQUEST_LIMITS.syllables).optional(),
  maxSyllables: z.number().int().max(REQUEST_LIMITS.syllables).optional(),
  strictness: z.enum(["loose", "medium", "strict", "very_strict"]).default("medium"),
  allowRealWords: z.boolean().default(false),
  bannedWords: z.array(z.string()).default([]),
  knownWords: z.array(z.string().min(1)).default([]),
  seed: z.union([z.number().int(), z.string().min(1)]).optional(),
  realWordMinZipf: z.number().min(0).max(8).default(DEFAULT_REAL_WORD_MIN_ZIPF),
});

type GeneratorBody = z.infer<typeof GeneratorBodySchema>;

const WordsBodySchema = GeneratorBodySchema.extend({
  count: z.number().int().min(1).default(10),
  unique: z.boolean().default(true),
});

const SentencesBodySchema = GeneratorBodySchema.extend({
  count: z.number().int().min(1).default(5),
  minWords: z.number().int().max(REQUEST_LIMITS.wordsPerSentence).default(DEFAULT_PARAGRAPH_BOUNDS.minWords),
  maxWords: z.number().int().max(REQUEST_LIMITS.wordsPerSentence).default(DEFAULT_PARAGRAPH_BOUNDS.maxWords),
});

const ParagraphsBodySchema = SentencesBodySchema.extend({
  count: z.number().int().min(1).default(3),
  minSentences: z.number().int().max(REQUEST_LIMITS.sentencesPerParagraph).default(DEFAULT_PARAGRAPH_BOUNDS.minSentences),
  maxSentences: z.number().int().max(REQUEST_LIMITS.sentencesPerParagraph).default(DEFAULT_PARAGRAPH_BOUNDS.maxSentences),
});

function ok(data: unknown, requestId: string) {
  return { data, requestId };
}

function badRequest(message: string, requestId: string) {
  return { data: null, requestId, errors: [{ code: "BAD_REQUEST", message }] };
}

function issueMessage(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "Invalid body";
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

// ─── Generator construction ───────────────────────────────────────────────────

/**
 * Checks every bound in the body at once (word and text bounds alike), then
 * builds the generator. Throws ConfigError / UnknownLanguageError; the app
 * error handler maps both.
 */
function buildGenerator(body: GeneratorBody & GenerationConfig, registry: LanguageRegistry, logger: FastifyBaseLogger): WordGenerator {
  validateConfig(body);
  return new WordGenerator({
    languagePlugin: registry.get(body.language),
    minLength: body.minLength,
    maxLength: body.maxLength,
    minSyllables: body.minSyllables,
    maxSyllables: body.maxSyllables,
    strictness: body.strictness,
    allowRealWords: body.allowRealWords,
    bannedWords: body.bannedWords,
    knownWords: body.knownWords,
    seed: body.seed,
    realWordMinZipf: body.realWordMinZipf,
    logger,
  });
}

// ─── Route registration ───────────────────────────────────────────────────────

export async function generateRoutes(fastify: FastifyInstance, opts: GenerateRouteOptions): Promise<void> {
  const { registry, maxBatch } = opts;
  const wordBudget = maxBatch * REQUEST_LIMITS.wordsPerBatchItem;
  // `words` is the most the request could produce
  const tooMany = (count: number, words: number) => {
    if (count > maxBatch) return `count must not exceed ${maxBatch}`;
    if (words > wordBudget) return `request would generate up to ${words} words; the limit is ${wordBudget}`;
    return null;
  };

  fastify.get("/v1/languages", async (req, reply) => {
    const languages = registry.listNames().map(name => ({ name, code: registry.get(name).code }));
    return reply.send(ok({ languages, default: DEFAULT_LANGUAGE }, req.id));
  });

  fastify.post("/v1/words", async (req, reply) => {
    const parsed = WordsBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) return reply.code(400).send(badRequest(issueMessage(parsed.error), req.id));
    const body = parsed.data;
    const limit = tooMany(body.count, body.count);
    if (limit) return reply.code(400).send(badRequest(limit, req.id));

    const generator = buildGenerator(body, registry, req.log);
    const words = generator.generateMany(body.count, body.unique);
    return reply.send(ok({ words, language: generator.plugin.name, strictness: generator.strictness }, req.id));
  });

  fastify.post("/v1/sentences", async (req, reply) => {
    const parsed = SentencesBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) return reply.code(400).send(badRequest(issueMessage(parsed.error), req.id));
    const body = parsed.data;
    const limit = tooMany(body.count, body.count * body.maxWords);
    if (limit) return reply.code(400).send(badRequest(limit, req.id));

    const generator = buildGenerator(body, registry, req.log);
    const text = new TextGenerator(generator, generator.random);
    const sentences = text.sentences(body.count, body.minWords, body.maxWords);
    return reply.send(ok({ sentences, language: generator.plugin.name }, req.id));
  });

  fastify.post("/v1/paragraphs", async (req, reply) => {
    const parsed = ParagraphsBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) return reply.code(400).send(badRequest(issueMessage(parsed.error), req.id));
    const body = parsed.data;
    const limit = tooMany(body.count, body.count * body.maxSentences * body.maxWords);
    if (limit) return reply.code(400).send(badRequest(limit, req.id));

    const generator = buildGenerator(body, registry, req.log);
    const text = new TextGenerator(generator, generator.random);
    const paragraphs = text.paragraphs(body.count, body.minSentences, body.maxSentences, body.minWords, body.maxWords);
    return reply.send(ok({ paragraphs, language: generator.plugin.name }, req.id));
  });
}
