import { FastifyRequest, FastifyReply } from "fastify";

export const API_KEY_HEADER = "x-worldsmith-api-key";

export async function authenticate(request: FastifyRequest, reply: FastifyReply) {
  const apiKey = request.headers[API_KEY_HEADER];
  const expected = process.env.WORLDSMITH_API_KEY;

  if (!apiKey || !expected || apiKey !== expected) {
    reply.code(401).send({ error: "Unauthorized" });
    return;
  }
}
