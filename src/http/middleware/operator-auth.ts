import type { FastifyRequest, FastifyReply } from 'fastify';
import crypto from 'node:crypto';

/**
 * Builds a preHandler protecting operator endpoints with a Bearer API key.
 * Without a configured key every request is refused.
 */
export function operatorAuthMiddleware(apiKey: string | undefined) {
  return async function operatorAuth(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<void> {
    const authHeader = request.headers.authorization;
    if (apiKey && authHeader) {
      const token = authHeader.replace(/^Bearer\s+/i, '');
      const expected = Buffer.from(apiKey);
      const provided = Buffer.from(token);

      if (
        provided.length === expected.length &&
        crypto.timingSafeEqual(provided, expected)
      ) {
        return;
      }
    }

    return reply.code(401).send({
      statusCode: 401,
      error: 'UNAUTHORIZED',
      message: 'Operator endpoints require authentication via API key'
    });
  };
}
