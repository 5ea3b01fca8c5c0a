import { FastifyRequest, FastifyReply, HookHandlerDoneFunction } from 'fastify';

function extractToken(request: FastifyRequest): string | undefined {
  const apiKeyHeader = request.headers['x-api-key'];
  if (apiKeyHeader) {
    return Array.isArray(apiKeyHeader) ? apiKeyHeader[0] : apiKeyHeader;
  }

  const authHeader = request.headers.authorization;
  if (!authHeader) return undefined;

  const [scheme, token, ...rest] = authHeader.split(' ');
  if (rest.length > 0 || !token) return undefined;
  const lower = scheme.toLowerCase();
  return lower === 'bearer' || lower === 'token' ? token : undefined;
}

/** Accepts `X-API-Key: <key>` or `Authorization: Bearer|Token <key>`. */
export function createAuthHook(apiKeys: string[]) {
  const keySet = new Set(apiKeys);

  return function authHook(
    request: FastifyRequest,
    reply: FastifyReply,
    done: HookHandlerDoneFunction
  ): void {
    const token = extractToken(request);

    if (!token) {
      reply.code(401).send({ error: 'Missing Authorization header or X-API-Key' });
      return;
    }

    if (!keySet.has(token)) {
      reply.code(403).send({ error: 'Invalid API key' });
      return;
    }

    done();
  };
}
