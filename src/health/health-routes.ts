import { FastifyInstance } from 'fastify';

export function registerHealthRoutes(app: FastifyInstance, shopName: string): void {
  /** Liveness probe: 200 while the process is up */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'healthy', message: `${shopName} is running` });
  });
}
