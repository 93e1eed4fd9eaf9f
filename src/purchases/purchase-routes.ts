import { FastifyInstance } from 'fastify';
import { ValidationError } from '../errors/app-error';
import { replyWithError } from '../errors/error-handler';
import { requestLogger } from '../observability/trace';
import { PurchaseReporter } from './purchase-reporter';

export function registerPurchaseRoutes(app: FastifyInstance, reporter: PurchaseReporter): void {
  app.post<{ Body: unknown }>('/purchase', async (req, reply) => {
    const log = requestLogger('/purchase');

    try {
      if (!req.headers['content-type']?.includes('application/json')) {
        throw new ValidationError('Content-Type must be application/json');
      }

      const purchase = await reporter.record(req.body, log);
      return reply.send({
        status: 'success',
        message: 'Purchase recorded and Discord notification sent!',
        data: purchase,
      });
    } catch (err) {
      return replyWithError(reply, err, log, {
        error: 'Internal server error',
        message: 'An unexpected error occurred while processing the purchase',
      });
    }
  });
}
