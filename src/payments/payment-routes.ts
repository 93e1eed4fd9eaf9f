import { FastifyInstance, FastifyRequest } from 'fastify';
import { AppConfig } from '../config/env';
import { MalformedPurchaseMetadataError } from '../errors/app-error';
import { replyWithError } from '../errors/error-handler';
import { requestLogger } from '../observability/trace';
import { isRecord } from '../utils/guards';
import { renderPaymentSuccessPage, renderPaymentUnverifiedPage } from '../storefront/pages';
import { PaymentBroker } from './payment-broker';
import { MissingPaymentInfoError, PaymentExecutionFailedError } from './errors';

interface ExecuteQuery {
  paymentId?: string;
  PayerID?: string;
}

function readField(body: unknown, key: string): unknown {
  return isRecord(body) ? body[key] : undefined;
}

export function registerPaymentRoutes(app: FastifyInstance, broker: PaymentBroker, config: AppConfig): void {
  const baseUrlFor = (req: FastifyRequest): string =>
    config.publicBaseUrl ?? `${req.protocol}://${req.hostname}`;

  app.post<{ Body: unknown }>('/create-payment', async (req, reply) => {
    const log = requestLogger('/create-payment');

    try {
      const { approvalUrl } = await broker.createPayment(
        {
          productName: readField(req.body, 'product'),
          username: readField(req.body, 'username'),
          baseUrl: baseUrlFor(req),
        },
        log,
      );
      return reply.send({ approval_url: approvalUrl });
    } catch (err) {
      return replyWithError(reply, err, log, { error: 'Internal server error' });
    }
  });

  /** Provider redirect after the payer approved */
  app.get<{ Querystring: ExecuteQuery }>('/execute-payment', async (req, reply) => {
    const { paymentId, PayerID: payerId } = req.query;
    const log = requestLogger('/execute-payment', paymentId);
    reply.header('Content-Type', 'text/html; charset=utf-8');

    try {
      const purchase = await broker.executePayment(paymentId, payerId, log);
      return reply.send(renderPaymentSuccessPage(config.shopName, purchase));
    } catch (err) {
      if (err instanceof MissingPaymentInfoError) {
        log.warn({ missing: err.details.missing }, 'Execute called without payment information');
        return reply.status(400).send('Payment execution failed: Missing payment information');
      }
      if (err instanceof PaymentExecutionFailedError) {
        log.error({ err, details: err.details }, 'Payment execution failed');
        return reply.status(500).send('Payment execution failed');
      }
      if (err instanceof MalformedPurchaseMetadataError && typeof paymentId === 'string') {
        log.error({ err, details: err.details }, 'Executed payment carries unreadable purchase metadata');
        return reply.status(500).send(renderPaymentUnverifiedPage(config.shopName, paymentId));
      }
      log.error({ err }, 'Payment execution error');
      return reply.status(500).send('Payment execution error');
    }
  });
}
