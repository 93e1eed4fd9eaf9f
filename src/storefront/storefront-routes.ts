import { FastifyInstance } from 'fastify';
import { Catalog } from '../catalog/catalog';
import { renderCatalogPage, renderPaymentCancelledPage } from './pages';

/**
 * Serves the shop front: catalog page at / and the provider's cancel landing page.
 */
export function registerStorefrontRoutes(app: FastifyInstance, catalog: Catalog, shopName: string): void {
  const catalogHtml = renderCatalogPage(shopName, catalog.list());
  const cancelledHtml = renderPaymentCancelledPage(shopName);

  app.get('/', async (_req, reply) => {
    reply.header('Content-Type', 'text/html; charset=utf-8');
    return reply.send(catalogHtml);
  });

  app.get('/cancel-payment', async (_req, reply) => {
    reply.header('Content-Type', 'text/html; charset=utf-8');
    return reply.send(cancelledHtml);
  });
}
