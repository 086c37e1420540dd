import Fastify, { FastifyError } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { pathToFileURL } from 'node:url';
import { AppConfig, loadConfig } from './config.js';
import { Logger, createLogger } from './logger.js';
import { CatalogService, parseCategory } from './domain/services/CatalogService.js';
import { CartService } from './domain/services/CartService.js';
import { OrderService } from './domain/services/OrderService.js';
import { StandardPricingStrategy } from './domain/strategies/IPricingStrategy.js';
import { DomainError, ResourceNotFoundError } from './domain/errors/index.js';
import { OrderLineRequest, PRODUCT_CATEGORIES } from './domain/models.js';
import { ICatalogStore } from './infrastructure/catalog/ICatalogStore.js';
import { JsonFileCatalogStore } from './infrastructure/catalog/JsonFileCatalogStore.js';
import { IOrderLedger } from './infrastructure/ledger/IOrderLedger.js';
import { JsonFileOrderLedger } from './infrastructure/ledger/JsonFileOrderLedger.js';
import { ICartSessionStore } from './infrastructure/sessions/ICartSessionStore.js';
import { InMemoryCartSessionStore } from './infrastructure/sessions/InMemoryCartSessionStore.js';
import { ASSISTANT_TOOLS, AssistantTool, AssistantToolArgs, ShoppingAssistant } from './assistant/ShoppingAssistant.js';

export interface BuildAppOptions {
  config?: AppConfig;
  logger?: Logger;
  catalogStore?: ICatalogStore;
  orderLedger?: IOrderLedger;
  cartStore?: ICartSessionStore;
}

const cartIdParams = {
  type: 'object',
  required: ['cartId'],
  properties: {
    cartId: { type: 'string', format: 'uuid' },
  },
} as const;

const lineRequestSchema = {
  type: 'object',
  required: ['productName', 'quantity'],
  properties: {
    productName: { type: 'string', minLength: 1 },
    quantity: { type: 'integer' },
    variant: { type: 'string' },
  },
} as const;

function envelope<T>(data: T) {
  return { data, timestamp: new Date().toISOString() };
}

export async function buildApp(options: BuildAppOptions = {}) {
  const config = options.config ?? loadConfig();
  const logger =
    options.logger ??
    createLogger({ level: config.logLevel, pretty: config.nodeEnv === 'development' });

  const app = Fastify({ loggerInstance: logger });

  await app.register(swagger, {
    openapi: {
      openapi: '3.0.0',
      info: {
        title: config.apiTitle,
        description: config.apiDescription,
        version: config.apiVersion,
      },
      servers: [
        {
          url: config.apiBaseUrl || `http://${config.host}:${config.port}`,
          description: config.nodeEnv === 'production' ? 'Production server' : 'Development server',
        },
      ],
      tags: [
        { name: 'health', description: 'Health check endpoints' },
        { name: 'catalog', description: 'Product catalog queries' },
        { name: 'cart', description: 'Per-conversation cart sessions' },
        { name: 'orders', description: 'Order placement and history' },
        { name: 'assistant', description: 'Spoken-reply tools for the voice pipeline' },
      ],
      components: {
        schemas: {
          Product: {
            type: 'object',
            required: ['id', 'name', 'category', 'price', 'description'],
            properties: {
              id: { type: 'string', example: 'hoodie-01' },
              name: { type: 'string', example: 'Black Pullover Hoodie' },
              category: { type: 'string', enum: [...PRODUCT_CATEGORIES], example: 'hoodie' },
              price: { type: 'integer', example: 1800 },
              color: { type: 'string', example: 'black' },
              description: { type: 'string' },
              attributes: { type: 'object' },
            },
          },
          CartLine: {
            type: 'object',
            properties: {
              productId: { type: 'string' },
              productName: { type: 'string' },
              quantity: { type: 'integer', minimum: 1 },
              unitPrice: { type: 'integer' },
              variant: { type: 'string', example: 'M' },
            },
          },
          Cart: {
            type: 'object',
            properties: {
              cartId: { type: 'string', format: 'uuid' },
              lines: { type: 'array', items: { $ref: '#/components/schemas/CartLine' } },
              estimatedTotal: { type: 'integer' },
              createdAt: { type: 'string', format: 'date-time' },
              updatedAt: { type: 'string', format: 'date-time' },
              expiresAt: { type: 'string', format: 'date-time' },
            },
          },
          Order: {
            type: 'object',
            properties: {
              id: { type: 'string', example: 'order-0001' },
              lines: {
                type: 'array',
                items: {
                  type: 'object',
                  properties: {
                    productId: { type: 'string' },
                    productName: { type: 'string' },
                    quantity: { type: 'integer' },
                    unitPrice: { type: 'integer' },
                    lineTotal: { type: 'integer' },
                    variant: { type: 'string' },
                  },
                },
              },
              total: { type: 'integer' },
              currency: { type: 'string', example: 'INR' },
              createdAt: { type: 'string', format: 'date-time' },
              status: { type: 'string', enum: ['confirmed'] },
            },
          },
          Error: {
            type: 'object',
            properties: {
              error: {
                type: 'object',
                properties: {
                  code: { type: 'string' },
                  message: { type: 'string' },
                  statusCode: { type: 'integer' },
                },
              },
              timestamp: { type: 'string', format: 'date-time' },
            },
          },
        },
      },
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
  });

  await app.register(cors, {
    origin: config.corsOrigin,
  });

  // dependency injection
  const catalogStore =
    options.catalogStore ?? new JsonFileCatalogStore(config.catalogFile, logger.child({ module: 'catalog' }));
  const orderLedger =
    options.orderLedger ?? new JsonFileOrderLedger(config.ordersFile, logger.child({ module: 'ledger' }));
  let cartStore = options.cartStore;
  if (!cartStore) {
    const sessions = new InMemoryCartSessionStore(true, logger.child({ module: 'sessions' }));
    app.addHook('onClose', async () => sessions.destroy());
    cartStore = sessions;
  }

  const pricingStrategy = new StandardPricingStrategy();
  const catalogService = new CatalogService(catalogStore, logger.child({ module: 'catalog' }));
  const cartService = new CartService(cartStore, catalogService, pricingStrategy, {
    cartTtlMinutes: config.cartTtlMinutes,
    maxQuantity: config.maxQuantity,
    logger: logger.child({ module: 'cart' }),
  });
  const orderService = new OrderService(catalogService, orderLedger, pricingStrategy, cartService, {
    logger: logger.child({ module: 'orders' }),
  });

  app.get('/health', {
    schema: {
      tags: ['health'],
      description: 'Health check endpoint for load balancers and monitoring',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string', example: 'ok' },
            timestamp: { type: 'string', format: 'date-time' },
          },
        },
      },
    },
  }, async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // === Catalog Routes ===

  app.get<{
    Querystring: { category?: string; maxPrice?: number; color?: string; keyword?: string };
  }>('/v1/catalog', {
    schema: {
      tags: ['catalog'],
      description: 'Query the catalog; all filters are optional and combine with AND',
      querystring: {
        type: 'object',
        properties: {
          category: { type: 'string' },
          maxPrice: { type: 'integer', description: '0 or less means no limit' },
          color: { type: 'string' },
          keyword: { type: 'string' },
        },
      },
    },
  }, async (request, reply) => {
    const { category, maxPrice, color, keyword } = request.query;
    const { products, loadError } = await catalogService.query({
      category: parseCategory(category),
      maxPrice,
      color,
      keyword,
    });

    // an unreadable catalog answers as an empty one
    return reply.code(200).send({
      ...envelope(products),
      ...(loadError ? { warning: { code: loadError.code, message: loadError.message } } : {}),
    });
  });

  app.get<{
    Params: { productId: string };
  }>('/v1/catalog/:productId', {
    schema: {
      tags: ['catalog'],
      description: 'Retrieve a single product by id',
      params: {
        type: 'object',
        required: ['productId'],
        properties: { productId: { type: 'string' } },
      },
    },
  }, async (request, reply) => {
    const product = await catalogService.getById(request.params.productId);
    return reply.code(200).send(envelope(product));
  });

  // === Cart Routes ===

  app.post('/v1/carts', {
    schema: {
      tags: ['cart'],
      description: 'Start a cart session for a conversation',
    },
  }, async (_request, reply) => {
    const cart = await cartService.createCart();
    return reply.code(201).send(envelope(cart));
  });

  app.get<{
    Params: { cartId: string };
  }>('/v1/carts/:cartId', {
    schema: {
      tags: ['cart'],
      description: 'Retrieve a cart and its lines',
      params: cartIdParams,
    },
  }, async (request, reply) => {
    const cart = await cartService.getCart(request.params.cartId);
    return reply.code(200).send(envelope(cart));
  });

  app.post<{
    Params: { cartId: string };
    Body: OrderLineRequest;
  }>('/v1/carts/:cartId/lines', {
    schema: {
      tags: ['cart'],
      description: 'Add a product by name (merges into an existing line with the same variant)',
      params: cartIdParams,
      body: lineRequestSchema,
    },
  }, async (request, reply) => {
    const { productName, quantity, variant } = request.body;
    const cart = await cartService.addLine(request.params.cartId, productName, quantity, variant);
    return reply.code(200).send(envelope(cart));
  });

  app.patch<{
    Params: { cartId: string };
    Body: OrderLineRequest;
  }>('/v1/carts/:cartId/lines', {
    schema: {
      tags: ['cart'],
      description: 'Set the quantity of an existing line; 0 removes it',
      params: cartIdParams,
      body: lineRequestSchema,
    },
  }, async (request, reply) => {
    const { productName, quantity, variant } = request.body;
    const cart = await cartService.setLineQuantity(request.params.cartId, productName, quantity, variant);
    return reply.code(200).send(envelope(cart));
  });

  app.delete<{
    Params: { cartId: string };
    Body: { productName: string; variant?: string };
  }>('/v1/carts/:cartId/lines', {
    schema: {
      tags: ['cart'],
      description: 'Remove the line matching product name and variant exactly',
      params: cartIdParams,
      body: {
        type: 'object',
        required: ['productName'],
        properties: {
          productName: { type: 'string', minLength: 1 },
          variant: { type: 'string' },
        },
      },
    },
  }, async (request, reply) => {
    const { cartId } = request.params;
    const { productName, variant } = request.body;
    const removed = await cartService.removeLine(cartId, productName, variant);
    const cart = await cartService.getCart(cartId);
    return reply.code(200).send(envelope({ removed, cart }));
  });

  app.post<{
    Params: { cartId: string };
  }>('/v1/carts/:cartId/clear', {
    schema: {
      tags: ['cart'],
      description: 'Remove every line but keep the session',
      params: cartIdParams,
    },
  }, async (request, reply) => {
    const cart = await cartService.clear(request.params.cartId);
    return reply.code(200).send(envelope(cart));
  });

  app.delete<{
    Params: { cartId: string };
  }>('/v1/carts/:cartId', {
    schema: {
      tags: ['cart'],
      description: 'End a cart session',
      params: cartIdParams,
    },
  }, async (request, reply) => {
    await cartService.deleteCart(request.params.cartId);
    return reply.code(204).send();
  });

  app.post<{
    Params: { cartId: string };
  }>('/v1/carts/:cartId/checkout', {
    schema: {
      tags: ['cart', 'orders'],
      description: 'Commit the cart as an order; the cart is cleared only after the order is stored',
      params: cartIdParams,
    },
  }, async (request, reply) => {
    const { order, droppedLines } = await orderService.commitCart(request.params.cartId);
    return reply.code(201).send(envelope({ order, droppedLines, droppedCount: droppedLines.length }));
  });

  // === Order Routes ===

  app.post<{
    Body: { lines: OrderLineRequest[] };
  }>('/v1/orders', {
    schema: {
      tags: ['orders'],
      description: 'Commit an explicit list of line items as an order',
      body: {
        type: 'object',
        required: ['lines'],
        properties: {
          lines: { type: 'array', items: lineRequestSchema },
        },
      },
    },
  }, async (request, reply) => {
    const { order, droppedLines } = await orderService.commit(request.body.lines);
    return reply.code(201).send(envelope({ order, droppedLines, droppedCount: droppedLines.length }));
  });

  app.get('/v1/orders', {
    schema: {
      tags: ['orders'],
      description: 'Full order history, oldest first',
    },
  }, async (_request, reply) => {
    const orders = await orderService.listOrders();
    return reply.code(200).send(envelope(orders));
  });

  app.get('/v1/orders/latest', {
    schema: {
      tags: ['orders'],
      description: 'Most recent order, or null when none has been placed',
    },
  }, async (_request, reply) => {
    const order = await orderService.getLastOrder();
    return reply.code(200).send(envelope(order));
  });

  app.get<{
    Params: { orderId: string };
  }>('/v1/orders/:orderId', {
    schema: {
      tags: ['orders'],
      description: 'Retrieve an order by id',
      params: {
        type: 'object',
        required: ['orderId'],
        properties: { orderId: { type: 'string' } },
      },
    },
  }, async (request, reply) => {
    const { orderId } = request.params;
    const order = await orderService.getOrderById(orderId);
    if (!order) throw new ResourceNotFoundError('Order', orderId);
    return reply.code(200).send(envelope(order));
  });

  // === Assistant Routes ===

  app.post<{
    Params: { cartId: string; tool: AssistantTool };
    Body: AssistantToolArgs | null | undefined;
  }>('/v1/assistant/:cartId/tools/:tool', {
    schema: {
      tags: ['assistant'],
      description: 'Run a shopping tool for a conversation and return the reply to speak',
      params: {
        type: 'object',
        required: ['cartId', 'tool'],
        properties: {
          cartId: { type: 'string', format: 'uuid' },
          tool: { type: 'string', enum: [...ASSISTANT_TOOLS] },
        },
      },
      body: {
        type: ['object', 'null'],
        properties: {
          category: { type: 'string' },
          maxPrice: { type: 'integer' },
          color: { type: 'string' },
          keyword: { type: 'string' },
          productName: { type: 'string' },
          quantity: { type: 'integer' },
          size: { type: 'string' },
          orderId: { type: 'string' },
        },
      },
    },
  }, async (request, reply) => {
    const { cartId, tool } = request.params;
    const assistant = new ShoppingAssistant(cartId, {
      catalog: catalogService,
      carts: cartService,
      orders: orderService,
      logger: logger.child({ module: 'assistant', reqId: request.id }),
    });
    const text = await assistant.invoke(tool, request.body ?? {});
    return reply.code(200).send(envelope({ reply: text }));
  });

  // ============================================================================
  // Error Handler
  // ============================================================================

  app.setErrorHandler<FastifyError>((error, _request, reply) => {
    // Domain errors already have status codes
    if (error instanceof DomainError) {
      return reply.code(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          statusCode: error.statusCode,
        },
        timestamp: new Date().toISOString(),
      });
    }

    // Fastify validation errors
    if (error.validation) {
      return reply.code(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Request validation failed',
          details: error.validation,
          statusCode: 400,
        },
        timestamp: new Date().toISOString(),
      });
    }

    // Log unexpected stuff
    app.log.error(error);

    // Catch-all for other errors
    return reply.code(500).send({
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: 'An unexpected error occurred',
        statusCode: 500,
      },
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}

async function start() {
  const config = loadConfig();
  const app = await buildApp({ config });

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Health check: http://${config.host}:${config.port}/health`);
    app.log.info(`API docs: http://${config.host}:${config.port}/docs`);

    // Handle shutdown gracefully
    const signals = ['SIGINT', 'SIGTERM'];
    signals.forEach((signal) => {
      process.on(signal, async () => {
        app.log.info(`${signal} received, shutting down...`);
        try {
          await app.close();
          app.log.info('Server closed successfully');
          process.exit(0);
        } catch (err) {
          app.log.error(err, 'Error during shutdown');
          process.exit(1);
        }
      });
    });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

// Start if run directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void start();
}
