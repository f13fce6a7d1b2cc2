import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { AppConfig, loadConfig } from './config/index.js';
import { AppContainer, createContainer } from './container.js';
import { DomainError } from './domain/errors/index.js';
import { demoSeed } from './infrastructure/seed.js';
import { logger } from './logger.js';
import { cartRoutes } from './routes/cart.routes.js';

export interface BuildAppOptions {
  config?: AppConfig;
  container?: AppContainer;
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadConfig();
  const container = options.container ?? createContainer(config, demoSeed);

  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  await app.register(swagger, {
    openapi: {
      openapi: '3.0.0',
      info: {
        title: config.api.title,
        description: config.api.description,
        version: config.api.version,
      },
      servers: [
        {
          url: config.api.baseUrl || `http://${config.host}:${config.port}`,
          description: config.nodeEnv === 'production' ? 'Production server' : 'Development server',
        },
      ],
      tags: [
        { name: 'health', description: 'Health check endpoints' },
        { name: 'cart', description: 'Cart loading, mutation, validation and persistence' },
      ],
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

  await app.register(cartRoutes, {
    prefix: '/v1/stores/:storeId/customers/:customerId/cart',
    container,
  });

  app.setErrorHandler((error, request, reply) => {
    // Domain errors already have status codes
    if (error instanceof DomainError) {
      request.log.info({ code: error.code }, error.message);
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
    request.log.error(error);

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
    app.log.info(`API docs: http://${config.host}:${config.port}/docs`);

    // Handle shutdown gracefully
    const signals = ['SIGINT', 'SIGTERM'];
    signals.forEach((signal) => {
      process.on(signal, async () => {
        app.log.info(`${signal} received, shutting down...`);
        try {
          await app.close();
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
if (import.meta.url === `file://${process.argv[1]}`) {
  start().catch((err: unknown) => {
    logger.fatal(err, 'failed to start');
    process.exit(1);
  });
}
